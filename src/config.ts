import { join, dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const PROJECT_ROOT = join(__dirname, '..');

function readPath(value: string | undefined, fallback: string): string {
  return value ? resolve(value) : join(PROJECT_ROOT, fallback);
}

export function readInt(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  if (!/^\d+$/.test(value.trim())) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return parseInt(value.trim(), 10);
}

// ============================================================================
// CONFIGURATION
// ============================================================================

export const CONFIG = {
  // Engine data root; files land under alternative/quiver/insidertrading
  DATA_FOLDER: readPath(process.env.DATA_FOLDER, 'data'),

  QUIVER_API_KEY: process.env.QUIVER_API_KEY || '',
  QUIVER_API_URL: process.env.QUIVER_API_URL || 'https://api.quiverquant.com',

  SYMBOL_DB_PATH: readPath(process.env.SYMBOL_DB_PATH, 'data/symbols.json'),
  LOG_DIR: readPath(process.env.LOG_DIR, 'logs'),

  // Provider rate limiting
  REQUEST_DELAY_MS: readInt(process.env.REQUEST_DELAY_MS, 1000),
  MAX_RETRIES: readInt(process.env.MAX_RETRIES, 5),
};
