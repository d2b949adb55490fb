import { appendFileSync, existsSync, mkdirSync } from 'fs';
import { join } from 'path';
import { CONFIG } from '../config';

const LOG_FILE_NAME = 'insider-trading.log';

// Test runs only log to the console
const fileLoggingEnabled = process.env.NODE_ENV !== 'test' && !process.env.VITEST;

function writeLine(line: string): void {
  if (!fileLoggingEnabled) return;
  if (!existsSync(CONFIG.LOG_DIR)) {
    mkdirSync(CONFIG.LOG_DIR, { recursive: true });
  }
  appendFileSync(join(CONFIG.LOG_DIR, LOG_FILE_NAME), line + '\n');
}

export function log(message: string): void {
  const logMessage = `[${new Date().toISOString()}] ${message}`;
  console.log(logMessage);
  writeLine(logMessage);
}

export function logError(message: string, error?: unknown): void {
  const detail = error instanceof Error ? error.stack ?? error.message : error === undefined ? '' : String(error);
  const logMessage = `[${new Date().toISOString()}] ERROR ${message}${detail ? `: ${detail}` : ''}`;
  console.error(logMessage);
  writeLine(logMessage);
}
