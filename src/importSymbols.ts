import 'dotenv/config';
import { readFile } from 'fs/promises';
import { CONFIG } from './config';
import { SymbolDatabase } from './db/symbolDatabase';
import { parseSymbolLines } from './db/symbolImport';
import { log, logError } from './utils/logger';

// Usage: npm run import-symbols -- <symbols.csv>
async function importSymbols() {
  const file = process.argv[2];
  if (!file) {
    throw new Error('Usage: importSymbols <symbols.csv>');
  }

  const entries = parseSymbolLines(await readFile(file, 'utf-8'));

  const db = new SymbolDatabase(CONFIG.SYMBOL_DB_PATH);
  await db.initialize();
  try {
    await db.upsertSymbols(entries);
  } finally {
    await db.close();
  }

  log(`✓ Imported ${entries.length} symbols into ${CONFIG.SYMBOL_DB_PATH}`);
}

importSymbols().catch((error) => {
  logError('Symbol import failed', error);
  process.exit(1);
});
