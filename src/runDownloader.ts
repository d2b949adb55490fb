import 'dotenv/config';
import { CONFIG } from './config';
import { SymbolDatabase } from './db/symbolDatabase';
import { InsiderTradingDownloader } from './downloader/insiderTradingDownloader';
import { addDays, formatEightCharacter, parseEightCharacterDate, toDateOnly } from './utils/dates';
import { log, logError } from './utils/logger';

// Usage: npm run download -- [startDate] [endDate]   (dates as YYYYMMDD, default yesterday)
function parseDateArg(value: string | undefined, fallback: Date): Date {
  if (!value) return fallback;
  const date = parseEightCharacterDate(value);
  if (!date) throw new Error(`Expected a YYYYMMDD date, got "${value}"`);
  return date;
}

async function runDownloader() {
  if (!CONFIG.QUIVER_API_KEY) {
    throw new Error('QUIVER_API_KEY is not set');
  }

  const yesterday = addDays(toDateOnly(new Date()), -1);
  const start = parseDateArg(process.argv[2], yesterday);
  const end = parseDateArg(process.argv[3], start);
  if (end < start) {
    throw new Error(`End date ${formatEightCharacter(end)} is before start date ${formatEightCharacter(start)}`);
  }

  log('📥 Insider trading downloader');
  log(`Destination: ${CONFIG.DATA_FOLDER}`);

  const symbolDatabase = new SymbolDatabase(CONFIG.SYMBOL_DB_PATH);
  await symbolDatabase.initialize();

  const downloader = new InsiderTradingDownloader({
    apiKey: CONFIG.QUIVER_API_KEY,
    baseUrl: CONFIG.QUIVER_API_URL,
    destinationFolder: CONFIG.DATA_FOLDER,
    symbolDatabase,
    requestDelayMs: CONFIG.REQUEST_DELAY_MS,
    maxRetries: CONFIG.MAX_RETRIES,
  });

  let total = 0;
  try {
    for (let date = start; date <= end; date = addDays(date, 1)) {
      const summary = await downloader.run(date);
      total += summary.written;
    }
  } finally {
    await symbolDatabase.close();
  }

  log(`✓ Download complete, ${total} lines written`);
}

runDownloader().catch((error) => {
  logError('Downloader failed', error);
  process.exit(1);
});
