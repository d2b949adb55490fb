import 'dotenv/config';
import { CONFIG } from './config';
import { formatRecord } from './records/insiderTrading';
import { loadUniverse, selectInsiderUniverse, summarizeActivity, symbolKey } from './universe/selection';
import { formatEightCharacter, parseEightCharacterDate } from './utils/dates';
import { log, logError } from './utils/logger';

// Usage: npm run universe -- <date> [--verbose]   (date as YYYYMMDD)
async function runUniverseSelection() {
  const date = parseEightCharacterDate(process.argv[2] ?? '');
  if (!date) {
    throw new Error('Usage: runUniverseSelection <YYYYMMDD> [--verbose]');
  }
  const verbose = process.argv.includes('--verbose');

  const records = await loadUniverse(CONFIG.DATA_FOLDER, date);
  log(`🔍 ${records.length} insider filings visible on ${formatEightCharacter(date)}`);

  if (verbose) {
    for (const record of records) {
      log(`  ${formatRecord(record)}`);
    }
  }

  const selected = selectInsiderUniverse(records);
  const activity = new Map(summarizeActivity(records).map((a) => [symbolKey(a.symbol), a]));

  log(`🎯 Selected ${selected.length} symbols`);
  for (const symbol of selected) {
    const a = activity.get(symbolKey(symbol));
    const volume = a ? `$${(a.dollarVolume / 1000).toFixed(0)}K across ${a.filings} filings` : '';
    log(`  ${symbol.value} (${symbol.id}) ${volume}`);
  }
}

runUniverseSelection().catch((error) => {
  logError('Universe selection failed', error);
  process.exit(1);
});
