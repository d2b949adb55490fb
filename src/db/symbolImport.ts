import type { SymbolEntry } from './symbolDatabase';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * Parses `ticker,securityId,firstDate[,lastDate]` lines (dates yyyy-MM-dd).
 * A header line starting with "ticker" is ignored.
 */
export function parseSymbolLines(content: string): SymbolEntry[] {
  const entries: SymbolEntry[] = [];

  for (const line of content.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.toLowerCase().startsWith('ticker')) continue;

    const [ticker, securityId, firstDate, lastDate] = trimmed.split(',').map((c) => c.trim());
    if (!ticker || !securityId || !firstDate || !ISO_DATE.test(firstDate)) {
      throw new Error(`Invalid symbol line "${line}"`);
    }
    if (lastDate && !ISO_DATE.test(lastDate)) {
      throw new Error(`Invalid last date in symbol line "${line}"`);
    }

    entries.push(lastDate ? { ticker, securityId, firstDate, lastDate } : { ticker, securityId, firstDate });
  }

  return entries;
}
