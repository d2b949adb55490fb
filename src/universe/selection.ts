import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { getInsiderTradingUniversePath } from '../dataset/insiderTradingDataset';
import { parseInsiderTradingUniverseFile } from '../parsing/insiderTradingParser';
import type { AnyInsiderTradingRecord, InsiderTradingUniverseRecord, SecuritySymbol } from '../types/insiderTrading';

export interface UniverseSelectionCriteria {
  /** Minimum number of filings per symbol */
  minFilings: number;
  /** Summed shares x price per share must exceed this */
  minDollarVolume: number;
}

export const DEFAULT_SELECTION_CRITERIA: UniverseSelectionCriteria = {
  minFilings: 2,
  minDollarVolume: 100000,
};

export interface SymbolActivity {
  symbol: SecuritySymbol;
  filings: number;
  dollarVolume: number;
}

export function symbolKey(symbol: SecuritySymbol): string {
  return symbol.id || symbol.value;
}

export function summarizeActivity(records: AnyInsiderTradingRecord[]): SymbolActivity[] {
  const activity = new Map<string, SymbolActivity>();

  for (const record of records) {
    const key = symbolKey(record.symbol);
    const entry = activity.get(key) ?? { symbol: { ...record.symbol }, filings: 0, dollarVolume: 0 };

    entry.filings++;
    if (record.shares !== null && record.pricePerShare !== null) {
      entry.dollarVolume += record.shares * record.pricePerShare;
    }
    activity.set(key, entry);
  }

  return Array.from(activity.values());
}

/**
 * Picks the symbols with repeated, sizeable insider activity.
 * Records missing shares or price still count as filings but add no volume.
 */
export function selectInsiderUniverse(
  records: AnyInsiderTradingRecord[],
  criteria: Partial<UniverseSelectionCriteria> = {}
): SecuritySymbol[] {
  const { minFilings, minDollarVolume } = { ...DEFAULT_SELECTION_CRITERIA, ...criteria };

  return summarizeActivity(records)
    .filter((a) => a.filings >= minFilings && a.dollarVolume > minDollarVolume)
    .map((a) => a.symbol);
}

export async function loadUniverse(dataFolder: string, date: Date): Promise<InsiderTradingUniverseRecord[]> {
  const path = getInsiderTradingUniversePath(dataFolder, date);
  if (!existsSync(path)) return [];
  return parseInsiderTradingUniverseFile(await readFile(path, 'utf-8'), date);
}
