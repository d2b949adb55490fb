import { join } from 'path';
import type { DatasetProperties, SecuritySymbol, SubscriptionDataSource } from '../types/insiderTrading';
import { formatEightCharacter } from '../utils/dates';

export const PROVIDER = 'quiver';
export const DATASET = 'insidertrading';

export const INSIDER_TRADING_PROPERTIES: DatasetProperties = {
  defaultResolution: 'Daily',
  supportedResolutions: ['Daily'],
  dataTimeZone: 'America/New_York',
  // Most symbols have no filings on most days
  isSparseData: true,
  // Filings follow the security through renames and delistings
  requiresMapping: true,
};

export function getDatasetFolder(dataFolder: string): string {
  return join(dataFolder, 'alternative', PROVIDER, DATASET);
}

export function getUniverseFolder(dataFolder: string): string {
  return join(getDatasetFolder(dataFolder), 'universe');
}

export function getInsiderTradingPath(dataFolder: string, ticker: string): string {
  return join(getDatasetFolder(dataFolder), `${ticker.toLowerCase()}.csv`);
}

export function getInsiderTradingUniversePath(dataFolder: string, date: Date): string {
  return join(getUniverseFolder(dataFolder), `${formatEightCharacter(date)}.csv`);
}

/** Per-symbol file holding every filing for that symbol */
export function getInsiderTradingSource(dataFolder: string, symbol: SecuritySymbol): SubscriptionDataSource {
  return {
    source: getInsiderTradingPath(dataFolder, symbol.value),
    transportMedium: 'LocalFile',
    format: 'FoldingCollection',
  };
}

/** Per-date file holding every filing visible on that date */
export function getInsiderTradingUniverseSource(dataFolder: string, date: Date): SubscriptionDataSource {
  return {
    source: getInsiderTradingUniversePath(dataFolder, date),
    transportMedium: 'LocalFile',
    format: 'FoldingCollection',
  };
}
