import { describe, it, expect } from 'vitest';
import { join } from 'path';
import {
  INSIDER_TRADING_PROPERTIES,
  getInsiderTradingSource,
  getInsiderTradingUniverseSource,
} from '../../src/dataset/insiderTradingDataset';

const DATA_FOLDER = join('/srv', 'data');

describe('Insider trading dataset', () => {
  it('should locate per-symbol files by lowercase ticker', () => {
    const source = getInsiderTradingSource(DATA_FOLDER, { value: 'AAPL', id: 'AAPL R735QTJ8XC9X' });

    expect(source).toEqual({
      source: join(DATA_FOLDER, 'alternative', 'quiver', 'insidertrading', 'aapl.csv'),
      transportMedium: 'LocalFile',
      format: 'FoldingCollection',
    });
  });

  it('should locate universe files by date', () => {
    const source = getInsiderTradingUniverseSource(DATA_FOLDER, new Date(Date.UTC(2022, 1, 15)));

    expect(source.source).toBe(join(DATA_FOLDER, 'alternative', 'quiver', 'insidertrading', 'universe', '20220215.csv'));
    expect(source.transportMedium).toBe('LocalFile');
    expect(source.format).toBe('FoldingCollection');
  });

  it('should declare daily, sparse, mapped New York data', () => {
    expect(INSIDER_TRADING_PROPERTIES).toEqual({
      defaultResolution: 'Daily',
      supportedResolutions: ['Daily'],
      dataTimeZone: 'America/New_York',
      isSparseData: true,
      requiresMapping: true,
    });
  });
});
