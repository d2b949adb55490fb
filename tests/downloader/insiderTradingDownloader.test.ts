import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { AxiosError } from 'axios';
import { mkdir, mkdtemp, readFile, rm, writeFile } from 'fs/promises';
import { existsSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SymbolDatabase } from '../../src/db/symbolDatabase';
import { InsiderTradingDownloader, mapDirection, type ProviderFiling } from '../../src/downloader/insiderTradingDownloader';
import { parseInsiderTradingFile, parseInsiderTradingUniverseFile } from '../../src/parsing/insiderTradingParser';

const PROCESS_DATE = new Date(Date.UTC(2022, 1, 14));

const filing = (overrides: Partial<ProviderFiling>): ProviderFiling => ({
  Ticker: 'AAPL',
  Name: 'Jane Doe',
  Date: '2022-02-10T00:00:00',
  fileDate: '2022-02-14T00:00:00',
  AcquiredDisposedCode: 'A',
  TransactionCode: 'P',
  Shares: 1500,
  PricePerShare: 172.5,
  SharesOwnedFollowing: 20000,
  ...overrides,
});

describe('InsiderTradingDownloader', () => {
  let folder: string;
  let symbolDatabase: SymbolDatabase;
  let get: ReturnType<typeof vi.fn>;
  let downloader: InsiderTradingDownloader;

  const datasetFile = (...parts: string[]) => join(folder, 'alternative', 'quiver', 'insidertrading', ...parts);

  beforeEach(async () => {
    folder = await mkdtemp(join(tmpdir(), 'insider-'));
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    symbolDatabase = new SymbolDatabase(':memory:');
    await symbolDatabase.initialize();
    await symbolDatabase.upsertSymbols([
      { ticker: 'AAPL', securityId: 'SID-AAPL', firstDate: '1980-12-12' },
      { ticker: 'CRDA', securityId: 'SID-A', firstDate: '2010-01-04' },
      { ticker: 'CRDB', securityId: 'SID-B', firstDate: '2010-01-04' },
    ]);

    get = vi.fn();
    downloader = new InsiderTradingDownloader({
      apiKey: 'test-key',
      baseUrl: 'https://api.test/',
      destinationFolder: folder,
      symbolDatabase,
      client: { get },
      requestDelayMs: 0,
      maxRetries: 2,
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await symbolDatabase.close();
    await rm(folder, { recursive: true, force: true });
  });

  describe('mapDirection', () => {
    it('should map acquired to Buy and disposed to Sell', () => {
      expect(mapDirection('A')).toBe('Buy');
      expect(mapDirection('d')).toBe('Sell');
    });

    it('should default to Hold', () => {
      expect(mapDirection(null)).toBe('Hold');
      expect(mapDirection('X')).toBe('Hold');
    });
  });

  describe('mapFiling', () => {
    it('should strip commas from filer names', () => {
      const mapped = downloader.mapFiling(filing({ Name: 'Doe, Jane' }));
      expect(mapped?.columns).toBe('20220214,Doe Jane,0,1500,172.5,20000');
    });

    it('should leave missing quantities empty', () => {
      const mapped = downloader.mapFiling(
        filing({ AcquiredDisposedCode: 'D', PricePerShare: null, SharesOwnedFollowing: undefined })
      );
      expect(mapped?.columns).toBe('20220214,Jane Doe,1,1500,,');
    });

    it('should reject filings without a usable filing date', () => {
      expect(downloader.mapFiling(filing({ fileDate: 'yesterday' }))).toBeNull();
    });
  });

  describe('resolveTickers', () => {
    it('should resolve a clean ticker directly', async () => {
      expect(await downloader.resolveTickers('aapl', PROCESS_DATE)).toEqual([
        { ticker: 'AAPL', securityId: 'SID-AAPL' },
      ]);
    });

    it('should fall back to defunct ticker normalization', async () => {
      expect(await downloader.resolveTickers('CRDA CRDB', PROCESS_DATE)).toEqual([
        { ticker: 'CRDA', securityId: 'SID-A' },
        { ticker: 'CRDB', securityId: 'SID-B' },
      ]);
      expect(await downloader.resolveTickers('AAPL+', PROCESS_DATE)).toEqual([
        { ticker: 'AAPL', securityId: 'SID-AAPL' },
      ]);
    });

    it('should return nothing for unknown tickers', async () => {
      expect(await downloader.resolveTickers('ZZZZ', PROCESS_DATE)).toEqual([]);
      expect(await downloader.resolveTickers('"-"', PROCESS_DATE)).toEqual([]);
    });
  });

  describe('fetchFilings', () => {
    it('should request the filings of the given day with the API key', async () => {
      get.mockResolvedValue({ data: [filing({})] });

      const filings = await downloader.fetchFilings(PROCESS_DATE);

      expect(filings).toHaveLength(1);
      expect(get).toHaveBeenCalledWith('https://api.test/beta/live/insiders', {
        params: { date: '20220214' },
        headers: {
          Accept: 'application/json',
          Authorization: 'Bearer test-key',
        },
      });
    });

    it('should retry network failures', async () => {
      get.mockRejectedValueOnce(new AxiosError('socket hang up', 'ECONNRESET')).mockResolvedValueOnce({ data: [] });

      await expect(downloader.fetchFilings(PROCESS_DATE)).resolves.toEqual([]);
      expect(get).toHaveBeenCalledTimes(2);
    });

    it('should give up after the configured retries', async () => {
      get.mockRejectedValue(new AxiosError('socket hang up', 'ECONNRESET'));

      await expect(downloader.fetchFilings(PROCESS_DATE)).rejects.toThrow('socket hang up');
      expect(get).toHaveBeenCalledTimes(3);
    });

    it('should not retry client errors', async () => {
      get.mockRejectedValue({ isAxiosError: true, response: { status: 401 } });

      await expect(downloader.fetchFilings(PROCESS_DATE)).rejects.toMatchObject({ response: { status: 401 } });
      expect(get).toHaveBeenCalledTimes(1);
    });

    it('should reject unexpected payloads', async () => {
      get.mockResolvedValue({ data: { message: 'Invalid token' } });

      await expect(downloader.fetchFilings(PROCESS_DATE)).rejects.toThrow(/Unexpected insider filings payload/);
      expect(get).toHaveBeenCalledTimes(1);
    });
  });

  describe('run', () => {
    it('should write per-symbol and universe files visible the next day', async () => {
      get.mockResolvedValue({
        data: [
          filing({ Name: 'Doe, Jane' }),
          filing({
            Ticker: 'CRDA CRDB',
            Name: 'John Roe',
            AcquiredDisposedCode: 'D',
            Shares: 100,
            PricePerShare: null,
            SharesOwnedFollowing: null,
          }),
          filing({ Ticker: 'ZZZZ' }),
        ],
      });

      const summary = await downloader.run(PROCESS_DATE);

      expect(summary).toEqual({ filings: 3, written: 3, skipped: 1, symbols: 3 });
      expect(await readFile(datasetFile('aapl.csv'), 'utf-8')).toBe('20220215,20220214,Doe Jane,0,1500,172.5,20000\n');
      expect(await readFile(datasetFile('crda.csv'), 'utf-8')).toBe('20220215,20220214,John Roe,1,100,,\n');
      expect(await readFile(datasetFile('crdb.csv'), 'utf-8')).toBe('20220215,20220214,John Roe,1,100,,\n');
      expect(existsSync(datasetFile('zzzz.csv'))).toBe(false);
      expect(await readFile(datasetFile('universe', '20220215.csv'), 'utf-8')).toBe(
        'SID-A,CRDA,20220214,John Roe,1,100,,\n' +
          'SID-AAPL,AAPL,20220214,Doe Jane,0,1500,172.5,20000\n' +
          'SID-B,CRDB,20220214,John Roe,1,100,,\n'
      );
    });

    it('should produce files the parsers read back', async () => {
      get.mockResolvedValue({ data: [filing({})] });

      await downloader.run(PROCESS_DATE);

      const [record] = parseInsiderTradingFile(
        { value: 'AAPL', id: 'SID-AAPL' },
        await readFile(datasetFile('aapl.csv'), 'utf-8')
      );
      expect(record.time.toISOString()).toBe('2022-02-15T00:00:00.000Z');
      expect(record.date.toISOString()).toBe('2022-02-14T00:00:00.000Z');
      expect(record.transaction).toBe('Buy');
      expect(record.pricePerShare).toBe(172.5);

      const visibleDay = new Date(Date.UTC(2022, 1, 15));
      const [universe] = parseInsiderTradingUniverseFile(
        await readFile(datasetFile('universe', '20220215.csv'), 'utf-8'),
        visibleDay
      );
      expect(universe.symbol).toEqual({ value: 'AAPL', id: 'SID-AAPL' });
      expect(universe.sharesOwnedFollowing).toBe(20000);
    });

    it('should merge with existing per-symbol files without duplicates', async () => {
      await mkdir(datasetFile(), { recursive: true });
      await writeFile(
        datasetFile('aapl.csv'),
        '20220215,20220214,Jane Doe,0,1500,172.5,20000\n20220111,20220110,Old Filer,1,5,10,15\n'
      );
      get.mockResolvedValue({ data: [filing({})] });

      await downloader.run(PROCESS_DATE);

      expect(await readFile(datasetFile('aapl.csv'), 'utf-8')).toBe(
        '20220111,20220110,Old Filer,1,5,10,15\n20220215,20220214,Jane Doe,0,1500,172.5,20000\n'
      );
    });

    it('should skip filings dated after the process date', async () => {
      get.mockResolvedValue({ data: [filing({ fileDate: '2022-02-15' })] });

      const summary = await downloader.run(PROCESS_DATE);

      expect(summary).toEqual({ filings: 1, written: 0, skipped: 1, symbols: 0 });
      expect(existsSync(datasetFile('universe', '20220215.csv'))).toBe(false);
    });
  });
});
