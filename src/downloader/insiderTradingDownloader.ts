import axios, { type AxiosInstance } from 'axios';
import { existsSync } from 'fs';
import { mkdir, readFile, writeFile } from 'fs/promises';
import { z } from 'zod';
import type { SymbolDatabase } from '../db/symbolDatabase';
import {
  getDatasetFolder,
  getInsiderTradingPath,
  getInsiderTradingUniversePath,
  getUniverseFolder,
} from '../dataset/insiderTradingDataset';
import { tryNormalizeDefunctTicker } from '../tickers/defunctTicker';
import { ORDER_DIRECTION_CODES, type OrderDirection } from '../types/insiderTrading';
import { addDays, formatEightCharacter, toDateOnly } from '../utils/dates';
import { log, logError } from '../utils/logger';

const optionalNumber = z.number().nullable().optional();

export const providerFilingSchema = z.object({
  Ticker: z.string(),
  Name: z.string(),
  Date: z.string().nullable().optional(),
  fileDate: z.string(),
  AcquiredDisposedCode: z.string().nullable().optional(),
  TransactionCode: z.string().nullable().optional(),
  Shares: optionalNumber,
  PricePerShare: optionalNumber,
  SharesOwnedFollowing: optionalNumber,
});

export type ProviderFiling = z.infer<typeof providerFilingSchema>;

const providerResponseSchema = z.array(providerFilingSchema);

export type HttpClient = Pick<AxiosInstance, 'get'>;

export interface DownloaderOptions {
  apiKey: string;
  destinationFolder: string;
  symbolDatabase: SymbolDatabase;
  baseUrl?: string;
  client?: HttpClient;
  requestDelayMs?: number;
  maxRetries?: number;
}

export interface ResolvedTicker {
  ticker: string;
  securityId: string;
}

/** One filing reduced to the CSV columns shared by both file layouts */
export interface MappedFiling {
  rawTicker: string;
  filingDate: Date;
  /** filingDate,name,transaction,shares,pricePerShare,sharesOwnedFollowing */
  columns: string;
}

export interface DownloadSummary {
  filings: number;
  written: number;
  skipped: number;
  symbols: number;
}

export function mapDirection(acquiredDisposedCode: string | null | undefined): OrderDirection {
  switch ((acquiredDisposedCode ?? '').trim().toUpperCase()) {
    case 'A':
      return 'Buy';
    case 'D':
      return 'Sell';
    default:
      return 'Hold';
  }
}

// Provider dates come as yyyy-MM-dd, optionally followed by a time
function parseProviderDate(value: string | null | undefined): Date | null {
  const match = /^(\d{4})-(\d{2})-(\d{2})/.exec(value ?? '');
  if (!match) return null;
  const date = new Date(Date.UTC(parseInt(match[1], 10), parseInt(match[2], 10) - 1, parseInt(match[3], 10)));
  return Number.isNaN(date.getTime()) ? null : date;
}

function formatDecimal(value: number | null | undefined): string {
  return value === null || value === undefined ? '' : String(value);
}

// Lines start with a yyyyMMdd date or security id, so a plain sort keeps them ordered
function mergeLines(existing: string[], added: string[]): string[] {
  return Array.from(new Set([...existing, ...added].filter((line) => line.trim().length > 0))).sort();
}

export class InsiderTradingDownloader {
  private readonly client: HttpClient;
  private readonly baseUrl: string;
  private readonly requestDelayMs: number;
  private readonly maxRetries: number;

  constructor(private readonly options: DownloaderOptions) {
    this.baseUrl = (options.baseUrl ?? 'https://api.quiverquant.com').replace(/\/+$/, '');
    this.client = options.client ?? axios.create({ timeout: 30000 });
    this.requestDelayMs = options.requestDelayMs ?? 1000;
    this.maxRetries = options.maxRetries ?? 5;
  }

  private delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
  }

  private isRetryable(error: unknown): boolean {
    if (!axios.isAxiosError(error)) return false;
    const status = error.response?.status;
    return status === undefined || status === 429 || status >= 500;
  }

  async fetchFilings(date: Date): Promise<ProviderFiling[]> {
    const url = `${this.baseUrl}/beta/live/insiders`;

    for (let attempt = 1; ; attempt++) {
      try {
        const response = await this.client.get<unknown>(url, {
          params: { date: formatEightCharacter(date) },
          headers: {
            Accept: 'application/json',
            Authorization: `Bearer ${this.options.apiKey}`,
          },
        });

        const parsed = providerResponseSchema.safeParse(response.data);
        if (!parsed.success) {
          throw new Error(`Unexpected insider filings payload: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
        }
        return parsed.data;
      } catch (error) {
        if (attempt > this.maxRetries || !this.isRetryable(error)) {
          throw error;
        }
        log(`Request for ${formatEightCharacter(date)} failed (attempt ${attempt}), retrying`);
        await this.delay(this.requestDelayMs);
      }
    }
  }

  mapFiling(filing: ProviderFiling): MappedFiling | null {
    const filingDate = parseProviderDate(filing.fileDate);
    if (!filingDate) {
      logError(`Skipping ${filing.Ticker}: invalid filing date "${filing.fileDate}"`);
      return null;
    }

    // Commas would shift every column after the name
    const name = filing.Name.replace(/[,\r\n]/g, ' ').replace(/\s+/g, ' ').trim();
    const direction = ORDER_DIRECTION_CODES[mapDirection(filing.AcquiredDisposedCode)];

    return {
      rawTicker: filing.Ticker,
      filingDate,
      columns: [
        formatEightCharacter(filingDate),
        name,
        direction,
        formatDecimal(filing.Shares),
        formatDecimal(filing.PricePerShare),
        formatDecimal(filing.SharesOwnedFollowing),
      ].join(','),
    };
  }

  /**
   * Resolves a raw ticker against the symbol database. When the ticker is
   * unknown as given, it is normalized as a defunct ticker and each of the
   * resulting tickers is tried instead.
   */
  async resolveTickers(rawTicker: string, date: Date): Promise<ResolvedTicker[]> {
    const direct = rawTicker.trim().toUpperCase();
    if (direct) {
      const securityId = await this.options.symbolDatabase.resolve(direct, date);
      if (securityId) return [{ ticker: direct, securityId }];
    }

    const { success, tickers } = tryNormalizeDefunctTicker(rawTicker);
    if (!success) return [];

    const resolved: ResolvedTicker[] = [];
    for (const ticker of tickers) {
      const securityId = await this.options.symbolDatabase.resolve(ticker, date);
      if (securityId) {
        resolved.push({ ticker, securityId });
      }
    }
    return resolved;
  }

  private async readLines(path: string): Promise<string[]> {
    if (!existsSync(path)) return [];
    const content = await readFile(path, 'utf-8');
    return content.split(/\r?\n/);
  }

  private async writeLines(path: string, lines: string[]): Promise<void> {
    await writeFile(path, lines.join('\n') + '\n', 'utf-8');
  }

  /**
   * Downloads the filings filed on `processDate` and writes them out.
   * They become visible the following day, which is both the time column
   * of the per-symbol lines and the date of the universe file.
   */
  async run(processDate: Date): Promise<DownloadSummary> {
    const filingDay = toDateOnly(processDate);
    const visibleDay = addDays(filingDay, 1);
    const folder = this.options.destinationFolder;

    log(`Fetching insider filings for ${formatEightCharacter(filingDay)}`);
    const filings = await this.fetchFilings(filingDay);
    log(`Received ${filings.length} filings`);

    const symbolLines = new Map<string, string[]>();
    const universeLines: string[] = [];
    let skipped = 0;

    for (const filing of filings) {
      const mapped = this.mapFiling(filing);
      if (!mapped) {
        skipped++;
        continue;
      }
      if (mapped.filingDate.getTime() > filingDay.getTime()) {
        log(`Skipping ${filing.Ticker}: filed ${formatEightCharacter(mapped.filingDate)}, after the process date`);
        skipped++;
        continue;
      }

      const resolved = await this.resolveTickers(mapped.rawTicker, mapped.filingDate);
      if (resolved.length === 0) {
        log(`Unable to resolve ticker "${mapped.rawTicker}", skipping filing`);
        skipped++;
        continue;
      }

      for (const { ticker, securityId } of resolved) {
        const lines = symbolLines.get(ticker) ?? [];
        lines.push(`${formatEightCharacter(visibleDay)},${mapped.columns}`);
        symbolLines.set(ticker, lines);
        universeLines.push(`${securityId},${ticker},${mapped.columns}`);
      }
    }

    await mkdir(getDatasetFolder(folder), { recursive: true });
    await mkdir(getUniverseFolder(folder), { recursive: true });

    let written = 0;
    for (const [ticker, lines] of symbolLines) {
      const path = getInsiderTradingPath(folder, ticker);
      await this.writeLines(path, mergeLines(await this.readLines(path), lines));
      written += lines.length;
    }

    if (universeLines.length > 0) {
      const path = getInsiderTradingUniversePath(folder, visibleDay);
      await this.writeLines(path, mergeLines(await this.readLines(path), universeLines));
    }

    log(`Wrote ${written} lines for ${symbolLines.size} symbols, skipped ${skipped} filings`);

    return { filings: filings.length, written, skipped, symbols: symbolLines.size };
  }
}
