import { Low, Memory } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { dirname } from 'path';
import { mkdir } from 'fs/promises';
import { formatIsoDate } from '../utils/dates';

export interface SymbolEntry {
  ticker: string;
  securityId: string;
  /** First trading day under this ticker, yyyy-MM-dd */
  firstDate: string;
  /** Last trading day under this ticker; absent while still listed */
  lastDate?: string;
}

interface SymbolDatabaseSchema {
  symbols: SymbolEntry[];
  metadata: {
    lastUpdated: string;
    version: string;
  };
}

function defaultData(): SymbolDatabaseSchema {
  return {
    symbols: [],
    metadata: {
      lastUpdated: new Date().toISOString(),
      version: '1.0.0',
    },
  };
}

/**
 * Ticker to security identifier lookup used when writing universe files.
 * Stands in for the engine's map files: one entry per listing period.
 */
export class SymbolDatabase {
  private db: Low<SymbolDatabaseSchema> | null = null;

  constructor(private readonly dbPath: string) {}

  private get inMemory(): boolean {
    return this.dbPath === ':memory:';
  }

  async initialize(): Promise<void> {
    if (this.inMemory) {
      this.db = new Low<SymbolDatabaseSchema>(new Memory<SymbolDatabaseSchema>(), defaultData());
      return;
    }

    await mkdir(dirname(this.dbPath), { recursive: true });

    const adapter = new JSONFile<SymbolDatabaseSchema>(this.dbPath);
    this.db = new Low<SymbolDatabaseSchema>(adapter, defaultData());
    await this.db.read();

    if (!Array.isArray(this.db.data.symbols)) {
      this.db.data = defaultData();
      await this.db.write();
    }
  }

  async close(): Promise<void> {
    if (this.db && !this.inMemory) {
      await this.db.write();
    }
    this.db = null;
  }

  private data(): SymbolDatabaseSchema {
    if (!this.db) throw new Error('Symbol database not initialized');
    return this.db.data;
  }

  private async persist(): Promise<void> {
    if (!this.db) throw new Error('Symbol database not initialized');
    this.db.data.metadata.lastUpdated = new Date().toISOString();
    if (!this.inMemory) await this.db.write();
  }

  async upsertSymbol(entry: SymbolEntry): Promise<void> {
    const data = this.data();
    const ticker = entry.ticker.toUpperCase();
    const index = data.symbols.findIndex((s) => s.ticker === ticker && s.securityId === entry.securityId);

    const normalized: SymbolEntry = { ...entry, ticker };
    if (index >= 0) {
      data.symbols[index] = normalized;
    } else {
      data.symbols.push(normalized);
    }
    await this.persist();
  }

  async upsertSymbols(entries: SymbolEntry[]): Promise<void> {
    for (const entry of entries) {
      await this.upsertSymbol(entry);
    }
  }

  async getSymbols(): Promise<SymbolEntry[]> {
    return this.data().symbols.map((s) => ({ ...s }));
  }

  /**
   * Security identifier of the listing that traded as `ticker` on `date`,
   * or null when no listing matches.
   */
  async resolve(ticker: string, date: Date): Promise<string | null> {
    const day = formatIsoDate(date);
    const wanted = ticker.toUpperCase();

    // ISO dates compare correctly as strings
    const match = this.data().symbols.find(
      (s) => s.ticker === wanted && s.firstDate <= day && (s.lastDate === undefined || day <= s.lastDate)
    );
    return match ? match.securityId : null;
  }
}
