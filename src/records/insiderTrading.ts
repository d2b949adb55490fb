import type {
  AnyInsiderTradingRecord,
  InsiderTradingRecord,
  InsiderTradingUniverseRecord,
  OrderDirection,
  SecuritySymbol,
} from '../types/insiderTrading';
import { addDays, formatEightCharacter } from '../utils/dates';

// Each record covers a single day
const PERIOD_DAYS = 1;

export interface InsiderTradingInput {
  symbol: SecuritySymbol;
  time: Date;
  date: Date;
  name: string;
  transaction?: OrderDirection;
  shares?: number | null;
  pricePerShare?: number | null;
  sharesOwnedFollowing?: number | null;
}

// -0 becomes 0; JSON cannot carry it
function quantity(value: number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  return value === 0 ? 0 : value;
}

function buildFields(input: InsiderTradingInput) {
  const pricePerShare = quantity(input.pricePerShare);
  return {
    symbol: { ...input.symbol },
    time: new Date(input.time.getTime()),
    endTime: addDays(input.time, PERIOD_DAYS),
    value: pricePerShare ?? 0,
    date: new Date(input.date.getTime()),
    name: input.name,
    transaction: input.transaction ?? 'Hold',
    shares: quantity(input.shares),
    pricePerShare,
    sharesOwnedFollowing: quantity(input.sharesOwnedFollowing),
  };
}

export function createInsiderTrading(input: InsiderTradingInput): InsiderTradingRecord {
  return Object.freeze({ kind: 'insiderTrading' as const, ...buildFields(input) });
}

export function createInsiderTradingUniverse(input: InsiderTradingInput): InsiderTradingUniverseRecord {
  return Object.freeze({ kind: 'universe' as const, ...buildFields(input) });
}

/**
 * Copies every field into a new record of the same kind. The symbol and
 * dates are copied too, so nothing is shared with the original.
 */
export function cloneRecord<T extends AnyInsiderTradingRecord>(record: T): T;
export function cloneRecord(record: AnyInsiderTradingRecord): AnyInsiderTradingRecord {
  const input: InsiderTradingInput = {
    symbol: record.symbol,
    time: record.time,
    date: record.date,
    name: record.name,
    transaction: record.transaction,
    shares: record.shares,
    pricePerShare: record.pricePerShare,
    sharesOwnedFollowing: record.sharesOwnedFollowing,
  };
  return record.kind === 'universe' ? createInsiderTradingUniverse(input) : createInsiderTrading(input);
}

function formatNumber(value: number | null): string {
  return value === null ? '' : String(value);
}

export function formatInsiderTrading(record: AnyInsiderTradingRecord): string {
  return [
    record.symbol.value,
    formatEightCharacter(record.date),
    record.name,
    formatNumber(record.shares),
    formatNumber(record.pricePerShare),
    formatNumber(record.sharesOwnedFollowing),
    record.transaction,
  ].join(' - ');
}

export function formatInsiderTradingUniverse(record: AnyInsiderTradingRecord): string {
  return (
    `${record.symbol.value}(${record.time.toISOString()}) :: ` +
    `Date: ${formatEightCharacter(record.date)} ` +
    `Name: ${record.name} ` +
    `Shares: ${formatNumber(record.shares)} ` +
    `PricePerShare: ${formatNumber(record.pricePerShare)} ` +
    `SharesOwnedFollowing: ${formatNumber(record.sharesOwnedFollowing)} ` +
    `Transaction: ${record.transaction}`
  );
}

export function formatRecord(record: AnyInsiderTradingRecord): string {
  return record.kind === 'universe' ? formatInsiderTradingUniverse(record) : formatInsiderTrading(record);
}
