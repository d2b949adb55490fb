import { ORDER_DIRECTION_CODES } from '../types/insiderTrading';
import type {
  InsiderTradingRecord,
  InsiderTradingUniverseRecord,
  OrderDirection,
  SecuritySymbol,
} from '../types/insiderTrading';
import { createInsiderTrading, createInsiderTradingUniverse } from '../records/insiderTrading';
import { parseEightCharacterDate } from '../utils/dates';
import { InsiderTradingParseError } from './parseError';

const DELIMITER = ',';
const INSIDER_TRADING_COLUMNS = 7;
const UNIVERSE_COLUMNS = 8;

// Plain decimals only; hex, binary and octal literals are not quantities
const DECIMAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

const DIRECTIONS: OrderDirection[] = ['Buy', 'Sell', 'Hold'];

function splitLine(line: string, expected: number): string[] {
  const csv = line.split(DELIMITER);
  if (csv.length < expected) {
    throw new InsiderTradingParseError('line', line, `expected ${expected} columns, found ${csv.length}`);
  }
  return csv;
}

function parseDate(value: string, field: string, line: string): Date {
  const date = parseEightCharacterDate(value.trim());
  if (!date) {
    throw new InsiderTradingParseError(field, line, `"${value}" is not a YYYYMMDD date`);
  }
  return date;
}

// Empty means absent, anything else has to be a number
function parseOptionalDecimal(value: string, field: string, line: string): number | null {
  const trimmed = value.trim();
  if (trimmed === '') return null;

  const parsed = DECIMAL.test(trimmed) ? Number(trimmed) : NaN;
  if (!Number.isFinite(parsed)) {
    throw new InsiderTradingParseError(field, line, `"${value}" is not a number`);
  }
  // -0 would not survive JSON
  return parsed === 0 ? 0 : parsed;
}

export function parseOrderDirection(value: string, line: string = value): OrderDirection {
  const trimmed = value.trim();

  if (/^\d+$/.test(trimmed)) {
    const code = parseInt(trimmed, 10);
    const direction = DIRECTIONS.find((d) => ORDER_DIRECTION_CODES[d] === code);
    if (direction) return direction;
  } else {
    const direction = DIRECTIONS.find((d) => d.toLowerCase() === trimmed.toLowerCase());
    if (direction) return direction;
  }

  throw new InsiderTradingParseError('transaction', line, `unknown transaction code "${value}"`);
}

/**
 * Parses one line of a per-symbol file:
 * `date,filingDate,filerName,transactionCode,shares,pricePerShare,sharesOwnedFollowing`
 */
export function parseInsiderTradingLine(symbol: SecuritySymbol, line: string, _date?: Date): InsiderTradingRecord {
  const csv = splitLine(line, INSIDER_TRADING_COLUMNS);

  return createInsiderTrading({
    symbol,
    time: parseDate(csv[0], 'time', line),
    date: parseDate(csv[1], 'date', line),
    name: csv[2],
    transaction: parseOrderDirection(csv[3], line),
    shares: parseOptionalDecimal(csv[4], 'shares', line),
    pricePerShare: parseOptionalDecimal(csv[5], 'pricePerShare', line),
    sharesOwnedFollowing: parseOptionalDecimal(csv[6], 'sharesOwnedFollowing', line),
  });
}

/**
 * Parses one line of a universe file:
 * `securityId,ticker,filingDate,filerName,transactionCode,shares,pricePerShare,sharesOwnedFollowing`
 *
 * The record's time is the date of the universe file it was read from.
 */
export function parseInsiderTradingUniverseLine(line: string, date: Date): InsiderTradingUniverseRecord {
  const csv = splitLine(line, UNIVERSE_COLUMNS);

  const securityId = csv[0].trim();
  const ticker = csv[1].trim();
  if (!securityId) {
    throw new InsiderTradingParseError('securityId', line, 'empty security identifier');
  }
  if (!ticker) {
    throw new InsiderTradingParseError('ticker', line, 'empty ticker');
  }

  return createInsiderTradingUniverse({
    symbol: { value: ticker, id: securityId },
    time: date,
    date: parseDate(csv[2], 'date', line),
    name: csv[3],
    transaction: parseOrderDirection(csv[4], line),
    shares: parseOptionalDecimal(csv[5], 'shares', line),
    pricePerShare: parseOptionalDecimal(csv[6], 'pricePerShare', line),
    sharesOwnedFollowing: parseOptionalDecimal(csv[7], 'sharesOwnedFollowing', line),
  });
}

function contentLines(content: string): string[] {
  return content.split(/\r?\n/).filter((line) => line.trim().length > 0);
}

export function parseInsiderTradingFile(symbol: SecuritySymbol, content: string): InsiderTradingRecord[] {
  return contentLines(content).map((line) => parseInsiderTradingLine(symbol, line));
}

export function parseInsiderTradingUniverseFile(content: string, date: Date): InsiderTradingUniverseRecord[] {
  return contentLines(content).map((line) => parseInsiderTradingUniverseLine(line, date));
}
