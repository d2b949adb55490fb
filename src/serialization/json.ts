import { z } from 'zod';
import type { AnyInsiderTradingRecord } from '../types/insiderTrading';
import { createInsiderTrading, createInsiderTradingUniverse } from '../records/insiderTrading';
import { formatIsoDate } from '../utils/dates';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected yyyy-MM-dd')
  .transform((value, ctx) => {
    const date = new Date(`${value}T00:00:00.000Z`);
    if (Number.isNaN(date.getTime()) || formatIsoDate(date) !== value) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid date ${value}` });
      return z.NEVER;
    }
    return date;
  });

const isoDateTime = z
  .string()
  .datetime()
  .transform((value) => new Date(value));

const optionalDecimal = z.number().finite().nullable();

export const insiderTradingJsonSchema = z.object({
  Kind: z.enum(['insiderTrading', 'universe']),
  Symbol: z.object({
    Value: z.string(),
    ID: z.string(),
  }),
  Time: isoDateTime,
  EndTime: isoDateTime,
  Value: z.number().finite(),
  Name: z.string(),
  Shares: optionalDecimal,
  PricePerShare: optionalDecimal,
  SharesOwnedFollowing: optionalDecimal,
  Transaction: z.enum(['Buy', 'Sell', 'Hold']),
  Date: isoDate,
});

export type InsiderTradingJson = z.input<typeof insiderTradingJsonSchema>;

export function toJsonObject(record: AnyInsiderTradingRecord): InsiderTradingJson {
  return {
    Kind: record.kind,
    Symbol: { Value: record.symbol.value, ID: record.symbol.id },
    Time: record.time.toISOString(),
    EndTime: record.endTime.toISOString(),
    Value: record.value,
    Name: record.name,
    Shares: record.shares,
    PricePerShare: record.pricePerShare,
    SharesOwnedFollowing: record.sharesOwnedFollowing,
    Transaction: record.transaction,
    Date: formatIsoDate(record.date),
  };
}

export function serializeRecord(record: AnyInsiderTradingRecord): string {
  return JSON.stringify(toJsonObject(record));
}

export function fromJsonObject(json: unknown): AnyInsiderTradingRecord {
  const result = insiderTradingJsonSchema.safeParse(json);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    throw new Error(`Invalid insider trading document: ${issues}`);
  }

  const doc = result.data;
  const input = {
    symbol: { value: doc.Symbol.Value, id: doc.Symbol.ID },
    time: doc.Time,
    date: doc.Date,
    name: doc.Name,
    transaction: doc.Transaction,
    shares: doc.Shares,
    pricePerShare: doc.PricePerShare,
    sharesOwnedFollowing: doc.SharesOwnedFollowing,
  };

  // EndTime and Value are derived; the document's copies are informational
  return doc.Kind === 'universe' ? createInsiderTradingUniverse(input) : createInsiderTrading(input);
}

export function deserializeRecord(json: string): AnyInsiderTradingRecord {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new Error(`Invalid insider trading document: ${error instanceof Error ? error.message : String(error)}`);
  }
  return fromJsonObject(parsed);
}
