import { describe, it, expect } from 'vitest';
import { addDays, formatEightCharacter, formatIsoDate, parseEightCharacterDate, toDateOnly } from '../../src/utils/dates';

describe('Date helpers', () => {
  it('should parse YYYYMMDD as UTC midnight', () => {
    expect(parseEightCharacterDate('20240229')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });

  it('should keep two-digit years as written', () => {
    const date = parseEightCharacterDate('00500101');

    expect(date?.toISOString()).toBe('0050-01-01T00:00:00.000Z');
    expect(date && formatEightCharacter(date)).toBe('00500101');
    expect(date && formatIsoDate(date)).toBe('0050-01-01');
  });

  it('should reject non-dates', () => {
    expect(parseEightCharacterDate('20230229')).toBeNull();
    expect(parseEightCharacterDate('2023131')).toBeNull();
    expect(parseEightCharacterDate('20231301')).toBeNull();
    expect(parseEightCharacterDate('')).toBeNull();
  });

  it('should format dates in both layouts', () => {
    const date = new Date(Date.UTC(2022, 0, 5));
    expect(formatEightCharacter(date)).toBe('20220105');
    expect(formatIsoDate(date)).toBe('2022-01-05');
  });

  it('should add whole days and truncate times', () => {
    expect(addDays(new Date(Date.UTC(2022, 1, 28)), 1).toISOString()).toBe('2022-03-01T00:00:00.000Z');
    expect(toDateOnly(new Date(Date.UTC(2022, 1, 28, 17, 30))).toISOString()).toBe('2022-02-28T00:00:00.000Z');
  });
});
