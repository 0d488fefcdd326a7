import { describe, expect, it } from 'vitest';
import {
  addDays,
  formatCreationDate,
  fromIsoDay,
  parseCreationDate,
  startOfUtcDay,
  toIsoDay,
} from './creation-date.js';

describe('parseCreationDate', () => {
  it('reads ddmmyy', () => {
    const date = parseCreationDate('010124');
    expect(date?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('pads five-digit values with a leading zero', () => {
    expect(parseCreationDate('10124')?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
    expect(parseCreationDate(10124)?.toISOString()).toBe('2024-01-01T00:00:00.000Z');
  });

  it('ignores separators', () => {
    expect(parseCreationDate('15/03/24')?.toISOString()).toBe('2024-03-15T00:00:00.000Z');
  });

  it('returns null for unreadable values', () => {
    expect(parseCreationDate('abc')).toBeNull();
    expect(parseCreationDate('')).toBeNull();
    expect(parseCreationDate(null)).toBeNull();
    expect(parseCreationDate('1234567')).toBeNull();
  });

  it('returns null for impossible calendar dates', () => {
    expect(parseCreationDate('320124')).toBeNull();
    expect(parseCreationDate('011324')).toBeNull();
    expect(parseCreationDate('290223')).toBeNull();
  });

  it('accepts leap days', () => {
    expect(parseCreationDate('290224')?.toISOString()).toBe('2024-02-29T00:00:00.000Z');
  });
});

describe('formatCreationDate', () => {
  it('writes the UTC day as ddmmyy', () => {
    expect(formatCreationDate(new Date('2024-03-05T23:30:00.000Z'))).toBe('050324');
    expect(parseCreationDate(formatCreationDate(new Date('2025-12-31T00:00:00.000Z')))?.toISOString()).toBe(
      '2025-12-31T00:00:00.000Z',
    );
  });
});

describe('day helpers', () => {
  it('round-trips ISO days', () => {
    expect(toIsoDay(fromIsoDay('2024-06-30'))).toBe('2024-06-30');
  });

  it('moves across month boundaries', () => {
    expect(toIsoDay(addDays(fromIsoDay('2024-03-01'), -1))).toBe('2024-02-29');
  });

  it('truncates to UTC midnight', () => {
    expect(startOfUtcDay(new Date('2024-05-10T23:59:59.999Z')).toISOString()).toBe(
      '2024-05-10T00:00:00.000Z',
    );
  });
});
