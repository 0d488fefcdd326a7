import { PgDialect } from 'drizzle-orm/pg-core';
import { describe, expect, it } from 'vitest';
import { makeRecord } from '../tests/records.js';
import {
  buildDrizzleWhere,
  buildRecordFilter,
  evaluateFilter,
  MATCH_ALL,
  type RecordFilter,
  RecordFilterSchema,
} from './record-filter.js';

const record = makeRecord({
  controlNumber: 'ABC123',
  officeId: 'NBOKQ08AA',
  deliverySystemCompany: '1A',
  creationDate: new Date('2024-01-15T00:00:00.000Z'),
});

describe('buildRecordFilter', () => {
  it('composes date range, offices and delivery systems', () => {
    expect(
      buildRecordFilter({
        startDate: '2024-01-01',
        endDate: '2024-01-31',
        offices: ['NBOKQ08AA'],
      }),
    ).toEqual({
      kind: 'and',
      filters: [
        { kind: 'field', field: 'creationDate', operator: 'gte', value: '2024-01-01' },
        { kind: 'field', field: 'creationDate', operator: 'lte', value: '2024-01-31' },
        { kind: 'field', field: 'officeId', operator: 'in', value: ['NBOKQ08AA'] },
      ],
    });
  });

  it('matches everything when nothing is selected', () => {
    expect(buildRecordFilter({})).toEqual(MATCH_ALL);
  });

  it('rejects malformed dates', () => {
    expect(() => buildRecordFilter({ startDate: '15/01/2024' })).toThrow();
  });
});

describe('evaluateFilter', () => {
  it('applies the dashboard filter', () => {
    const filter = buildRecordFilter({
      startDate: '2024-01-01',
      endDate: '2024-01-31',
      deliverySystems: ['1A', '1G'],
    });
    expect(evaluateFilter(record, filter)).toBe(true);
    expect(evaluateFilter({ ...record, deliverySystemCompany: '1S' }, filter)).toBe(false);
  });

  it('excludes undated records from a date range', () => {
    const filter = buildRecordFilter({ startDate: '2024-01-01' });
    expect(evaluateFilter({ ...record, creationDate: null }, filter)).toBe(false);
  });

  it('treats date bounds as inclusive days', () => {
    const filter = buildRecordFilter({ startDate: '2024-01-15', endDate: '2024-01-15' });
    expect(evaluateFilter(record, filter)).toBe(true);
  });

  it('combines or and not', () => {
    const filter: RecordFilter = {
      kind: 'or',
      filters: [
        { kind: 'field', field: 'officeId', operator: 'eq', value: 'MBAKQ' },
        {
          kind: 'not',
          filter: { kind: 'field', field: 'agent', operator: 'is_set' },
        },
      ],
    };
    expect(evaluateFilter(record, filter)).toBe(true);
    expect(evaluateFilter({ ...record, agent: 'JD' }, filter)).toBe(false);
  });

  it('matches nothing with an empty or', () => {
    expect(evaluateFilter(record, { kind: 'or', filters: [] })).toBe(false);
    expect(evaluateFilter(record, MATCH_ALL)).toBe(true);
  });
});

describe('RecordFilterSchema', () => {
  it('parses nested filters', () => {
    const input = {
      kind: 'not',
      filter: { kind: 'field', field: 'officeId', operator: 'in', value: ['A', 'B'] },
    };
    expect(RecordFilterSchema.parse(input)).toEqual(input);
  });

  it('rejects unknown fields', () => {
    expect(
      RecordFilterSchema.safeParse({ kind: 'field', field: 'surname', operator: 'eq', value: 'X' })
        .success,
    ).toBe(false);
  });
});

describe('buildDrizzleWhere', () => {
  const dialect = new PgDialect();

  it('returns undefined for a filter that matches everything', () => {
    expect(buildDrizzleWhere(MATCH_ALL)).toBeUndefined();
  });

  it('binds field values as parameters', () => {
    const where = buildDrizzleWhere({
      kind: 'field',
      field: 'officeId',
      operator: 'eq',
      value: 'NBOKQ08AA',
    });
    expect(where && dialect.sqlToQuery(where).params).toEqual(['NBOKQ08AA']);
  });

  it('renders an empty in-list as false', () => {
    const where = buildDrizzleWhere({ kind: 'field', field: 'officeId', operator: 'in', value: [] });
    expect(where && dialect.sqlToQuery(where)).toEqual({ sql: 'false', params: [] });
  });
});
