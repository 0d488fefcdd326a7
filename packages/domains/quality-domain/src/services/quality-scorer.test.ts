import { describe, expect, it } from 'vitest';
import type { ContactLike } from './contact-classifier.js';
import {
  categorizeScore,
  explainScore,
  FLAT_WEIGHTS,
  hasSeat,
  type PassengerLike,
  scoreBooking,
  scoreBookingFlat,
  scoreBucketIndex,
  scorePnr,
  scoreRecord,
  scoreRecordsBulk,
  type ScoringTables,
} from './quality-scorer.js';

function passenger(overrides: Partial<PassengerLike> = {}): PassengerLike {
  return { ffNumber: '', meal: '', seatRowNumber: '', seatColumn: '', ...overrides };
}

describe('scorePnr', () => {
  it('scores the extremes', () => {
    expect(scorePnr(true, true, true, true)).toBe(100);
    expect(scorePnr(false, false, false, false)).toBe(0);
  });

  it('sums the weights of every combination of signals', () => {
    for (let mask = 0; mask < 16; mask++) {
      const flags = [0, 1, 2, 3].map((bit) => (mask & (1 << bit)) !== 0);
      const [contact, ff, meal, seat] = flags;
      const expected = (contact ? 40 : 0) + (ff ? 20 : 0) + (meal ? 20 : 0) + (seat ? 20 : 0);
      const score = scorePnr(contact, ff, meal, seat);
      expect(score).toBe(expected);
      expect(score).toBeGreaterThanOrEqual(0);
      expect(score).toBeLessThanOrEqual(100);
    }
  });
});

describe('hasSeat', () => {
  it('needs both row and column', () => {
    expect(hasSeat('12', '')).toBe(false);
    expect(hasSeat('', 'A')).toBe(false);
    expect(hasSeat(' ', 'A')).toBe(false);
    expect(hasSeat('12', 'A')).toBe(true);
  });
});

describe('scoreRecord', () => {
  it('scores a record from its contacts and passengers', () => {
    expect(
      scoreRecord({
        contacts: [{ contactType: 'APE', contactDetail: 'john@example.com' }],
        passengers: [passenger({ meal: 'VGML', seatRowNumber: '12' })],
      }),
    ).toBe(60);
  });

  it('ignores contacts that are present but unusable', () => {
    expect(
      scoreRecord({
        contacts: [{ contactType: 'CTCM', contactDetail: 'john@example.com' }],
        passengers: [],
      }),
    ).toBe(0);
  });
});

describe('explainScore', () => {
  it('lists the components that contributed', () => {
    expect(
      explainScore({
        contacts: [{ contactType: 'APM', contactDetail: '+254700000000' }],
        passengers: [passenger({ ffNumber: 'KQ123' })],
      }),
    ).toEqual({
      totalScore: 60,
      category: 'fair',
      signals: { hasValidContact: true, hasFrequentFlyer: true, hasMeal: false, hasSeat: false },
      components: { valid_contact: 40, frequent_flyer: 20 },
    });
  });
});

describe('scoreRecordsBulk', () => {
  const records: {
    id: string;
    contacts: ContactLike[];
    passengers: PassengerLike[];
  }[] = [
    {
      id: 'p1',
      contacts: [{ contactType: 'APE', contactDetail: 'a@b.com' }],
      passengers: [passenger({ ffNumber: 'KQ1', meal: 'VGML', seatRowNumber: '12', seatColumn: 'A' })],
    },
    {
      id: 'p2',
      contacts: [{ contactType: 'CTCM', contactDetail: 'a@b.com' }],
      passengers: [passenger({ seatRowNumber: '12' })],
    },
    {
      id: 'p3',
      contacts: [],
      passengers: [
        passenger({ meal: 'AVML' }),
        passenger({ ffNumber: 'X9', seatRowNumber: '3', seatColumn: 'C' }),
      ],
    },
    {
      id: 'p4',
      contacts: [
        { contactType: 'APM', contactDetail: '+254700000000' },
        { contactType: 'APE', contactDetail: 'bad' },
      ],
      passengers: [],
    },
    { id: 'p5', contacts: [], passengers: [] },
  ];

  const tables: ScoringTables = {
    pnrs: records.map(({ id }) => ({ id })),
    contacts: records.flatMap((r) => r.contacts.map((c) => ({ ...c, pnrId: r.id }))),
    passengers: records.flatMap((r) => r.passengers.map((p) => ({ ...p, pnrId: r.id }))),
  };

  it('scores every PNR from the flat tables', () => {
    expect(Object.fromEntries(scoreRecordsBulk(tables))).toEqual({
      p1: 100,
      p2: 0,
      p3: 60,
      p4: 40,
      p5: 0,
    });
  });

  it('agrees with the per-record path', () => {
    const bulk = scoreRecordsBulk(tables);
    for (const record of records) {
      expect(bulk.get(record.id)).toBe(scoreRecord(record));
    }
  });
});

describe('flat scoring', () => {
  it('awards 20 points per present field', () => {
    expect(scoreBookingFlat('0722000000', '', null, 'VGML', '12A')).toBe(60);
    expect(scoreBookingFlat('0722000000', 'a@b.com', 'KQ1', 'VGML', '12A')).toBe(100);
    expect(scoreBookingFlat(undefined, null, '', ' ', '')).toBe(0);
  });

  it('adds the weight of each present field', () => {
    expect(scoreBookingFlat('0722000000', null, null, null, null)).toBe(FLAT_WEIGHTS.phone);
    expect(scoreBookingFlat(null, 'a@b.com', null, null, null)).toBe(FLAT_WEIGHTS.email);
    expect(scoreBookingFlat(null, null, 'KQ1', null, null)).toBe(FLAT_WEIGHTS.frequent_flyer);
    expect(scoreBookingFlat(null, null, null, 'VGML', null)).toBe(FLAT_WEIGHTS.meal);
    expect(scoreBookingFlat(null, null, null, null, '12A')).toBe(FLAT_WEIGHTS.seat);
  });

  it('does not check validity', () => {
    expect(
      scoreBooking({ phone: 'x', email: 'not-an-email', ffNumber: null, mealSelection: null, seat: null }),
    ).toBe(40);
  });
});

describe('buckets', () => {
  it('puts 0 and 20 in the first bucket and 21 in the second', () => {
    expect(scoreBucketIndex(0)).toBe(0);
    expect(scoreBucketIndex(20)).toBe(0);
    expect(scoreBucketIndex(21)).toBe(1);
    expect(scoreBucketIndex(40)).toBe(1);
    expect(scoreBucketIndex(100)).toBe(4);
  });

  it('names categories by bucket', () => {
    expect(categorizeScore(0)).toBe('critical');
    expect(categorizeScore(40)).toBe('poor');
    expect(categorizeScore(60)).toBe('fair');
    expect(categorizeScore(80)).toBe('good');
    expect(categorizeScore(100)).toBe('excellent');
  });
});
