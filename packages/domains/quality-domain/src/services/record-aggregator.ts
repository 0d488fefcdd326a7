import { z } from 'zod';
import {
  classifyContact,
  type ContactClassification,
  contactChannel,
  type ContactLike,
  isUsableContact,
} from './contact-classifier.js';
import { addDays, startOfUtcDay, toIsoDay } from './creation-date.js';
import {
  isFilled,
  passengerSignals,
  type ScorableRecord,
  SCORE_BUCKETS,
  scoreBucketIndex,
  type ScoreSignals,
  scoreSignals,
} from './quality-scorer.js';
import type { FilterableRecord } from './record-filter.js';

export const GroupBySchema = z.enum(['office', 'delivery_system', 'none']);
export type GroupBy = z.infer<typeof GroupBySchema>;

export const BucketBySchema = z.enum(['none', 'day']);
export type BucketBy = z.infer<typeof BucketBySchema>;

export interface AggregateOptions {
  groupBy?: GroupBy;
  bucketBy?: BucketBy;
  /** Number of calendar days in the time series, today included. */
  days?: number;
  now?: Date;
}

export interface ReportableRecord extends FilterableRecord, ScorableRecord {}

export interface EvaluatedContact {
  contact: ContactLike;
  classification: ContactClassification;
}

export interface RecordEvaluation {
  score: number;
  signals: ScoreSignals;
  contacts: EvaluatedContact[];
  wrongFormatContacts: EvaluatedContact[];
  wronglyPlacedContacts: EvaluatedContact[];
}

export interface DimensionGroup {
  key: string;
  count: number;
  averageScore: number;
}

export interface ScoreBucket {
  label: string;
  category: string;
  count: number;
}

export interface DailyBucket {
  date: string;
  count: number;
  averageScore: number;
}

export interface QualitySummary {
  totals: {
    total: number;
    reachable: number;
    unreachable: number;
    missingContact: number;
    wrongFormat: number;
    wronglyPlaced: number;
    withFrequentFlyer: number;
    withMeal: number;
    withSeat: number;
  };
  percentages: {
    reachable: number;
    missingContact: number;
    wrongFormat: number;
    wronglyPlaced: number;
    frequentFlyer: number;
    meal: number;
    seat: number;
  };
  contactFormats: {
    emailContacts: number;
    emailWrongFormat: number;
    emailWrongFormatPercentage: number;
    phoneContacts: number;
    phoneWrongFormat: number;
    phoneWrongFormatPercentage: number;
  };
  averageScore: number;
  groups: DimensionGroup[];
  distribution: ScoreBucket[];
  timeSeries: DailyBucket[];
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function roundOne(value: number): number {
  return Math.round(value * 10) / 10;
}

/** part / whole as a percentage in [0, 100]; 0 when whole is 0. */
export function percentage(part: number, whole: number): number {
  if (whole <= 0) return 0;
  return Math.min(100, Math.max(0, roundOne((part / whole) * 100)));
}

/** Mean rounded to one decimal; 0 for an empty set. */
export function average(sum: number, count: number): number {
  if (count <= 0) return 0;
  return roundOne(sum / count);
}

interface Tally {
  count: number;
  scoreSum: number;
}

export function evaluateRecord(record: ScorableRecord): RecordEvaluation {
  const contacts = record.contacts.map((contact) => ({
    contact,
    classification: classifyContact(contact.contactType, contact.contactDetail),
  }));

  const signals: ScoreSignals = {
    hasValidContact: contacts.some((c) => isUsableContact(c.classification)),
    ...passengerSignals(record.passengers),
  };

  return {
    score: scoreSignals(signals),
    signals,
    contacts,
    wrongFormatContacts: contacts.filter(
      (c) => isFilled(c.contact.contactDetail) && !isUsableContact(c.classification),
    ),
    wronglyPlacedContacts: contacts.filter((c) => c.classification.isWronglyPlaced),
  };
}

// ---------------------------------------------------------------------------
// Accumulator
// ---------------------------------------------------------------------------

/**
 * Single-pass summary over a stream of records. Feed records with
 * {@link RecordAggregator.add}; nothing is retained per record.
 */
export class RecordAggregator {
  private total = 0;
  private reachable = 0;
  private missingContact = 0;
  private wrongFormat = 0;
  private wronglyPlaced = 0;
  private withFrequentFlyer = 0;
  private withMeal = 0;
  private withSeat = 0;
  private scoreSum = 0;
  private emailContacts = 0;
  private emailWrongFormat = 0;
  private phoneContacts = 0;
  private phoneWrongFormat = 0;
  private readonly distribution = SCORE_BUCKETS.map(() => 0);
  private readonly groups = new Map<string, Tally>();
  private readonly days = new Map<string, Tally>();
  private readonly groupBy: GroupBy;

  constructor(options: AggregateOptions = {}) {
    this.groupBy = options.groupBy ?? 'none';

    if ((options.bucketBy ?? 'none') === 'day') {
      const dayCount = Math.max(1, Math.floor(options.days ?? 30));
      const today = startOfUtcDay(options.now ?? new Date());
      const first = addDays(today, -(dayCount - 1));
      for (let i = 0; i < dayCount; i++) {
        this.days.set(toIsoDay(addDays(first, i)), { count: 0, scoreSum: 0 });
      }
    }
  }

  add(record: ReportableRecord): RecordEvaluation {
    const evaluation = evaluateRecord(record);
    const { score, signals } = evaluation;

    this.total++;
    this.scoreSum += score;
    if (signals.hasValidContact) this.reachable++;
    if (record.contacts.length === 0) this.missingContact++;
    if (evaluation.wrongFormatContacts.length > 0) this.wrongFormat++;
    if (evaluation.wronglyPlacedContacts.length > 0) this.wronglyPlaced++;
    if (signals.hasFrequentFlyer) this.withFrequentFlyer++;
    if (signals.hasMeal) this.withMeal++;
    if (signals.hasSeat) this.withSeat++;
    this.distribution[scoreBucketIndex(score)]++;

    for (const { contact, classification } of evaluation.contacts) {
      const channel = contactChannel(contact.contactType);
      if (channel === 'email') {
        this.emailContacts++;
        if (!classification.isValidEmail) this.emailWrongFormat++;
      } else if (channel === 'phone') {
        this.phoneContacts++;
        if (!classification.isValidPhone) this.phoneWrongFormat++;
      }
    }

    const groupKey = this.groupKey(record);
    if (groupKey !== null) tally(this.groups, groupKey, score);

    if (record.creationDate) {
      const day = this.days.get(toIsoDay(record.creationDate));
      if (day) {
        day.count++;
        day.scoreSum += score;
      }
    }

    return evaluation;
  }

  summarize(): QualitySummary {
    const groups = [...this.groups.entries()]
      .map(([key, t]) => ({ key, count: t.count, averageScore: average(t.scoreSum, t.count) }))
      .sort((a, b) => b.count - a.count || (a.key < b.key ? -1 : a.key > b.key ? 1 : 0));

    return {
      totals: {
        total: this.total,
        reachable: this.reachable,
        unreachable: this.total - this.reachable,
        missingContact: this.missingContact,
        wrongFormat: this.wrongFormat,
        wronglyPlaced: this.wronglyPlaced,
        withFrequentFlyer: this.withFrequentFlyer,
        withMeal: this.withMeal,
        withSeat: this.withSeat,
      },
      percentages: {
        reachable: percentage(this.reachable, this.total),
        missingContact: percentage(this.missingContact, this.total),
        wrongFormat: percentage(this.wrongFormat, this.total),
        wronglyPlaced: percentage(this.wronglyPlaced, this.total),
        frequentFlyer: percentage(this.withFrequentFlyer, this.total),
        meal: percentage(this.withMeal, this.total),
        seat: percentage(this.withSeat, this.total),
      },
      contactFormats: {
        emailContacts: this.emailContacts,
        emailWrongFormat: this.emailWrongFormat,
        emailWrongFormatPercentage: percentage(this.emailWrongFormat, this.emailContacts),
        phoneContacts: this.phoneContacts,
        phoneWrongFormat: this.phoneWrongFormat,
        phoneWrongFormatPercentage: percentage(this.phoneWrongFormat, this.phoneContacts),
      },
      averageScore: average(this.scoreSum, this.total),
      groups,
      distribution: SCORE_BUCKETS.map((bucket, i) => ({
        label: bucket.label,
        category: bucket.category,
        count: this.distribution[i],
      })),
      timeSeries: [...this.days.entries()].map(([date, t]) => ({
        date,
        count: t.count,
        averageScore: average(t.scoreSum, t.count),
      })),
    };
  }

  private groupKey(record: ReportableRecord): string | null {
    switch (this.groupBy) {
      case 'office':
        return record.officeId;
      case 'delivery_system':
        return record.deliverySystemCompany;
      case 'none':
        return null;
    }
  }
}

function tally(map: Map<string, Tally>, key: string, score: number): void {
  const existing = map.get(key);
  if (existing) {
    existing.count++;
    existing.scoreSum += score;
  } else {
    map.set(key, { count: 1, scoreSum: score });
  }
}

export function aggregate(
  records: Iterable<ReportableRecord>,
  options: AggregateOptions = {},
): QualitySummary {
  const aggregator = new RecordAggregator(options);
  for (const record of records) aggregator.add(record);
  return aggregator.summarize();
}
