import {
  classifyContact,
  type ContactLike,
  isUsableContact,
} from './contact-classifier.js';

// ---------------------------------------------------------------------------
// Weights
// ---------------------------------------------------------------------------

/** Weighted mode: PNR with separate contacts and passengers. */
export const QUALITY_WEIGHTS = {
  valid_contact: 40,
  frequent_flyer: 20,
  meal: 20,
  seat: 20,
} as const;

/** Flat mode: legacy single-row booking, presence only. */
export const FLAT_WEIGHTS = {
  phone: 20,
  email: 20,
  frequent_flyer: 20,
  meal: 20,
  seat: 20,
} as const;

export type QualityFactor = keyof typeof QUALITY_WEIGHTS;

export const MIN_SCORE = 0;
export const MAX_SCORE = 100;

export function clampScore(score: number): number {
  return Math.min(MAX_SCORE, Math.max(MIN_SCORE, score));
}

export function isFilled(value: string | null | undefined): boolean {
  return value != null && value.trim() !== '';
}

export function hasSeat(
  seatRowNumber: string | null | undefined,
  seatColumn: string | null | undefined,
): boolean {
  return isFilled(seatRowNumber) && isFilled(seatColumn);
}

// ---------------------------------------------------------------------------
// Weighted score
// ---------------------------------------------------------------------------

export interface PassengerLike {
  ffNumber: string | null;
  meal: string | null;
  seatRowNumber: string | null;
  seatColumn: string | null;
}

export interface ScorableRecord {
  contacts: readonly ContactLike[];
  passengers: readonly PassengerLike[];
}

export interface ScoreSignals {
  hasValidContact: boolean;
  hasFrequentFlyer: boolean;
  hasMeal: boolean;
  hasSeat: boolean;
}

export function scorePnr(
  hasValidContact: boolean,
  hasFrequentFlyer: boolean,
  hasMeal: boolean,
  hasSeatAssigned: boolean,
): number {
  let total = 0;
  if (hasValidContact) total += QUALITY_WEIGHTS.valid_contact;
  if (hasFrequentFlyer) total += QUALITY_WEIGHTS.frequent_flyer;
  if (hasMeal) total += QUALITY_WEIGHTS.meal;
  if (hasSeatAssigned) total += QUALITY_WEIGHTS.seat;
  return clampScore(total);
}

export function scoreSignals(signals: ScoreSignals): number {
  return scorePnr(
    signals.hasValidContact,
    signals.hasFrequentFlyer,
    signals.hasMeal,
    signals.hasSeat,
  );
}

export function isValidContact(contact: ContactLike): boolean {
  return isUsableContact(
    classifyContact(contact.contactType, contact.contactDetail),
  );
}

export function passengerSignals(
  passengers: readonly PassengerLike[],
): Omit<ScoreSignals, 'hasValidContact'> {
  return {
    hasFrequentFlyer: passengers.some((p) => isFilled(p.ffNumber)),
    hasMeal: passengers.some((p) => isFilled(p.meal)),
    hasSeat: passengers.some((p) => hasSeat(p.seatRowNumber, p.seatColumn)),
  };
}

export function signalsForRecord(record: ScorableRecord): ScoreSignals {
  return {
    hasValidContact: record.contacts.some(isValidContact),
    ...passengerSignals(record.passengers),
  };
}

export interface QualityScoreBreakdown {
  totalScore: number;
  category: QualityCategory;
  signals: ScoreSignals;
  components: Partial<Record<QualityFactor, number>>;
}

/** Per-record path: one PNR with its related contacts and passengers. */
export function scoreRecord(record: ScorableRecord): number {
  return scoreSignals(signalsForRecord(record));
}

export function explainScore(record: ScorableRecord): QualityScoreBreakdown {
  const signals = signalsForRecord(record);
  const components: Partial<Record<QualityFactor, number>> = {};
  if (signals.hasValidContact) components.valid_contact = QUALITY_WEIGHTS.valid_contact;
  if (signals.hasFrequentFlyer) components.frequent_flyer = QUALITY_WEIGHTS.frequent_flyer;
  if (signals.hasMeal) components.meal = QUALITY_WEIGHTS.meal;
  if (signals.hasSeat) components.seat = QUALITY_WEIGHTS.seat;

  const totalScore = scoreSignals(signals);
  return {
    totalScore,
    category: categorizeScore(totalScore),
    signals,
    components,
  };
}

// ---------------------------------------------------------------------------
// Set-based path
// ---------------------------------------------------------------------------

export interface ScoringTables {
  pnrs: readonly { id: string }[];
  contacts: readonly (ContactLike & { pnrId: string })[];
  passengers: readonly (PassengerLike & { pnrId: string })[];
}

/**
 * Set-based path: scores every PNR in the tables at once. Each signal is an
 * existence set over the child rows, keyed by PNR id, so a PNR scores the
 * same here as through {@link scoreRecord}.
 */
export function scoreRecordsBulk(tables: ScoringTables): Map<string, number> {
  const withValidContact = new Set<string>();
  for (const contact of tables.contacts) {
    if (isValidContact(contact)) withValidContact.add(contact.pnrId);
  }

  const withFrequentFlyer = new Set<string>();
  const withMeal = new Set<string>();
  const withSeat = new Set<string>();
  for (const passenger of tables.passengers) {
    if (isFilled(passenger.ffNumber)) withFrequentFlyer.add(passenger.pnrId);
    if (isFilled(passenger.meal)) withMeal.add(passenger.pnrId);
    if (hasSeat(passenger.seatRowNumber, passenger.seatColumn)) {
      withSeat.add(passenger.pnrId);
    }
  }

  const scores = new Map<string, number>();
  for (const pnr of tables.pnrs) {
    scores.set(
      pnr.id,
      scorePnr(
        withValidContact.has(pnr.id),
        withFrequentFlyer.has(pnr.id),
        withMeal.has(pnr.id),
        withSeat.has(pnr.id),
      ),
    );
  }
  return scores;
}

// ---------------------------------------------------------------------------
// Flat (legacy booking) score
// ---------------------------------------------------------------------------

export interface FlatBooking {
  phone: string | null;
  email: string | null;
  ffNumber: string | null;
  mealSelection: string | null;
  seat: string | null;
}

export function scoreBookingFlat(
  phone: string | null | undefined,
  email: string | null | undefined,
  ffNumber: string | null | undefined,
  meal: string | null | undefined,
  seat: string | null | undefined,
): number {
  const fields: [keyof typeof FLAT_WEIGHTS, string | null | undefined][] = [
    ['phone', phone],
    ['email', email],
    ['frequent_flyer', ffNumber],
    ['meal', meal],
    ['seat', seat],
  ];
  let score = 0;
  for (const [field, value] of fields) {
    if (isFilled(value)) score += FLAT_WEIGHTS[field];
  }
  return clampScore(score);
}

export function scoreBooking(booking: FlatBooking): number {
  return scoreBookingFlat(
    booking.phone,
    booking.email,
    booking.ffNumber,
    booking.mealSelection,
    booking.seat,
  );
}

// ---------------------------------------------------------------------------
// Buckets & categories
// ---------------------------------------------------------------------------

export type QualityCategory = 'critical' | 'poor' | 'fair' | 'good' | 'excellent';

export const SCORE_BUCKETS: readonly {
  label: string;
  min: number;
  max: number;
  category: QualityCategory;
}[] = [
  { label: '(0,20]', min: 0, max: 20, category: 'critical' },
  { label: '(20,40]', min: 20, max: 40, category: 'poor' },
  { label: '(40,60]', min: 40, max: 60, category: 'fair' },
  { label: '(60,80]', min: 60, max: 80, category: 'good' },
  { label: '(80,100]', min: 80, max: 100, category: 'excellent' },
];

/** Index into {@link SCORE_BUCKETS}; 0 and anything up to 20 land in the first bucket. */
export function scoreBucketIndex(score: number): number {
  const clamped = clampScore(score);
  if (clamped <= SCORE_BUCKETS[0].max) return 0;
  return Math.min(SCORE_BUCKETS.length - 1, Math.ceil(clamped / 20) - 1);
}

export function categorizeScore(score: number): QualityCategory {
  return SCORE_BUCKETS[scoreBucketIndex(score)].category;
}
