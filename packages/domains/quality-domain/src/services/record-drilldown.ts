import { z } from 'zod';
import type { ContactLike } from './contact-classifier.js';
import { type EvaluatedContact, evaluateRecord, type ReportableRecord } from './record-aggregator.js';

export const DetailMetricSchema = z.enum([
  'all',
  'reachable',
  'unreachable',
  'missing_contact',
  'wrong_format',
  'wrongly_placed',
  'missing_ff',
  'missing_meal',
  'missing_seat',
]);

export type DetailMetric = z.infer<typeof DetailMetricSchema>;

export interface DetailedRecordRow {
  controlNumber: string;
  officeId: string;
  deliverySystemCompany: string;
  agent: string;
  contactType: string;
  contactDetail: string;
}

function toRow(record: ReportableRecord, contact: ContactLike | null): DetailedRecordRow {
  return {
    controlNumber: record.controlNumber,
    officeId: record.officeId,
    deliverySystemCompany: record.deliverySystemCompany,
    agent: record.agent,
    contactType: contact?.contactType ?? '',
    contactDetail: contact?.contactDetail ?? '',
  };
}

/**
 * Contacts a matching record contributes to the listing, or null when the
 * record does not match. An empty array yields a single row without contact.
 */
function contactsForMetric(
  record: ReportableRecord,
  metric: DetailMetric,
): readonly ContactLike[] | null {
  const evaluation = evaluateRecord(record);
  const { signals } = evaluation;
  const pick = (list: EvaluatedContact[]) => list.map((c) => c.contact);

  switch (metric) {
    case 'all':
      return record.contacts;
    case 'reachable':
      return signals.hasValidContact ? record.contacts : null;
    case 'unreachable':
      return signals.hasValidContact ? null : record.contacts;
    case 'missing_contact':
      return record.contacts.length === 0 ? [] : null;
    case 'wrong_format':
      return evaluation.wrongFormatContacts.length > 0
        ? pick(evaluation.wrongFormatContacts)
        : null;
    case 'wrongly_placed':
      return evaluation.wronglyPlacedContacts.length > 0
        ? pick(evaluation.wronglyPlacedContacts)
        : null;
    case 'missing_ff':
      return signals.hasFrequentFlyer ? null : record.contacts;
    case 'missing_meal':
      return signals.hasMeal ? null : record.contacts;
    case 'missing_seat':
      return signals.hasSeat ? null : record.contacts;
  }
}

/**
 * Flat drill-down listing: one row per (record, contact) for records matching
 * the metric, and one contact-less row for a matching record with no contacts.
 */
export function selectDetailedRecords(
  records: Iterable<ReportableRecord>,
  metric: DetailMetric,
): DetailedRecordRow[] {
  const rows: DetailedRecordRow[] = [];
  for (const record of records) {
    const contacts = contactsForMetric(record, metric);
    if (contacts === null) continue;
    if (contacts.length === 0) {
      rows.push(toRow(record, null));
      continue;
    }
    for (const contact of contacts) rows.push(toRow(record, contact));
  }
  return rows;
}

function sortedDistinct(values: Iterable<string>): string[] {
  return [...new Set(values)].filter((v) => v !== '').sort();
}

export function listDeliverySystems(
  records: Iterable<Pick<ReportableRecord, 'deliverySystemCompany'>>,
): string[] {
  return sortedDistinct([...records].map((r) => r.deliverySystemCompany));
}

/** Offices, optionally limited to records from the given delivery systems. */
export function listOffices(
  records: Iterable<Pick<ReportableRecord, 'officeId' | 'deliverySystemCompany'>>,
  deliverySystems: readonly string[] = [],
): string[] {
  const allowed = new Set(deliverySystems);
  return sortedDistinct(
    [...records]
      .filter((r) => allowed.size === 0 || allowed.has(r.deliverySystemCompany))
      .map((r) => r.officeId),
  );
}
