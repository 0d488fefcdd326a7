import { z } from 'zod';
import type { Column } from 'drizzle-orm';
import { and, eq, gte, inArray, isNotNull, isNull, lte, ne, not, or, sql, type SQL } from 'drizzle-orm';
import { pnrs } from '../../drizzle/schema.js';
import { toIsoDay } from './creation-date.js';

// ---------------------------------------------------------------------------
// Filter types
// ---------------------------------------------------------------------------

export const RecordFieldSchema = z.enum([
  'controlNumber',
  'officeId',
  'agent',
  'deliverySystemCompany',
  'deliverySystemLocation',
  'creationDate',
]);

export type RecordField = z.infer<typeof RecordFieldSchema>;

export const FieldOperatorSchema = z.enum([
  'eq',
  'in',
  'gte',
  'lte',
  'is_set',
  'is_not_set',
]);

export type FieldOperator = z.infer<typeof FieldOperatorSchema>;

export type RecordFilter =
  | { kind: 'and'; filters: RecordFilter[] }
  | { kind: 'or'; filters: RecordFilter[] }
  | { kind: 'not'; filter: RecordFilter }
  | {
      kind: 'field';
      field: RecordField;
      operator: FieldOperator;
      value?: string | string[];
    };

export const RecordFilterSchema: z.ZodType<RecordFilter> = z.lazy(() =>
  z.discriminatedUnion('kind', [
    z.object({ kind: z.literal('and'), filters: z.array(RecordFilterSchema) }),
    z.object({ kind: z.literal('or'), filters: z.array(RecordFilterSchema) }),
    z.object({ kind: z.literal('not'), filter: RecordFilterSchema }),
    z.object({
      kind: z.literal('field'),
      field: RecordFieldSchema,
      operator: FieldOperatorSchema,
      value: z.union([z.string(), z.array(z.string())]).optional(),
    }),
  ]),
);

export const MATCH_ALL: RecordFilter = { kind: 'and', filters: [] };

export interface FilterableRecord {
  controlNumber: string;
  officeId: string;
  agent: string;
  deliverySystemCompany: string;
  deliverySystemLocation: string;
  creationDate: Date | null;
}

// ---------------------------------------------------------------------------
// Dashboard filter
// ---------------------------------------------------------------------------

export const RecordFilterInputSchema = z.object({
  startDate: z.string().date().optional(),
  endDate: z.string().date().optional(),
  offices: z.array(z.string()).default([]),
  deliverySystems: z.array(z.string()).default([]),
});

export type RecordFilterInput = z.input<typeof RecordFilterInputSchema>;

/**
 * Composes the date range / office / delivery-system selection into one
 * filter. Empty selections mean "all".
 */
export function buildRecordFilter(input: RecordFilterInput): RecordFilter {
  const parsed = RecordFilterInputSchema.parse(input);
  const filters: RecordFilter[] = [];

  if (parsed.startDate) {
    filters.push({ kind: 'field', field: 'creationDate', operator: 'gte', value: parsed.startDate });
  }
  if (parsed.endDate) {
    filters.push({ kind: 'field', field: 'creationDate', operator: 'lte', value: parsed.endDate });
  }
  if (parsed.offices.length > 0) {
    filters.push({ kind: 'field', field: 'officeId', operator: 'in', value: parsed.offices });
  }
  if (parsed.deliverySystems.length > 0) {
    filters.push({
      kind: 'field',
      field: 'deliverySystemCompany',
      operator: 'in',
      value: parsed.deliverySystems,
    });
  }

  return { kind: 'and', filters };
}

// ---------------------------------------------------------------------------
// In-memory evaluation (pure domain logic)
// ---------------------------------------------------------------------------

function getFieldValue(record: FilterableRecord, field: RecordField): string | null {
  switch (field) {
    case 'controlNumber':
      return record.controlNumber;
    case 'officeId':
      return record.officeId;
    case 'agent':
      return record.agent;
    case 'deliverySystemCompany':
      return record.deliverySystemCompany;
    case 'deliverySystemLocation':
      return record.deliverySystemLocation;
    case 'creationDate':
      return record.creationDate ? toIsoDay(record.creationDate) : null;
  }
}

function evaluateField(
  record: FilterableRecord,
  condition: Extract<RecordFilter, { kind: 'field' }>,
): boolean {
  const fieldValue = getFieldValue(record, condition.field);
  const { value } = condition;

  switch (condition.operator) {
    case 'eq':
      return typeof value === 'string' && fieldValue === value;
    case 'in':
      return Array.isArray(value) && fieldValue !== null && value.includes(fieldValue);
    case 'gte':
      return typeof value === 'string' && fieldValue !== null && fieldValue >= value;
    case 'lte':
      return typeof value === 'string' && fieldValue !== null && fieldValue <= value;
    case 'is_set':
      return fieldValue !== null && fieldValue !== '';
    case 'is_not_set':
      return fieldValue === null || fieldValue === '';
  }
}

/**
 * Evaluate a filter against one record in memory. An empty `and` matches
 * everything; an empty `or` matches nothing.
 */
export function evaluateFilter(record: FilterableRecord, filter: RecordFilter): boolean {
  switch (filter.kind) {
    case 'and':
      return filter.filters.every((f) => evaluateFilter(record, f));
    case 'or':
      return filter.filters.some((f) => evaluateFilter(record, f));
    case 'not':
      return !evaluateFilter(record, filter.filter);
    case 'field':
      return evaluateField(record, filter);
  }
}

// ---------------------------------------------------------------------------
// Drizzle SQL builder
// ---------------------------------------------------------------------------

function getColumn(field: RecordField): Column {
  switch (field) {
    case 'controlNumber':
      return pnrs.control_number;
    case 'officeId':
      return pnrs.office_id;
    case 'agent':
      return pnrs.agent;
    case 'deliverySystemCompany':
      return pnrs.delivery_system_company;
    case 'deliverySystemLocation':
      return pnrs.delivery_system_location;
    case 'creationDate':
      return pnrs.creation_date;
  }
}

function buildFieldSQL(condition: Extract<RecordFilter, { kind: 'field' }>): SQL {
  const column = getColumn(condition.field);
  const { value } = condition;

  switch (condition.operator) {
    case 'eq':
      return typeof value === 'string' ? eq(column, value) : sql`false`;
    case 'in':
      return Array.isArray(value) && value.length > 0 ? inArray(column, value) : sql`false`;
    case 'gte':
      return typeof value === 'string' ? gte(column, value) : sql`false`;
    case 'lte':
      return typeof value === 'string' ? lte(column, value) : sql`false`;
    case 'is_set':
      return condition.field === 'creationDate'
        ? isNotNull(column)
        : ne(column, '');
    case 'is_not_set':
      return condition.field === 'creationDate' ? isNull(column) : eq(column, '');
  }
}

/**
 * Build a Drizzle `where` clause over the pnrs table. Returns undefined for a
 * filter that matches everything.
 */
export function buildDrizzleWhere(filter: RecordFilter): SQL | undefined {
  switch (filter.kind) {
    case 'and': {
      const parts = filter.filters
        .map((f) => buildDrizzleWhere(f))
        .filter((s): s is SQL => s !== undefined);
      return parts.length === 0 ? undefined : and(...parts);
    }
    case 'or': {
      if (filter.filters.length === 0) return sql`false`;
      const parts = filter.filters.map((f) => buildDrizzleWhere(f) ?? sql`true`);
      return or(...parts);
    }
    case 'not': {
      const inner = buildDrizzleWhere(filter.filter);
      return inner ? not(inner) : sql`false`;
    }
    case 'field':
      return buildFieldSQL(filter);
  }
}
