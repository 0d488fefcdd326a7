import { z } from 'zod';
import { DetailMetricSchema } from '../services/record-drilldown.js';
import { RecordFilterInputSchema } from '../services/record-filter.js';

export const ListDetailedRecordsQuerySchema = z.object({
  filter: RecordFilterInputSchema.default({}),
  metric: DetailMetricSchema.default('all'),
  limit: z.number().int().min(1).max(10_000).default(1000),
});

export type ListDetailedRecordsQuery = z.input<typeof ListDetailedRecordsQuerySchema>;
export type ParsedListDetailedRecordsQuery = z.output<typeof ListDetailedRecordsQuerySchema>;

export function listDetailedRecordsQuery(
  input: ListDetailedRecordsQuery,
): ParsedListDetailedRecordsQuery {
  return ListDetailedRecordsQuerySchema.parse(input);
}
