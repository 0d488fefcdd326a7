import { z } from 'zod';
import { BucketBySchema, GroupBySchema } from '../services/record-aggregator.js';
import { RecordFilterInputSchema } from '../services/record-filter.js';

export const SummarizeQualityQuerySchema = z.object({
  filter: RecordFilterInputSchema.default({}),
  groupBy: GroupBySchema.default('none'),
  bucketBy: BucketBySchema.default('none'),
  days: z.number().int().min(1).max(366).default(30),
});

export type SummarizeQualityQuery = z.input<typeof SummarizeQualityQuerySchema>;
export type ParsedSummarizeQualityQuery = z.output<typeof SummarizeQualityQuerySchema>;

export function summarizeQualityQuery(input: SummarizeQualityQuery): ParsedSummarizeQualityQuery {
  return SummarizeQualityQuerySchema.parse(input);
}
