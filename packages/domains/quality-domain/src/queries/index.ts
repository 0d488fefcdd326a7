export {
  type SummarizeQualityQuery,
  type ParsedSummarizeQualityQuery,
  SummarizeQualityQuerySchema,
  summarizeQualityQuery,
} from './summarize-quality.js';
export {
  type ListDetailedRecordsQuery,
  type ParsedListDetailedRecordsQuery,
  ListDetailedRecordsQuerySchema,
  listDetailedRecordsQuery,
} from './list-detailed-records.js';
export { type ScoreRecordQuery, ScoreRecordQuerySchema, scoreRecordQuery } from './score-record.js';
export { type ListDimensionsQuery, ListDimensionsQuerySchema, listDimensionsQuery } from './list-dimensions.js';
