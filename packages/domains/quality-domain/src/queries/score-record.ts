import { z } from 'zod';
import { ControlNumberSchema } from '../entities/pnr.js';

export const ScoreRecordQuerySchema = z.object({
  controlNumber: ControlNumberSchema,
});

export type ScoreRecordQuery = z.infer<typeof ScoreRecordQuerySchema>;

export function scoreRecordQuery(input: ScoreRecordQuery): ScoreRecordQuery {
  return ScoreRecordQuerySchema.parse(input);
}
