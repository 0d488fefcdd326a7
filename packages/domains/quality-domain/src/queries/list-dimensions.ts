import { z } from 'zod';

export const ListDimensionsQuerySchema = z.object({
  /** Restricts offices to these delivery systems; empty means all. */
  deliverySystems: z.array(z.string()).default([]),
});

export type ListDimensionsQuery = z.input<typeof ListDimensionsQuerySchema>;

export function listDimensionsQuery(input: ListDimensionsQuery): z.output<typeof ListDimensionsQuerySchema> {
  return ListDimensionsQuerySchema.parse(input);
}
