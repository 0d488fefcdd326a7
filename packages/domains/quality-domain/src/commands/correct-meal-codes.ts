import { z } from 'zod';

export const CorrectMealCodesCommandSchema = z.object({
  from: z.string().trim().min(1).max(10),
  /** May be empty to clear a code that was never a meal. */
  to: z.string().trim().max(10),
});

export type CorrectMealCodesCommand = z.infer<typeof CorrectMealCodesCommandSchema>;

export function correctMealCodesCommand(
  input: CorrectMealCodesCommand,
): CorrectMealCodesCommand {
  return CorrectMealCodesCommandSchema.parse(input);
}
