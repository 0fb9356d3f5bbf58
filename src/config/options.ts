import { z } from 'zod';
import { FILTER_MODES } from '../query/filters.js';
import { CliUsageError } from '../cli/errors.js';

export const PickerOptionsSchema = z.object({
  mode: z.enum(FILTER_MODES).default('fuzzy'),
  colors: z.boolean().default(true),
});

export type PickerOptions = z.infer<typeof PickerOptionsSchema>;

export function parsePickerOptions(raw: unknown): PickerOptions {
  const result = PickerOptionsSchema.safeParse(raw);
  if (result.success) return result.data;

  const issue = result.error.issues[0];
  const field = issue?.path.join('.') || 'options';
  if (field === 'mode') {
    throw new CliUsageError(`Invalid --mode. Expected one of: ${FILTER_MODES.join(', ')}.`);
  }
  throw new CliUsageError(`Invalid ${field}: ${issue?.message ?? 'unknown problem'}`);
}
