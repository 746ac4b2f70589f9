import type { ZodError } from 'zod';
import { SchemaValidationError } from '@cognisync/shared/src/utils/errors.js';
import { StartJobSchema } from './job-input.schema.js';
import type { StartJobInput } from './job-input.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateStartJobInput(data: unknown): StartJobInput {
  const result = StartJobSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid job input', formatZodErrors(result.error));
  }

  return result.data;
}
