import type { ZodError } from 'zod';
import { SchemaValidationError } from '@embedlens/shared/src/utils/errors.js';
import { EmbedLensConfigSchema } from './config.schema.js';
import type { EmbedLensConfig } from './config.schema.js';

export function formatZodErrors(error: ZodError): readonly string[] {
  return error.errors.map((e) => `${e.path.join('.')}: ${e.message}`);
}

export function validateEmbedLensConfig(data: unknown): EmbedLensConfig {
  const result = EmbedLensConfigSchema.safeParse(data);

  if (!result.success) {
    throw new SchemaValidationError('Invalid EmbedLens configuration', formatZodErrors(result.error));
  }

  return result.data;
}
