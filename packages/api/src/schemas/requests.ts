import { z } from '@hono/zod-openapi';
import {
  DEFAULT_FIRST_TEXT,
  DEFAULT_SECOND_TEXT,
} from '@embedlens/core/src/comparison/comparison-service.js';

export const CompareTextsSchema = z
  .object({
    model: z.string().min(1).optional().openapi({ example: 'nomic-embed-text:latest' }),
    firstText: z.string().min(1).default(DEFAULT_FIRST_TEXT),
    secondText: z.string().min(1).default(DEFAULT_SECOND_TEXT),
  })
  .openapi('CompareTextsRequest');

export type CompareTextsRequest = z.infer<typeof CompareTextsSchema>;

// Length and finiteness are checked by the evaluator so the errors carry their own codes.
export const CompareVectorsSchema = z
  .object({
    first: z.array(z.number()).openapi({ example: [1, 0] }),
    second: z.array(z.number()).openapi({ example: [0, 1] }),
  })
  .openapi('CompareVectorsRequest');

export type CompareVectorsRequest = z.infer<typeof CompareVectorsSchema>;

export const ModelParamSchema = z.object({
  model: z
    .string()
    .min(1)
    .openapi({ param: { name: 'model', in: 'path' }, example: 'nomic-embed-text:latest' }),
});
