import { z } from '@hono/zod-openapi';

export const ErrorResponseSchema = z
  .object({
    error: z.string(),
    code: z.string(),
    requestId: z.string(),
    details: z.array(z.string()).optional(),
  })
  .openapi('ErrorResponse');

// Health
export const HealthResponseSchema = z
  .object({
    status: z.string(),
    version: z.string(),
  })
  .openapi('HealthResponse');

// Provider
export const ProviderStatusResponseSchema = z
  .object({
    connected: z.boolean(),
    baseUrl: z.string(),
  })
  .openapi('ProviderStatusResponse');

export const ModelListResponseSchema = z
  .object({
    models: z.array(z.string()),
  })
  .openapi('ModelListResponse');

export const ModelCardResponseSchema = z.record(z.unknown()).openapi('ModelCardResponse');

// Comparisons
const SimilaritySchema = z.object({
  cosineSimilarity: z.number(),
  euclideanDistance: z.number(),
});

const FormattedSimilaritySchema = z.object({
  cosineSimilarity: z.string(),
  euclideanDistance: z.string(),
});

export const VectorComparisonResponseSchema = z
  .object({
    dimension: z.number(),
    similarity: SimilaritySchema,
    formatted: FormattedSimilaritySchema,
    svg: z.string(),
  })
  .openapi('VectorComparisonResponse');

export const TextComparisonResponseSchema = z
  .object({
    model: z.string(),
    dimension: z.number(),
    similarity: SimilaritySchema,
    formatted: FormattedSimilaritySchema,
    embeddings: z.object({
      first: z.array(z.number()),
      second: z.array(z.number()),
    }),
    svg: z.string(),
  })
  .openapi('TextComparisonResponse');
