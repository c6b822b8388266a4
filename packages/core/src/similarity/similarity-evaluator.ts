import type {
  EmbeddingVector,
  SimilarityResult,
} from '@embedlens/shared/src/types/embedding.types.js';
import {
  cosineSimilarity,
  euclideanDistance,
  similarityMetrics,
} from '@embedlens/shared/src/utils/math.js';

export { cosineSimilarity, euclideanDistance };

export const METRIC_DECIMALS = 4;

/**
 * Compares two embeddings. Throws EmptyVectorError, DimensionMismatchError
 * or NonFiniteValueError for an invalid pair and DegenerateVectorError when
 * either vector has zero norm.
 */
export function evaluate(first: EmbeddingVector, second: EmbeddingVector): SimilarityResult {
  return similarityMetrics(first, second);
}

export function formatMetric(value: number): string {
  return value.toFixed(METRIC_DECIMALS);
}
