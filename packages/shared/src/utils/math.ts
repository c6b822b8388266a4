import type { EmbeddingVector } from '../types/embedding.types.js';
import {
  DegenerateVectorError,
  DimensionMismatchError,
  EmptyVectorError,
  NonFiniteValueError,
} from './errors.js';
import type { VectorPosition } from './errors.js';

function assertFinite(vector: EmbeddingVector, position: VectorPosition): void {
  for (let i = 0; i < vector.length; i++) {
    if (!Number.isFinite(vector[i])) {
      throw new NonFiniteValueError(position, i);
    }
  }
}

/**
 * Checks that two vectors can be compared dimension by dimension.
 * Emptiness is reported before a length mismatch, so `[]` vs `[1]` is an
 * EmptyVectorError rather than a DimensionMismatchError.
 */
export function assertComparable(a: EmbeddingVector, b: EmbeddingVector): void {
  if (a.length === 0) throw new EmptyVectorError('first');
  if (b.length === 0) throw new EmptyVectorError('second');
  if (a.length !== b.length) {
    throw new DimensionMismatchError(a.length, b.length);
  }
  assertFinite(a, 'first');
  assertFinite(b, 'second');
}

function maxAbs(vector: EmbeddingVector): number {
  let max = 0;
  for (const value of vector) {
    const abs = Math.abs(value);
    if (abs > max) max = abs;
  }
  return max;
}

// Components are divided by the largest magnitude before squaring so that
// sums of squares neither overflow nor underflow for finite input.
function cosineOfValidated(a: EmbeddingVector, b: EmbeddingVector): number {
  const scaleA = maxAbs(a);
  const scaleB = maxAbs(b);
  if (scaleA === 0) throw new DegenerateVectorError('first');
  if (scaleB === 0) throw new DegenerateVectorError('second');

  let dotProduct = 0;
  let magnitudeA = 0;
  let magnitudeB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] / scaleA;
    const y = b[i] / scaleB;
    dotProduct += x * y;
    magnitudeA += x * x;
    magnitudeB += y * y;
  }
  // Each scaled magnitude lies in [1, D].
  return dotProduct / Math.sqrt(magnitudeA * magnitudeB);
}

function euclideanOfValidated(a: EmbeddingVector, b: EmbeddingVector): number {
  const scale = Math.max(maxAbs(a), maxAbs(b));
  if (scale === 0) return 0;

  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    const diff = a[i] / scale - b[i] / scale;
    sum += diff * diff;
  }
  return scale * Math.sqrt(sum);
}

export function cosineSimilarity(a: EmbeddingVector, b: EmbeddingVector): number {
  assertComparable(a, b);
  return cosineOfValidated(a, b);
}

export function euclideanDistance(a: EmbeddingVector, b: EmbeddingVector): number {
  assertComparable(a, b);
  return euclideanOfValidated(a, b);
}

/** Both metrics with a single validation pass. */
export function similarityMetrics(
  a: EmbeddingVector,
  b: EmbeddingVector,
): { cosineSimilarity: number; euclideanDistance: number } {
  assertComparable(a, b);
  return {
    cosineSimilarity: cosineOfValidated(a, b),
    euclideanDistance: euclideanOfValidated(a, b),
  };
}

export function valueRange(...vectors: readonly EmbeddingVector[]): { min: number; max: number } {
  let min = Infinity;
  let max = -Infinity;
  for (const vector of vectors) {
    for (const value of vector) {
      if (value < min) min = value;
      if (value > max) max = value;
    }
  }
  return { min, max };
}
