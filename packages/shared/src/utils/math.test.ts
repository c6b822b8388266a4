import { describe, it, expect } from 'vitest';
import {
  assertComparable,
  cosineSimilarity,
  euclideanDistance,
  similarityMetrics,
  valueRange,
} from './math.js';
import {
  DegenerateVectorError,
  DimensionMismatchError,
  EmptyVectorError,
  NonFiniteValueError,
} from './errors.js';

describe('cosineSimilarity', () => {
  it('should return 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBeCloseTo(0, 12);
  });

  it('should return 1 for identical vectors', () => {
    expect(cosineSimilarity([1, 2, 3], [1, 2, 3])).toBe(1);
  });

  it('should ignore magnitude', () => {
    expect(cosineSimilarity([1, 1], [2, 2])).toBe(1);
  });

  it('should return -1 for opposite vectors', () => {
    expect(cosineSimilarity([1, -2, 0.5], [-1, 2, -0.5])).toBeCloseTo(-1, 12);
  });

  it('should be symmetric', () => {
    const a = [0.3, -1.2, 4.5, 0.01];
    const b = [2.2, 0.7, -0.4, 3.3];
    expect(cosineSimilarity(a, b)).toBe(cosineSimilarity(b, a));
  });

  it('should stay within [-1, 1] for arbitrary non-zero vectors', () => {
    const pairs: [number[], number[]][] = [
      [[0.1, 0.2, 0.3], [0.3, 0.2, 0.1]],
      [[1e-8, 3], [5, -1e-8]],
      [[-7, -7, -7], [7, 7, 7.0001]],
    ];
    for (const [a, b] of pairs) {
      const value = cosineSimilarity(a, b);
      expect(value).toBeGreaterThanOrEqual(-1 - 1e-12);
      expect(value).toBeLessThanOrEqual(1 + 1e-12);
    }
  });

  it('should handle vectors whose squared norms underflow', () => {
    expect(cosineSimilarity([1e-160], [1e-160])).toBe(1);
    expect(cosineSimilarity([1e-200, 0], [1e-200, 0])).toBe(1);
    expect(cosineSimilarity([1e-200, 0], [0, 1e-200])).toBe(0);
  });

  it('should handle vectors whose squared norms overflow', () => {
    expect(cosineSimilarity([1e155, 1e155], [1e155, 1e155])).toBe(1);
    expect(cosineSimilarity([1e155, 0], [-1e155, 0])).toBe(-1);
  });

  it('should compare vectors of very different magnitudes', () => {
    expect(cosineSimilarity([1e-160, 1e-160], [1e155, 1e155])).toBe(1);
  });

  it('should throw DegenerateVectorError for a zero first vector', () => {
    expect(() => cosineSimilarity([0, 0, 0], [1, 2, 3])).toThrow(DegenerateVectorError);
  });

  it('should report which vector has zero norm', () => {
    try {
      cosineSimilarity([1, 2], [0, 0]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DegenerateVectorError);
      expect((error as DegenerateVectorError).position).toBe('second');
    }
  });
});

describe('euclideanDistance', () => {
  it('should return sqrt(2) for unit axis vectors', () => {
    expect(euclideanDistance([1, 0], [0, 1])).toBe(Math.SQRT2);
  });

  it('should return 0 for identical vectors', () => {
    expect(euclideanDistance([1, 2, 3], [1, 2, 3])).toBe(0);
  });

  it('should accept zero vectors', () => {
    expect(euclideanDistance([0, 0], [3, 4])).toBe(5);
  });

  it('should not overflow for large finite components', () => {
    expect(euclideanDistance([1e200], [-1e200])).toBe(2e200);
  });

  it('should not underflow for tiny components', () => {
    expect(euclideanDistance([1e-200], [0])).toBe(1e-200);
  });

  it('should be symmetric', () => {
    expect(euclideanDistance([1, 5, -2], [4, 1, 0])).toBe(euclideanDistance([4, 1, 0], [1, 5, -2]));
  });
});

describe('assertComparable', () => {
  it('should throw DimensionMismatchError for different lengths', () => {
    expect(() => assertComparable([1, 2, 3], [1, 2])).toThrow(DimensionMismatchError);
  });

  it('should carry both lengths on the mismatch error', () => {
    try {
      assertComparable([1, 2, 3], [1, 2]);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DimensionMismatchError);
      const mismatch = error as DimensionMismatchError;
      expect(mismatch.firstLength).toBe(3);
      expect(mismatch.secondLength).toBe(2);
      expect(mismatch.message).toBe('Vector dimensions differ: 3 vs 2');
    }
  });

  it('should report an empty vector before a length mismatch', () => {
    expect(() => assertComparable([], [1])).toThrow(EmptyVectorError);
    expect(() => assertComparable([1], [])).toThrow(EmptyVectorError);
  });

  it('should reject NaN and Infinity', () => {
    expect(() => assertComparable([1, Number.NaN], [1, 2])).toThrow(NonFiniteValueError);
    expect(() => assertComparable([1, 2], [Infinity, 2])).toThrow(NonFiniteValueError);
  });

  it('should accept a single-dimension pair', () => {
    expect(() => assertComparable([5], [7])).not.toThrow();
  });
});

describe('similarityMetrics', () => {
  it('should compute both metrics together', () => {
    expect(similarityMetrics([1, 1], [2, 2])).toEqual({
      cosineSimilarity: 1,
      euclideanDistance: Math.SQRT2,
    });
  });
});

describe('valueRange', () => {
  it('should span all given vectors', () => {
    expect(valueRange([1, -2, 3], [0.5, 4])).toEqual({ min: -2, max: 4 });
  });
});
