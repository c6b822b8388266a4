import { describe, it, expect, vi } from 'vitest';
import type { EmbeddingClient } from '@embedlens/core/src/embedding/embedding-client.js';
import {
  MOCK_EMBEDDING_DIMENSION,
  MOCK_EMBEDDING_MODEL,
} from '@embedlens/core/src/embedding/mock-embedding-client.js';
import { formatMetric } from '@embedlens/core/src/similarity/similarity-evaluator.js';
import { createTestApp, jsonPost } from '../test-helpers.js';

interface TextComparisonBody {
  model: string;
  dimension: number;
  similarity: { cosineSimilarity: number; euclideanDistance: number };
  formatted: { cosineSimilarity: string; euclideanDistance: string };
  embeddings: { first: number[]; second: number[] };
  svg: string;
}

interface ErrorBody {
  error: string;
  code: string;
  requestId: string;
  details?: string[];
}

describe('Comparison Routes', () => {
  describe('POST /comparisons', () => {
    it('should compare the default texts with the first available model', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons', jsonPost({}));

      expect(res.status).toBe(200);
      const body = (await res.json()) as TextComparisonBody;
      expect(body.model).toBe(MOCK_EMBEDDING_MODEL);
      expect(body.dimension).toBe(MOCK_EMBEDDING_DIMENSION);
      expect(body.embeddings.first).toHaveLength(MOCK_EMBEDDING_DIMENSION);
      expect(body.embeddings.second).toHaveLength(MOCK_EMBEDDING_DIMENSION);
      expect(body.embeddings.first).not.toEqual(body.embeddings.second);
      expect(body.formatted).toEqual({
        cosineSimilarity: formatMetric(body.similarity.cosineSimilarity),
        euclideanDistance: formatMetric(body.similarity.euclideanDistance),
      });
      expect(body.svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="800" height="320"')).toBe(
        true,
      );
    });

    it('should report identical texts as identical', async () => {
      const app = createTestApp();

      const res = await app.request(
        '/comparisons',
        jsonPost({ model: MOCK_EMBEDDING_MODEL, firstText: 'same', secondText: 'same' }),
      );

      const body = (await res.json()) as TextComparisonBody;
      expect(body.formatted).toEqual({ cosineSimilarity: '1.0000', euclideanDistance: '0.0000' });
    });

    it('should use the configured default model', async () => {
      const app = createTestApp({
        mock: { models: ['first', 'preferred'] },
        defaultModel: 'preferred',
      });

      const res = await app.request('/comparisons', jsonPost({}));

      const body = (await res.json()) as TextComparisonBody;
      expect(body.model).toBe('preferred');
    });

    it('should reject empty texts', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons', jsonPost({ firstText: '' }));

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.details).toHaveLength(1);
      expect(body.details?.[0].startsWith('firstText:')).toBe(true);
    });

    it('should return 404 for an unknown model', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons', jsonPost({ model: 'nope' }));

      expect(res.status).toBe(404);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('MODEL_NOT_FOUND');
    });

    it('should return 503 when the provider is unreachable', async () => {
      const app = createTestApp({ mock: { connected: false } });

      const res = await app.request('/comparisons', jsonPost({}));

      expect(res.status).toBe(503);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('PROVIDER_UNAVAILABLE');
    });

    it('should return 502 when no models are installed', async () => {
      const app = createTestApp({ mock: { models: [] } });

      const res = await app.request('/comparisons', jsonPost({}));

      expect(res.status).toBe(502);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('PROVIDER_ERROR');
      expect(body.details).toEqual(['No embedding models available']);
    });

    it('should return 422 when the provider returns embeddings of different sizes', async () => {
      const embeddingClient: EmbeddingClient = {
        baseUrl: 'stub://',
        checkConnection: vi.fn().mockResolvedValue(true),
        listModels: vi.fn().mockResolvedValue(['stub']),
        getModelCard: vi.fn().mockResolvedValue({}),
        generateEmbedding: vi.fn((_model: string, text: string) =>
          Promise.resolve(text === 'short' ? [1, 2] : [1, 2, 3]),
        ),
      };
      const app = createTestApp({ embeddingClient });

      const res = await app.request(
        '/comparisons',
        jsonPost({ firstText: 'long', secondText: 'short' }),
      );

      expect(res.status).toBe(422);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('DIMENSION_MISMATCH');
      expect(body.error).toBe('Vector dimensions differ: 3 vs 2');
    });
  });

  describe('POST /comparisons/figure', () => {
    it('should return the figure as SVG', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons/figure', jsonPost({}));

      expect(res.status).toBe(200);
      expect(res.headers.get('Content-Type')).toBe('image/svg+xml');
      const svg = await res.text();
      expect(svg.startsWith('<svg')).toBe(true);
      expect(svg.endsWith('</svg>')).toBe(true);
    });
  });

  describe('POST /comparisons/vectors', () => {
    it('should compare orthogonal vectors', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons/vectors', jsonPost({ first: [1, 0], second: [0, 1] }));

      expect(res.status).toBe(200);
      const body = (await res.json()) as Omit<TextComparisonBody, 'model' | 'embeddings'>;
      expect(body.dimension).toBe(2);
      expect(body.similarity).toEqual({ cosineSimilarity: 0, euclideanDistance: Math.SQRT2 });
      expect(body.formatted).toEqual({ cosineSimilarity: '0.0000', euclideanDistance: '1.4142' });
    });

    it('should render a single dimension', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons/vectors', jsonPost({ first: [5], second: [7] }));

      expect(res.status).toBe(200);
      const body = (await res.json()) as { dimension: number; svg: string };
      expect(body.dimension).toBe(1);
      expect(body.svg).not.toContain('NaN');
    });

    it('should return 422 for mismatched lengths', async () => {
      const app = createTestApp();

      const res = await app.request(
        '/comparisons/vectors',
        jsonPost({ first: [1, 2, 3], second: [1, 2] }),
      );

      expect(res.status).toBe(422);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('DIMENSION_MISMATCH');
    });

    it('should return 422 for a zero vector', async () => {
      const app = createTestApp();

      const res = await app.request(
        '/comparisons/vectors',
        jsonPost({ first: [0, 0, 0], second: [1, 2, 3] }),
      );

      expect(res.status).toBe(422);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('DEGENERATE_VECTOR');
      expect(body.error).toBe('Cosine similarity is undefined: the first vector has zero norm');
    });

    it('should return 422 for empty vectors', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons/vectors', jsonPost({ first: [], second: [] }));

      expect(res.status).toBe(422);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('EMPTY_VECTOR');
    });

    it('should return 400 for non-numeric entries', async () => {
      const app = createTestApp();

      const res = await app.request(
        '/comparisons/vectors',
        jsonPost({ first: [1, 'two'], second: [1, 2] }),
      );

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('VALIDATION_ERROR');
    });

    it('should return 400 for a body that is not valid JSON', async () => {
      const app = createTestApp();

      const res = await app.request('/comparisons/vectors', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', 'X-Request-Id': 'req-malformed' },
        body: '{bad',
      });

      expect(res.status).toBe(400);
      const body = (await res.json()) as ErrorBody;
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.error).toBe('Malformed JSON in request body');
      expect(body.requestId).toBe('req-malformed');
    });
  });
});
