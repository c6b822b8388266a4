import { describe, it, expect } from 'vitest';
import { ProviderError } from '@embedlens/shared/src/utils/errors.js';
import {
  createMockEmbeddingClient,
  MOCK_EMBEDDING_DIMENSION,
  MOCK_EMBEDDING_MODEL,
} from './mock-embedding-client.js';

describe('MockEmbeddingClient', () => {
  it('should generate embedding with correct dimensions', async () => {
    const client = createMockEmbeddingClient();
    const embedding = await client.generateEmbedding(MOCK_EMBEDDING_MODEL, 'test input');

    expect(embedding).toHaveLength(MOCK_EMBEDDING_DIMENSION);
  });

  it('should generate deterministic embeddings for same input', async () => {
    const client = createMockEmbeddingClient();
    const e1 = await client.generateEmbedding(MOCK_EMBEDDING_MODEL, 'test input');
    const e2 = await client.generateEmbedding(MOCK_EMBEDDING_MODEL, 'test input');

    expect(e1).toEqual(e2);
  });

  it('should generate different embeddings for different inputs', async () => {
    const client = createMockEmbeddingClient();
    const e1 = await client.generateEmbedding(MOCK_EMBEDDING_MODEL, 'Hello, world!');
    const e2 = await client.generateEmbedding(MOCK_EMBEDDING_MODEL, 'Embedding visualization');

    expect(e1).not.toEqual(e2);
  });

  it('should generate normalized unit vectors', async () => {
    const client = createMockEmbeddingClient({ dimension: 64 });
    const embedding = await client.generateEmbedding(MOCK_EMBEDDING_MODEL, 'test');

    const magnitude = Math.sqrt(embedding.reduce((sum, v) => sum + v * v, 0));
    expect(embedding).toHaveLength(64);
    expect(magnitude).toBeCloseTo(1.0, 5);
  });

  it('should list the configured models', async () => {
    const client = createMockEmbeddingClient({ models: ['a', 'b'] });

    expect(await client.listModels()).toEqual(['a', 'b']);
  });

  it('should reject unknown models with a 404 provider error', async () => {
    const client = createMockEmbeddingClient();

    await expect(client.generateEmbedding('unknown', 'text')).rejects.toMatchObject({
      name: 'ProviderError',
      status: 404,
    });
  });

  it('should report a disconnected provider', async () => {
    const client = createMockEmbeddingClient({ connected: false });

    expect(await client.checkConnection()).toBe(false);
    await expect(client.listModels()).rejects.toThrow(ProviderError);
  });
});
