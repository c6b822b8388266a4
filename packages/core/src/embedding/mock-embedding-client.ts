import type { ModelCard } from '@embedlens/shared/src/types/embedding.types.js';
import { ProviderError } from '@embedlens/shared/src/utils/errors.js';
import type { EmbeddingClient } from './embedding-client.js';

export const MOCK_EMBEDDING_DIMENSION = 16;
export const MOCK_EMBEDDING_MODEL = 'mock-embed:latest';

export interface MockEmbeddingClientOptions {
  readonly models?: readonly string[];
  readonly dimension?: number;
  readonly connected?: boolean;
}

function hashCode(str: string): number {
  let hash = 0;
  for (let i = 0; i < str.length; i++) {
    const char = str.charCodeAt(i);
    hash = ((hash << 5) - hash + char) | 0;
  }
  return hash;
}

function generateDeterministicVector(text: string, dimension: number): number[] {
  const seed = hashCode(text);
  const vector: number[] = new Array<number>(dimension).fill(0);
  for (let i = 0; i < dimension; i++) {
    // Simple deterministic pseudo-random based on seed and index, centered on zero
    const x = Math.sin(seed * (i + 1) + 1) * 10000;
    vector[i] = x - Math.floor(x) - 0.5;
  }

  // Normalize to unit vector
  const magnitude = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (magnitude > 0) {
    for (let i = 0; i < dimension; i++) {
      vector[i] = vector[i] / magnitude;
    }
  }

  return vector;
}

export function createMockEmbeddingClient(options: MockEmbeddingClientOptions = {}): EmbeddingClient {
  const models = options.models ?? [MOCK_EMBEDDING_MODEL];
  const dimension = options.dimension ?? MOCK_EMBEDDING_DIMENSION;
  const connected = options.connected ?? true;

  function assertKnownModel(model: string): void {
    if (!connected) {
      throw new ProviderError('Cannot connect to mock embedding provider', true);
    }
    if (!models.includes(model)) {
      throw new ProviderError(`model '${model}' not found`, false, 404);
    }
  }

  return {
    baseUrl: 'mock://embeddings',

    checkConnection(): Promise<boolean> {
      return Promise.resolve(connected);
    },

    async listModels(): Promise<string[]> {
      if (!connected) {
        throw new ProviderError('Cannot connect to mock embedding provider', true);
      }
      return [...models];
    },

    async getModelCard(model: string): Promise<ModelCard> {
      assertKnownModel(model);
      return {
        modelfile: `FROM ${model}`,
        details: { family: 'mock', embedding_length: dimension },
      };
    },

    async generateEmbedding(model: string, text: string): Promise<number[]> {
      assertKnownModel(model);
      return generateDeterministicVector(`${model}\n${text}`, dimension);
    },
  };
}
