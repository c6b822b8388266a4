import type { ModelCard } from '@embedlens/shared/src/types/embedding.types.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 5000;
export const DEFAULT_EMBEDDING_TIMEOUT_MS = 30000;

export interface EmbeddingClient {
  readonly baseUrl: string;
  checkConnection(): Promise<boolean>;
  listModels(): Promise<string[]>;
  getModelCard(model: string): Promise<ModelCard>;
  generateEmbedding(model: string, text: string): Promise<number[]>;
}
