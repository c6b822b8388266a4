export type EmbeddingVector = readonly number[];

export interface EmbeddingPair {
  readonly first: EmbeddingVector;
  readonly second: EmbeddingVector;
}

export interface SimilarityResult {
  readonly cosineSimilarity: number;
  readonly euclideanDistance: number;
}

export type ModelCard = Record<string, unknown>;
