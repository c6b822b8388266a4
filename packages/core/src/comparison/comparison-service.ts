import type {
  EmbeddingPair,
  EmbeddingVector,
  SimilarityResult,
} from '@embedlens/shared/src/types/embedding.types.js';
import { createChildLogger } from '@embedlens/shared/src/logger.js';
import { ProviderError } from '@embedlens/shared/src/utils/errors.js';
import type { EmbeddingClient } from '../embedding/embedding-client.js';
import { evaluate } from '../similarity/similarity-evaluator.js';
import { renderComparison } from '../rendering/comparison-renderer.js';
import { exportFigureToSvg } from '../rendering/svg-exporter.js';
import type { ComparisonFigure, RenderOptions } from '../rendering/figure.types.js';

const log = createChildLogger('comparison:service');

export const DEFAULT_FIRST_TEXT = 'Hello, world!';
export const DEFAULT_SECOND_TEXT = 'Embedding visualization';

export interface TextComparisonRequest {
  readonly model?: string;
  readonly firstText: string;
  readonly secondText: string;
}

export interface VectorComparison {
  readonly dimension: number;
  readonly similarity: SimilarityResult;
  readonly figure: ComparisonFigure;
  readonly svg: string;
}

export interface TextComparison extends VectorComparison {
  readonly model: string;
  readonly embeddings: EmbeddingPair;
}

export interface ComparisonServiceDeps {
  readonly embeddingClient: EmbeddingClient;
  readonly defaultModel?: string;
  readonly renderOptions?: RenderOptions;
}

export interface ComparisonService {
  resolveModel(requested?: string): Promise<string>;
  compareTexts(request: TextComparisonRequest): Promise<TextComparison>;
  compareVectors(first: EmbeddingVector, second: EmbeddingVector): VectorComparison;
}

export function createComparisonService(deps: ComparisonServiceDeps): ComparisonService {
  const { embeddingClient, defaultModel, renderOptions } = deps;

  function compareVectors(first: EmbeddingVector, second: EmbeddingVector): VectorComparison {
    const similarity = evaluate(first, second);
    const figure = renderComparison(first, second, renderOptions);
    return {
      dimension: first.length,
      similarity,
      figure,
      svg: exportFigureToSvg(figure),
    };
  }

  async function resolveModel(requested?: string): Promise<string> {
    if (requested) return requested;
    if (defaultModel) return defaultModel;

    const [firstModel] = await embeddingClient.listModels();
    if (!firstModel) {
      throw new ProviderError('No embedding models available', false);
    }
    log.debug({ model: firstModel }, 'No model requested, using first available');
    return firstModel;
  }

  return {
    resolveModel,

    async compareTexts(request: TextComparisonRequest): Promise<TextComparison> {
      const model = await resolveModel(request.model);
      log.info({ model }, 'Generating embeddings');

      const [first, second] = await Promise.all([
        embeddingClient.generateEmbedding(model, request.firstText),
        embeddingClient.generateEmbedding(model, request.secondText),
      ]);

      try {
        const comparison = compareVectors(first, second);
        log.info(
          { model, dimension: comparison.dimension, ...comparison.similarity },
          'Comparison completed',
        );
        return { ...comparison, model, embeddings: { first, second } };
      } catch (error) {
        log.warn(
          {
            model,
            firstLength: first.length,
            secondLength: second.length,
            error: error instanceof Error ? error.message : String(error),
          },
          'Embeddings could not be compared',
        );
        throw error;
      }
    },

    compareVectors,
  };
}
