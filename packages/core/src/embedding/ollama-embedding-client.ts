import { z } from 'zod';
import type { ModelCard } from '@embedlens/shared/src/types/embedding.types.js';
import { createChildLogger } from '@embedlens/shared/src/logger.js';
import { ConfigurationError, ProviderError } from '@embedlens/shared/src/utils/errors.js';
import type { EmbeddingClient } from './embedding-client.js';
import { DEFAULT_EMBEDDING_TIMEOUT_MS, DEFAULT_REQUEST_TIMEOUT_MS } from './embedding-client.js';

const log = createChildLogger('embedding:ollama');

export interface OllamaClientConfig {
  readonly baseUrl: string;
  readonly requestTimeoutMs?: number;
  readonly embeddingTimeoutMs?: number;
}

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()),
});

const EmbeddingResponseSchema = z.object({
  embedding: z.array(z.number()),
});

const ShowResponseSchema = z.record(z.unknown());

function isTimeout(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export function createOllamaEmbeddingClient(config: OllamaClientConfig): EmbeddingClient {
  if (!config.baseUrl) {
    throw new ConfigurationError('Ollama base URL is required for the embedding client');
  }

  const baseUrl = config.baseUrl.replace(/\/+$/, '');
  const requestTimeoutMs = config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const embeddingTimeoutMs = config.embeddingTimeoutMs ?? DEFAULT_EMBEDDING_TIMEOUT_MS;

  log.info({ baseUrl, requestTimeoutMs, embeddingTimeoutMs }, 'Creating Ollama client');

  async function request(
    path: string,
    timeoutMs: number,
    init: { method: 'GET' } | { method: 'POST'; body: Record<string, unknown> },
  ): Promise<unknown> {
    const url = `${baseUrl}${path}`;
    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method,
        headers: init.method === 'POST' ? { 'Content-Type': 'application/json' } : undefined,
        body: init.method === 'POST' ? JSON.stringify(init.body) : undefined,
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      const cause = error instanceof Error ? error : undefined;
      if (isTimeout(error)) {
        throw new ProviderError(
          `Ollama request to ${path} timed out after ${String(timeoutMs)}ms`,
          true,
          undefined,
          cause,
        );
      }
      throw new ProviderError(
        `Cannot connect to Ollama at ${baseUrl}: ${cause?.message ?? String(error)}`,
        true,
        undefined,
        cause,
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      throw new ProviderError(
        `Ollama request to ${path} failed: ${String(response.status)} ${response.statusText}${detail ? ` - ${detail}` : ''}`,
        response.status >= 500,
        response.status,
      );
    }

    try {
      return (await response.json()) as unknown;
    } catch (error) {
      throw new ProviderError(
        `Ollama returned invalid JSON for ${path}`,
        false,
        response.status,
        error instanceof Error ? error : undefined,
      );
    }
  }

  async function listModels(): Promise<string[]> {
    const body = await request('/api/tags', requestTimeoutMs, { method: 'GET' });
    const parsed = TagsResponseSchema.safeParse(body);
    if (!parsed.success) {
      log.error({ body }, 'Unexpected model list response');
      throw new ProviderError('Unexpected response format from /api/tags', false);
    }
    return parsed.data.models.map((model) => model.name);
  }

  return {
    baseUrl,

    async checkConnection(): Promise<boolean> {
      try {
        await request('/api/tags', requestTimeoutMs, { method: 'GET' });
        return true;
      } catch (error) {
        log.warn(
          { baseUrl, error: error instanceof Error ? error.message : String(error) },
          'Ollama connectivity check failed',
        );
        return false;
      }
    },

    listModels,

    async getModelCard(model: string): Promise<ModelCard> {
      log.debug({ model }, 'Fetching model card');
      const body = await request('/api/show', requestTimeoutMs, {
        method: 'POST',
        body: { name: model },
      });
      const parsed = ShowResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new ProviderError('Unexpected response format from /api/show', false);
      }
      const { license: _license, ...card } = parsed.data;
      return card;
    },

    async generateEmbedding(model: string, text: string): Promise<number[]> {
      log.debug({ model, textLength: text.length }, 'Generating embedding');
      const body = await request('/api/embeddings', embeddingTimeoutMs, {
        method: 'POST',
        body: { model, prompt: text },
      });
      const parsed = EmbeddingResponseSchema.safeParse(body);
      if (!parsed.success) {
        log.error({ model, body }, 'Unexpected embedding response');
        throw new ProviderError(
          `Unexpected response format from /api/embeddings for model ${model}`,
          false,
        );
      }
      return parsed.data.embedding;
    },
  };
}
