import type { OpenAPIHono } from '@hono/zod-openapi';
import type { EmbeddingClient } from '@embedlens/core/src/embedding/embedding-client.js';
import { createMockEmbeddingClient } from '@embedlens/core/src/embedding/mock-embedding-client.js';
import type { MockEmbeddingClientOptions } from '@embedlens/core/src/embedding/mock-embedding-client.js';
import { createComparisonService } from '@embedlens/core/src/comparison/comparison-service.js';
import type { RenderOptions } from '@embedlens/core/src/rendering/figure.types.js';
import { createApp } from './app.js';
import type { AppEnv } from './types.js';

export interface TestAppOptions {
  readonly embeddingClient?: EmbeddingClient;
  readonly mock?: MockEmbeddingClientOptions;
  readonly defaultModel?: string;
  readonly renderOptions?: RenderOptions;
}

/**
 * Creates an app wired to an in-process embedding client.
 * For use in unit tests only.
 */
export function createTestApp(options: TestAppOptions = {}): OpenAPIHono<AppEnv> {
  const embeddingClient = options.embeddingClient ?? createMockEmbeddingClient(options.mock);
  const comparisonService = createComparisonService({
    embeddingClient,
    defaultModel: options.defaultModel,
    renderOptions: options.renderOptions ?? { width: 800, height: 320 },
  });
  return createApp({ embeddingClient, comparisonService });
}

export function jsonPost(body: Record<string, unknown>): RequestInit {
  return {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify(body),
  };
}
