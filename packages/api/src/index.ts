import { serve } from '@hono/node-server';
import { loadConfig } from '@embedlens/schemas/src/config-loader.js';
import { createOllamaEmbeddingClient } from '@embedlens/core/src/embedding/ollama-embedding-client.js';
import { createMockEmbeddingClient } from '@embedlens/core/src/embedding/mock-embedding-client.js';
import { createComparisonService } from '@embedlens/core/src/comparison/comparison-service.js';
import { createChildLogger } from '@embedlens/shared/src/logger.js';
import { createApp } from './app.js';

const log = createChildLogger('api:main');

async function main(): Promise<void> {
  const config = await loadConfig(process.env['EMBEDLENS_CONFIG']);

  const embeddingClient =
    process.env['EMBEDLENS_MOCK_EMBEDDINGS'] === 'true'
      ? createMockEmbeddingClient()
      : createOllamaEmbeddingClient(config.ollama);

  if (!(await embeddingClient.checkConnection())) {
    log.warn(
      { baseUrl: embeddingClient.baseUrl },
      'Cannot connect to the embedding provider, is Ollama running?',
    );
  }

  const comparisonService = createComparisonService({
    embeddingClient,
    defaultModel: config.embedding.defaultModel,
    renderOptions: config.figure,
  });

  const app = createApp({ embeddingClient, comparisonService });
  const { port } = config.server;

  log.info({ port }, 'Starting EmbedLens API server');

  serve({ fetch: app.fetch, port }, (info) => {
    log.info({ port: info.port }, 'EmbedLens API server running');
  });
}

main().catch((error: unknown) => {
  log.error(
    { error: error instanceof Error ? error.message : String(error) },
    'Failed to start API server',
  );
  process.exit(1);
});
