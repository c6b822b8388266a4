import type { OpenAPIHono } from '@hono/zod-openapi';
import { cors } from 'hono/cors';
import type { EmbeddingClient } from '@embedlens/core/src/embedding/embedding-client.js';
import type { ComparisonService } from '@embedlens/core/src/comparison/comparison-service.js';
import { createRouter, type AppEnv } from './types.js';
import { requestId } from './middleware/request-id.js';
import { errorHandler } from './middleware/error-handler.js';
import { health, API_VERSION } from './routes/health.js';
import { createModelRoutes, createProviderRoutes } from './routes/provider.js';
import { createComparisonRoutes } from './routes/comparisons.js';
import { createChildLogger } from '@embedlens/shared/src/logger.js';

const log = createChildLogger('api:server');

export interface AppConfig {
  readonly embeddingClient: EmbeddingClient;
  readonly comparisonService: ComparisonService;
}

export function createApp(config: AppConfig): OpenAPIHono<AppEnv> {
  const app = createRouter();

  app.use('*', cors());
  app.use('*', requestId);

  // Request logging
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    log.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        duration,
        requestId: c.get('requestId'),
      },
      'Request completed',
    );
  });

  app.onError(errorHandler);

  app.route('/health', health);

  app.get('/openapi.json', (c) => {
    const spec = app.getOpenAPI31Document({
      openapi: '3.1.0',
      info: {
        title: 'EmbedLens API',
        version: API_VERSION,
        description: 'Compare two text embeddings numerically and visually',
      },
    });
    return c.json(spec);
  });

  // Scalar API Reference (loads client-side from CDN)
  app.get('/docs', (c) => {
    const html = `<!doctype html>
<html>
<head>
  <title>EmbedLens API Reference</title>
  <meta charset="utf-8" />
  <meta name="viewport" content="width=device-width, initial-scale=1" />
</head>
<body>
  <script id="api-reference" data-url="/openapi.json"></script>
  <script src="https://cdn.jsdelivr.net/npm/@scalar/api-reference"></script>
</body>
</html>`;
    return c.html(html);
  });

  app.route('/provider', createProviderRoutes(config.embeddingClient));
  app.route('/models', createModelRoutes(config.embeddingClient));
  app.route('/comparisons', createComparisonRoutes(config.comparisonService));

  return app;
}
