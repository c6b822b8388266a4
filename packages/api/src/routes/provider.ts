import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type { EmbeddingClient } from '@embedlens/core/src/embedding/embedding-client.js';
import { createRouter, type AppEnv } from '../types.js';
import { ModelParamSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  ModelCardResponseSchema,
  ModelListResponseSchema,
  ProviderStatusResponseSchema,
} from '../schemas/responses.js';

const statusRoute = createRoute({
  method: 'get',
  path: '/status',
  tags: ['Provider'],
  summary: 'Check connectivity to the embedding provider',
  responses: {
    200: {
      description: 'Connectivity status',
      content: {
        'application/json': {
          schema: ProviderStatusResponseSchema,
        },
      },
    },
  },
});

const listModelsRoute = createRoute({
  method: 'get',
  path: '/',
  tags: ['Models'],
  summary: 'List the models installed on the provider',
  responses: {
    200: {
      description: 'Installed model names',
      content: {
        'application/json': {
          schema: ModelListResponseSchema,
        },
      },
    },
    503: {
      description: 'Provider unreachable',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

const modelCardRoute = createRoute({
  method: 'get',
  path: '/{model}',
  tags: ['Models'],
  summary: 'Get the model card, without its license text',
  request: {
    params: ModelParamSchema,
  },
  responses: {
    200: {
      description: 'Model card',
      content: {
        'application/json': {
          schema: ModelCardResponseSchema,
        },
      },
    },
    404: {
      description: 'Model not found',
      content: {
        'application/json': {
          schema: ErrorResponseSchema,
        },
      },
    },
  },
});

export function createProviderRoutes(embeddingClient: EmbeddingClient): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(statusRoute, async (c) => {
    const connected = await embeddingClient.checkConnection();
    return c.json({ connected, baseUrl: embeddingClient.baseUrl }, 200);
  });

  return routes;
}

export function createModelRoutes(embeddingClient: EmbeddingClient): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(listModelsRoute, async (c) => {
    const models = await embeddingClient.listModels();
    return c.json({ models }, 200);
  });

  routes.openapi(modelCardRoute, async (c) => {
    const { model } = c.req.valid('param');
    const card = await embeddingClient.getModelCard(model);
    return c.json(card, 200);
  });

  return routes;
}
