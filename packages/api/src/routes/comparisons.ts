import { createRoute } from '@hono/zod-openapi';
import type { OpenAPIHono } from '@hono/zod-openapi';
import type {
  ComparisonService,
  VectorComparison,
} from '@embedlens/core/src/comparison/comparison-service.js';
import { formatMetric } from '@embedlens/core/src/similarity/similarity-evaluator.js';
import { createRouter, type AppEnv } from '../types.js';
import { CompareTextsSchema, CompareVectorsSchema } from '../schemas/requests.js';
import {
  ErrorResponseSchema,
  TextComparisonResponseSchema,
  VectorComparisonResponseSchema,
} from '../schemas/responses.js';

const errorResponses = {
  422: {
    description: 'The embeddings cannot be compared',
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
  },
  502: {
    description: 'Embedding provider request failed',
    content: {
      'application/json': {
        schema: ErrorResponseSchema,
      },
    },
  },
} as const;

const compareTextsRoute = createRoute({
  method: 'post',
  path: '/',
  tags: ['Comparisons'],
  summary: 'Embed two texts and compare the embeddings',
  request: {
    body: {
      content: {
        'application/json': {
          schema: CompareTextsSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Similarity metrics, embedding values and the comparison figure as SVG',
      content: {
        'application/json': {
          schema: TextComparisonResponseSchema,
        },
      },
    },
    ...errorResponses,
  },
});

const compareTextsFigureRoute = createRoute({
  method: 'post',
  path: '/figure',
  tags: ['Comparisons'],
  summary: 'Embed two texts and return only the comparison figure',
  request: {
    body: {
      content: {
        'application/json': {
          schema: CompareTextsSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Comparison figure (image/svg+xml)',
    },
    ...errorResponses,
  },
});

const compareVectorsRoute = createRoute({
  method: 'post',
  path: '/vectors',
  tags: ['Comparisons'],
  summary: 'Compare two caller-supplied vectors',
  request: {
    body: {
      content: {
        'application/json': {
          schema: CompareVectorsSchema,
        },
      },
    },
  },
  responses: {
    200: {
      description: 'Similarity metrics and the comparison figure as SVG',
      content: {
        'application/json': {
          schema: VectorComparisonResponseSchema,
        },
      },
    },
    422: errorResponses[422],
  },
});

function formatSimilarity(comparison: VectorComparison): {
  cosineSimilarity: string;
  euclideanDistance: string;
} {
  return {
    cosineSimilarity: formatMetric(comparison.similarity.cosineSimilarity),
    euclideanDistance: formatMetric(comparison.similarity.euclideanDistance),
  };
}

export function createComparisonRoutes(comparisonService: ComparisonService): OpenAPIHono<AppEnv> {
  const routes = createRouter();

  routes.openapi(compareTextsRoute, async (c) => {
    const body = c.req.valid('json');
    const comparison = await comparisonService.compareTexts(body);

    return c.json(
      {
        model: comparison.model,
        dimension: comparison.dimension,
        similarity: { ...comparison.similarity },
        formatted: formatSimilarity(comparison),
        embeddings: {
          first: [...comparison.embeddings.first],
          second: [...comparison.embeddings.second],
        },
        svg: comparison.svg,
      },
      200,
    );
  });

  routes.openapi(compareTextsFigureRoute, async (c) => {
    const body = c.req.valid('json');
    const comparison = await comparisonService.compareTexts(body);

    return c.body(comparison.svg, 200, { 'Content-Type': 'image/svg+xml' });
  });

  routes.openapi(compareVectorsRoute, (c) => {
    const { first, second } = c.req.valid('json');
    const comparison = comparisonService.compareVectors(first, second);

    return c.json(
      {
        dimension: comparison.dimension,
        similarity: { ...comparison.similarity },
        formatted: formatSimilarity(comparison),
        svg: comparison.svg,
      },
      200,
    );
  });

  return routes;
}
