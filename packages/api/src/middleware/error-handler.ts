import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  ConfigurationError,
  ProviderError,
  isVectorError,
} from '@embedlens/shared/src/utils/errors.js';
import { createChildLogger } from '@embedlens/shared/src/logger.js';
import { formatZodErrors } from '@embedlens/schemas/src/validators.js';
import type { AppEnv } from '../types.js';

const log = createChildLogger('api:error-handler');

interface ErrorResponse {
  readonly error: string;
  readonly code: string;
  readonly requestId: string;
  readonly details?: readonly string[];
}

export function errorHandler(err: Error, c: Context<AppEnv>): Response {
  const requestId = c.get('requestId');

  if (err instanceof ZodError) {
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details: formatZodErrors(err),
    };
    return c.json(body, 400);
  }

  // Raised by the request validator, e.g. for a body that is not valid JSON.
  if (err instanceof HTTPException) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.status === 400 ? 'VALIDATION_ERROR' : 'HTTP_ERROR',
      requestId,
    };
    return c.json(body, err.status);
  }

  if (isVectorError(err)) {
    log.warn({ requestId, error: err.message }, 'Embeddings could not be compared');
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 422);
  }

  if (err instanceof ProviderError) {
    if (err.status === 404) {
      const body: ErrorResponse = {
        error: 'Model not found',
        code: 'MODEL_NOT_FOUND',
        requestId,
        details: [err.message],
      };
      return c.json(body, 404);
    }

    log.error({ requestId, error: err.message, status: err.status }, 'Embedding provider error');

    if (err.isRetryable && err.status === undefined) {
      const body: ErrorResponse = {
        error: 'Embedding provider unavailable',
        code: 'PROVIDER_UNAVAILABLE',
        requestId,
        details: [err.message],
      };
      return c.json(body, 503);
    }

    const body: ErrorResponse = {
      error: 'Embedding provider request failed',
      code: 'PROVIDER_ERROR',
      requestId,
      details: [err.message],
    };
    return c.json(body, 502);
  }

  if (err instanceof ConfigurationError) {
    log.error({ requestId, error: err.message }, 'Configuration error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'CONFIGURATION_ERROR',
      requestId,
    };
    return c.json(body, 500);
  }

  log.error({ requestId, error: err.message }, 'Unhandled error');
  const body: ErrorResponse = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId,
  };
  return c.json(body, 500);
}
