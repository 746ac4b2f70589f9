import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import {
  ConfigurationError,
  JobConflictError,
  JobNotFoundError,
  LlmError,
  PaymentError,
  PersistenceError,
  SchemaValidationError,
} from '@cognisync/shared/src/utils/errors.js';
import { createChildLogger } from '@cognisync/shared/src/logger.js';
import { formatZodErrors } from '@cognisync/schemas/src/validators.js';
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

  if (err instanceof HTTPException) {
    const status = err.status;
    const body: ErrorResponse = {
      error: err.message || 'Request failed',
      code: status === 400 ? 'BAD_REQUEST' : 'HTTP_ERROR',
      requestId,
    };
    return c.json(body, status);
  }

  if (err instanceof ZodError) {
    const body: ErrorResponse = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId,
      details: formatZodErrors(err),
    };
    return c.json(body, 400);
  }

  if (err instanceof SchemaValidationError) {
    const body: ErrorResponse = {
      error: err.message,
      code: 'VALIDATION_ERROR',
      requestId,
      details: err.validationErrors,
    };
    return c.json(body, 400);
  }

  if (err instanceof JobNotFoundError) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 404);
  }

  if (err instanceof JobConflictError) {
    const body: ErrorResponse = {
      error: err.message,
      code: err.code,
      requestId,
    };
    return c.json(body, 409);
  }

  if (err instanceof PaymentError) {
    log.error({ requestId, error: err.message }, 'Payment error');
    const body: ErrorResponse = {
      error: 'Payment request failed',
      code: 'PAYMENT_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof LlmError) {
    log.error({ requestId, error: err.message }, 'LLM error');
    const body: ErrorResponse = {
      error: 'Language model processing failed',
      code: 'LLM_ERROR',
      requestId,
    };
    return c.json(body, 502);
  }

  if (err instanceof PersistenceError || err instanceof ConfigurationError) {
    log.error({ requestId, error: err.message }, 'Internal error');
    const body: ErrorResponse = {
      error: 'Internal server error',
      code: 'INTERNAL_ERROR',
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
