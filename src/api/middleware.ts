/**
 * API Middleware — request helpers and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { ConfigError } from '../config';
import { apiError, createTypedError, TypedError, validationError } from '../domain/errors';
import { ExecutorError } from '../engine/executor';
import { logger } from '../logger';

const log = logger.child({ module: 'api' });

/** Errors that carry a typed error. */
function typedErrorOf(err: unknown): TypedError | undefined {
  if (err instanceof ExecutorError || err instanceof ConfigError) return err.typedError;
  return undefined;
}

/** Body parser failures from express.json() carry `type: 'entity.parse.failed'`. */
function isBodyParseError(err: unknown): err is SyntaxError {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction): void {
  const typedError = typedErrorOf(err);
  if (typedError) {
    const status = getHttpStatus(typedError);
    log.warn('Request error', { code: typedError.code, status });
    res.status(status).json(apiError(typedError));
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json(apiError(validationError(`Malformed JSON body: ${err.message}`)));
    return;
  }

  const message = err instanceof Error ? err.message : 'Internal server error';
  log.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message,
        retryable: false,
      }),
    ),
  );
}

/** HTTP status for a typed error, by code domain. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.endsWith('.NOT_FOUND')) return 404;
  if (error.code.startsWith('VALIDATION.')) return 400;
  if (error.code.startsWith('AUTH.')) return 401;
  if (error.code === 'RUN.ALREADY_RUNNING') return 409;
  if (error.code === 'RUN.INVALID_STATE_TRANSITION') return 409;
  if (error.code.startsWith('TRIGGER.')) return 422;
  if (error.code.startsWith('WORKFLOW.')) return 422;
  return 500;
}

/** Narrow a parsed JSON body to an object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Optional string field of a request body; throws VALIDATION.SCHEMA when present with another type. */
export function optionalString(body: Record<string, unknown>, field: string): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ExecutorError(validationError(`"${field}" must be a string`, { field }));
  }
  return value;
}

/** Parse a non-negative integer query parameter. */
export function queryInt(value: unknown, fallback: number, max?: number): number {
  if (typeof value !== 'string') return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) return fallback;
  return max === undefined ? parsed : Math.min(parsed, max);
}
