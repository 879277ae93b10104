/**
 * API Middleware: error mapping, the global error handler and request parsing helpers.
 */

import { Request, Response, NextFunction } from 'express';
import {
  apiError,
  createTypedError,
  errorMessage,
  isErrorLike,
  isLifecycleError,
  LifecycleError,
  toTypedError,
  TypedError,
  validationError,
} from '../domain/errors';
import { logger } from '../logger';

/** HTTP status for a typed error, by code prefix. */
export function getHttpStatus(error: TypedError): number {
  if (error.code.startsWith('VALIDATION.') && !error.code.endsWith('NOT_FOUND')) return 400;
  if (error.code.endsWith('NOT_FOUND')) return 404;
  if (error.code === 'WORKSPACE.ALREADY_EXISTS') return 409;
  if (error.code === 'RUN.CANCELED') return 409;
  if (error.code.startsWith('ASSET.')) return 502;
  if (error.code.startsWith('UPLOAD.')) return 502;
  return 500;
}

/** Express's body parser marks malformed JSON with a 4xx status and type. */
function isBodyParseError(err: unknown): err is Error & { status: number; type: string } {
  return (
    isErrorLike(err) &&
    'status' in err && typeof err.status === 'number' &&
    'type' in err && typeof err.type === 'string'
  );
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  if (isLifecycleError(err)) {
    const status = getHttpStatus(err.typedError);
    logger.warn('Request error', { code: err.typedError.code, status });
    res.status(status).json(apiError(err.typedError));
    return;
  }

  if (isBodyParseError(err) && err.status >= 400 && err.status < 500) {
    res.status(err.status).json(
      apiError(createTypedError({ code: 'VALIDATION.BODY', message: err.message, retryable: false })),
    );
    return;
  }

  logger.error('Unhandled request error', {
    message: errorMessage(err),
    stack: isErrorLike(err) ? err.stack : undefined,
  });

  res.status(500).json(
    apiError(
      createTypedError({
        code: 'SYSTEM.INTERNAL',
        message: errorMessage(err) || 'Internal server error',
        retryable: false,
      }),
    ),
  );
}

/** Respond with the typed form of anything caught in a route. */
export function sendError(res: Response, err: unknown): void {
  const typedError = toTypedError(err);
  const status = getHttpStatus(typedError);
  if (status >= 500) {
    logger.error('Request failed', { code: typedError.code, message: typedError.message });
  }
  res.status(status).json(apiError(typedError));
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** A single string query parameter, if present. */
export function queryString(value: unknown): string | undefined {
  return typeof value === 'string' && value.length > 0 ? value : undefined;
}

/** An integer query parameter within bounds. */
export function queryInt(name: string, value: unknown, min: number, max = Number.MAX_SAFE_INTEGER): number | undefined {
  const raw = queryString(value);
  if (raw === undefined) return undefined;
  const parsed = /^-?\d+$/.test(raw) ? Number(raw) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    throw new LifecycleError(validationError(`${name} must be an integer between ${min} and ${max}`, { field: name, value: raw }));
  }
  return parsed;
}
