/**
 * API middleware: error handling.
 */

import { Request, Response, NextFunction } from 'express';
import {
  MetricsError,
  RunnerError,
  StoreError,
  TypedError,
  apiError,
  createTypedError,
} from '../domain/errors';
import { logger } from '../logger';

/** Error classes thrown by the store, the collector and the runner carry a typed payload. */
function typedErrorOf(err: unknown): TypedError | undefined {
  if (err instanceof StoreError || err instanceof MetricsError || err instanceof RunnerError) {
    return err.typedError;
  }
  return undefined;
}

/** Global error handling middleware. */
export function errorHandler(err: unknown, _req: Request, res: Response, _next: NextFunction) {
  const typedError = typedErrorOf(err);
  if (typedError) {
    const status = getHttpStatus(typedError);
    logger.warn('Request error', { code: typedError.code, status });
    res.status(status).json(apiError(typedError));
    return;
  }

  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  logger.error('Unhandled request error', {
    message,
    stack: err instanceof Error ? err.stack : undefined,
  });

  res.status(500).json(apiError(createTypedError({ code: 'SYSTEM.INTERNAL', message })));
}

export function getHttpStatus(error: TypedError): number {
  if (error.code.endsWith('NOT_FOUND')) return 404;
  return 500;
}
