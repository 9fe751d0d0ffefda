import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';

import { AppError, ThrottledError } from './app-error.js';

interface ErrorBody {
  code: string;
  message: string;
  traceId: string;
  details?: unknown;
}

function describeCause(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorHandler(error: unknown, request: Request, response: Response, next: NextFunction): void {
  if (response.headersSent) {
    next(error);
    return;
  }

  const traceId = typeof response.locals.traceId === 'string' ? response.locals.traceId : 'unknown-trace';

  if (error instanceof AppError) {
    const payload: ErrorBody = {
      code: error.code,
      message: error.message,
      traceId
    };

    if (error.details !== undefined) {
      payload.details = error.details;
    }

    if (error instanceof ThrottledError) {
      response.setHeader('Retry-After', String(error.retryAfterSeconds));
    }

    if (error.statusCode >= 500) {
      console.error(error.code === 'STORAGE_UNAVAILABLE' ? 'storage_unavailable' : 'request_failed', {
        traceId,
        method: request.method,
        path: request.path,
        code: error.code,
        cause: describeCause(error.cause ?? error)
      });
    }

    response.status(error.statusCode).json(payload);
    return;
  }

  if (error instanceof ZodError) {
    response.status(400).json({
      code: 'VALIDATION_ERROR',
      message: 'Request validation failed.',
      traceId,
      details: error.flatten()
    } satisfies ErrorBody);
    return;
  }

  // express.json() reports unparseable bodies as a SyntaxError carrying the raw body.
  if (error instanceof SyntaxError && 'body' in error) {
    response.status(400).json({
      code: 'INVALID_JSON',
      message: 'Request body is not valid JSON.',
      traceId
    } satisfies ErrorBody);
    return;
  }

  console.error('unhandled_error', {
    traceId,
    method: request.method,
    path: request.path,
    error: describeCause(error)
  });

  response.status(500).json({
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred.',
    traceId
  } satisfies ErrorBody);
}
