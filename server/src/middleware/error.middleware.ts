/**
 * Centralized Error Middleware
 * Maps broker errors to HTTP statuses without leaking internals
 */

import type { Request, Response, NextFunction } from 'express';
import {
  BackendUnavailableError,
  InvalidChangeError
} from '../lib/errors/broker-errors.js';

const isProd = process.env.NODE_ENV === 'production';

/**
 * Application Error - structured error with HTTP metadata
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500,
    public readonly code: string = 'INTERNAL_ERROR',
    public readonly details?: unknown,
    public readonly exposeMessage: boolean = false
  ) {
    super(message);
    this.name = 'AppError';
    Error.captureStackTrace(this, this.constructor);
  }
}

interface ErrorResponse {
  error: string;
  code: string;
  traceId: string;
  details?: unknown;
}

/**
 * Translate domain errors into AppErrors; anything unknown stays a 500
 */
export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof InvalidChangeError) {
    return createValidationError(err.message, err.details);
  }
  if (err instanceof BackendUnavailableError) {
    return new AppError(err.message, 503, err.code, undefined, true);
  }
  if (isBodyParserError(err)) {
    return createValidationError('Request body is not valid JSON');
  }
  return new AppError(err instanceof Error ? err.message : String(err));
}

function isBodyParserError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Must be registered LAST (after all routes)
 */
export function errorMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(err);
  }

  const appError = toAppError(err);
  const traceId = req.traceId || 'unknown';

  const logContext = {
    error: {
      name: appError.name,
      message: appError.message,
      code: appError.code,
      statusCode: appError.statusCode,
      ...(appError.statusCode >= 500 && { stack: appError.stack }),
    },
    method: req.method,
    path: req.path,
  };

  if (appError.statusCode >= 500) {
    req.log.error(logContext, 'Request error');
  } else {
    req.log.warn(logContext, 'Request error');
  }

  const response: ErrorResponse = {
    error: appError.exposeMessage || !isProd ? appError.message : getGenericMessage(appError.statusCode),
    code: appError.code,
    traceId,
  };

  if (appError.details !== undefined && appError.exposeMessage) {
    response.details = appError.details;
  }

  res.status(appError.statusCode).json(response);
}

function getGenericMessage(statusCode: number): string {
  switch (statusCode) {
    case 400:
      return 'Invalid request';
    case 401:
      return 'Unauthorized';
    case 404:
      return 'Not found';
    case 503:
      return 'Service unavailable';
    default:
      return statusCode >= 500 ? 'Internal server error' : 'Bad request';
  }
}

export function createValidationError(message: string, details?: unknown): AppError {
  return new AppError(message, 400, 'VALIDATION_ERROR', details, true);
}
