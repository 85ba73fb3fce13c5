import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { ERROR_CODES, type ErrorCategory } from '@relaydesk/shared';
import { AppError } from '../errors.js';
import { createLogger } from '../utils/logger.js';

const log = createLogger('http');

/**
 * API error response format
 */
export interface ApiErrorResponse {
  status: number;
  code: string;
  errorCode: number;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Get HTTP status code for error category
 */
function getHttpStatusForCategory(category: ErrorCategory): number {
  switch (category) {
    case 'validation':
      return 400;
    case 'not_found':
      return 404;
    case 'conflict':
      return 409;
    case 'timeout':
      return 504;
    case 'publish':
    case 'storage':
      return 503;
    case 'system':
    default:
      return 500;
  }
}

function formatErrorResponse(error: unknown): ApiErrorResponse {
  if (error instanceof AppError) {
    return {
      status: getHttpStatusForCategory(error.errorCode.category),
      code: error.errorCode.name,
      errorCode: error.errorCode.code,
      message: error.message,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    const invalid = ERROR_CODES.INVALID_PAYLOAD;
    return {
      status: 400,
      code: invalid.name,
      errorCode: invalid.code,
      message: 'Request validation failed',
      details: {
        issues: error.issues.map((issue) => ({
          field: issue.path.join('.'),
          message: issue.message,
        })),
      },
    };
  }

  // Unknown error - treat as internal server error
  const internalError = ERROR_CODES.INTERNAL_ERROR;
  return {
    status: 500,
    code: internalError.name,
    errorCode: internalError.code,
    message: process.env.NODE_ENV === 'production' || !(error instanceof Error)
      ? internalError.description
      : error.message || internalError.description,
  };
}

/**
 * Global error handler middleware
 *
 * Must be registered last in the middleware chain.
 */
export function globalErrorHandler() {
  return (err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const response = formatErrorResponse(err);

    if (response.status >= 500) {
      log.error({ err, method: req.method, path: req.path }, 'Request failed');
    } else {
      log.warn({ code: response.code, method: req.method, path: req.path }, response.message);
    }

    res.status(response.status).json(response);
  };
}

/**
 * Not found handler - for routes that don't exist
 */
export function notFoundHandler() {
  return (req: Request, _res: Response, next: NextFunction) => {
    next(new AppError('NOT_FOUND', `Route ${req.method} ${req.path} not found`));
  };
}

/**
 * Async handler wrapper - catches async errors and passes to error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * Success response helper
 */
export function sendSuccess<T>(
  res: Response,
  data: T,
  status: number = 200
): void {
  res.status(status).json(data);
}
