import {
  ERROR_CODES,
  type ErrorCode,
  type ErrorCodeDefinition,
} from '@relaydesk/shared';

/**
 * Base application error carrying a registry code
 */
export class AppError extends Error {
  public readonly errorCode: ErrorCodeDefinition;
  public readonly details?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message?: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    const errorDef = ERROR_CODES[code];
    super(message || errorDef.description, options);
    this.name = 'AppError';
    this.errorCode = errorDef;
    this.details = details;
  }

  get retryable(): boolean {
    return this.errorCode.retryable;
  }
}

/**
 * Validation error (payload, content or status rejected)
 */
export class ValidationError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = 'INVALID_PAYLOAD'
  ) {
    super(code, message, details);
    this.name = 'ValidationError';
  }
}

/**
 * Missing entity
 */
export class NotFoundError extends AppError {
  constructor(
    resource: string,
    id?: string,
    code: ErrorCode = 'NOT_FOUND'
  ) {
    super(code, id ? `${resource} not found: ${id}` : `${resource} not found`, {
      resource,
      id,
    });
    this.name = 'NotFoundError';
  }
}

export class UnsupportedPlatformError extends AppError {
  constructor(platform: string) {
    super('UNSUPPORTED_PLATFORM', `unsupported platform: ${platform}`, { platform });
    this.name = 'UnsupportedPlatformError';
  }
}

export class TimeoutError extends AppError {
  constructor(label: string, timeoutMs: number) {
    super('PROCESSING_TIMEOUT', `${label} timed out after ${timeoutMs}ms`, {
      label,
      timeoutMs,
    });
    this.name = 'TimeoutError';
  }
}

export class PublishError extends AppError {
  constructor(topic: string, cause: unknown) {
    super(
      'PUBLISH_FAILED',
      `failed to publish to ${topic}: ${errorMessage(cause)}`,
      { topic },
      { cause }
    );
    this.name = 'PublishError';
  }
}

/**
 * AppErrors follow their registry flag; anything else is treated as transient
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.retryable;
  }
  return true;
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
