/**
 * Custom error classes
 *
 * The API taxonomy (unauthorized, rate limited, transient, not found,
 * invalid request) is what every remote call resolves to. Each class carries
 * a `kind` so results can be switched on without `instanceof`.
 */

export type ApiErrorKind =
  | 'unauthorized'
  | 'rate_limited'
  | 'transient'
  | 'not_found'
  | 'invalid_request';

export class PlaydeckError extends Error {
  public readonly timestamp: Date;
  public readonly context?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode?: number,
    public readonly originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PlaydeckError';
    this.timestamp = new Date();
    this.context = context;
    Object.setPrototypeOf(this, PlaydeckError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert error to JSON for logging
   */
  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      timestamp: this.timestamp.toISOString(),
      context: this.context,
      stack: this.stack,
    };
  }
}

// ============================================================================
// API taxonomy
// ============================================================================

export class UnauthorizedError extends PlaydeckError {
  public readonly kind = 'unauthorized' as const;

  constructor(message: string, originalError?: unknown, context?: Record<string, unknown>) {
    super(message, 'UNAUTHORIZED', 401, originalError, context);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, UnauthorizedError.prototype);
  }
}

export class RateLimitedError extends PlaydeckError {
  public readonly kind = 'rate_limited' as const;

  constructor(
    message: string,
    public readonly retryAfterMs: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'RATE_LIMITED', 429, undefined, context);
    this.name = 'RateLimitedError';
    Object.setPrototypeOf(this, RateLimitedError.prototype);
  }
}

export class TransientError extends PlaydeckError {
  public readonly kind = 'transient' as const;

  constructor(
    message: string,
    originalError?: unknown,
    context?: Record<string, unknown>,
    statusCode?: number
  ) {
    super(message, 'TRANSIENT', statusCode, originalError, context);
    this.name = 'TransientError';
    Object.setPrototypeOf(this, TransientError.prototype);
  }
}

export class NotFoundError extends PlaydeckError {
  public readonly kind = 'not_found' as const;

  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NOT_FOUND', 404, undefined, context);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

export class InvalidRequestError extends PlaydeckError {
  public readonly kind = 'invalid_request' as const;

  constructor(
    message: string,
    statusCode?: number,
    originalError?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'INVALID_REQUEST', statusCode, originalError, context);
    this.name = 'InvalidRequestError';
    Object.setPrototypeOf(this, InvalidRequestError.prototype);
  }
}

export type ApiError =
  | UnauthorizedError
  | RateLimitedError
  | TransientError
  | NotFoundError
  | InvalidRequestError;

// ============================================================================
// Local errors
// ============================================================================

export class QueueFullError extends PlaydeckError {
  constructor(
    message: string,
    public readonly capacity: number,
    context?: Record<string, unknown>
  ) {
    super(message, 'QUEUE_FULL', undefined, undefined, context);
    this.name = 'QueueFullError';
    Object.setPrototypeOf(this, QueueFullError.prototype);
  }
}

export class ValidationError extends PlaydeckError {
  constructor(
    message: string,
    public readonly validationErrors?: unknown,
    context?: Record<string, unknown>
  ) {
    super(message, 'VALIDATION_ERROR', undefined, validationErrors, context);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, ValidationError.prototype);
  }
}

export class StorageCorruptError extends PlaydeckError {
  constructor(message: string, originalError?: unknown, context?: Record<string, unknown>) {
    super(message, 'STORAGE_CORRUPT', undefined, originalError, context);
    this.name = 'StorageCorruptError';
    Object.setPrototypeOf(this, StorageCorruptError.prototype);
  }
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Type guard for the API taxonomy
 */
export function isApiError(error: unknown): error is ApiError {
  return (
    error instanceof UnauthorizedError ||
    error instanceof RateLimitedError ||
    error instanceof TransientError ||
    error instanceof NotFoundError ||
    error instanceof InvalidRequestError
  );
}

/**
 * Coerce anything thrown below the gateway into the API taxonomy.
 * Unknown failures count as transient, like a dropped connection.
 */
export function toApiError(error: unknown): ApiError {
  if (isApiError(error)) {
    return error;
  }
  if (error instanceof ValidationError) {
    return new InvalidRequestError(error.message, undefined, error);
  }
  const message = error instanceof Error ? error.message : String(error);
  return new TransientError(message, error);
}

export const SESSION_EXPIRED_MESSAGE = 'Session expired, re-authenticate';

/**
 * One-line message suitable for the status line
 */
export function describeError(error: ApiError): string {
  switch (error.kind) {
    case 'unauthorized':
      return SESSION_EXPIRED_MESSAGE;
    case 'rate_limited':
      return `Rate limited, retry in ${Math.ceil(error.retryAfterMs / 1000)}s`;
    case 'transient':
      return `Network error: ${error.message}`;
    case 'not_found':
      return `Not found: ${error.message}`;
    case 'invalid_request':
      return error.message;
  }
}
