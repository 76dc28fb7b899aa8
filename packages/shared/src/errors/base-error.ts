/**
 * Base error class with error codes
 * @module @fault-proxy/shared/errors/base-error
 */

/**
 * Error codes for categorization
 */
export enum ErrorCode {
  // General errors (1xxx)
  UNKNOWN = 1000,
  INTERNAL = 1001,

  // Validation errors (2xxx)
  VALIDATION_FAILED = 2000,
  INVALID_INPUT = 2001,
  MISSING_REQUIRED_FIELD = 2002,
  INVALID_FORMAT = 2003,
  UNKNOWN_FIELD = 2005,

  // Resource errors (5xxx)
  NOT_FOUND = 5000,

  // Protocol errors (6xxx)
  DECODE_FAILED = 6000,
}

/**
 * Error metadata for additional context
 */
export interface ErrorMeta {
  /** Resource type involved */
  resourceType?: string;
  /** Resource ID involved */
  resourceId?: string;
  /** Field that caused the error */
  field?: string;
  /** Additional context */
  [key: string]: unknown;
}

/**
 * Base error class for all fault proxy errors
 */
export class FaultProxyError extends Error {
  /** Error code for categorization */
  public readonly code: ErrorCode;
  /** HTTP status code equivalent */
  public readonly statusCode: number;
  /** Error metadata */
  public readonly meta: ErrorMeta;
  /** Timestamp when error occurred */
  public readonly timestamp: Date;
  /** Original error if this wraps another */
  public override readonly cause?: Error;

  constructor(
    message: string,
    code: ErrorCode = ErrorCode.UNKNOWN,
    meta: ErrorMeta = {},
    cause?: Error,
  ) {
    super(message);
    this.name = 'FaultProxyError';
    this.code = code;
    this.meta = meta;
    this.timestamp = new Date();
    this.cause = cause;
    this.statusCode = statusCodeFor(code);

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Convert to JSON for API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      error: this.message,
      code: this.code,
      meta: this.meta,
      timestamp: this.timestamp.toISOString(),
    };
  }

  /**
   * Check if this is a server error (5xx)
   */
  isServerError(): boolean {
    return this.statusCode >= 500;
  }
}

/**
 * Map error code to HTTP status code
 */
export function statusCodeFor(code: ErrorCode): number {
  const codeCategory = Math.floor(code / 1000);

  switch (codeCategory) {
    case 2: // Validation
      return 400;
    case 5: // Resource
      if (code === ErrorCode.NOT_FOUND) {
        return 404;
      }
      return 400;
    case 6: // Protocol
      return 422;
    default:
      return 500;
  }
}

/**
 * Check if an error is a FaultProxyError
 */
export function isFaultProxyError(error: unknown): error is FaultProxyError {
  return error instanceof FaultProxyError;
}

/**
 * Wrap an unknown error as a FaultProxyError
 */
export function wrapError(error: unknown, code: ErrorCode = ErrorCode.INTERNAL): FaultProxyError {
  if (isFaultProxyError(error)) {
    return error;
  }

  if (error instanceof Error) {
    return new FaultProxyError(error.message, code, {}, error);
  }

  return new FaultProxyError(String(error), code);
}
