/**
 * Validation error class
 * @module @fault-proxy/shared/errors/validation-error
 */

import { FaultProxyError, ErrorCode, type ErrorMeta } from './base-error.js';

/**
 * Validation error detail
 */
export interface ValidationErrorDetail {
  /** Field that failed validation */
  field: string;
  /** Error message */
  message: string;
  /** Validation rule that failed */
  rule?: string;
  /** Expected value/format */
  expected?: string;
  /** Actual value received */
  received?: unknown;
}

/**
 * Validation error for input validation failures
 */
export class ValidationError extends FaultProxyError {
  /** Validation error details */
  public readonly details: ValidationErrorDetail[];

  constructor(
    message: string,
    details: ValidationErrorDetail[] = [],
    meta: ErrorMeta = {},
    code: ErrorCode = ErrorCode.VALIDATION_FAILED,
  ) {
    super(message, code, meta);
    this.name = 'ValidationError';
    this.details = details;
  }

  /**
   * Create for a required field
   */
  static required(field: string): ValidationError {
    return new ValidationError(
      `Missing required field: ${field}`,
      [{ field, message: 'This field is required', rule: 'required' }],
      { field },
      ErrorCode.MISSING_REQUIRED_FIELD,
    );
  }

  /**
   * Create for an invalid format
   */
  static invalidFormat(
    field: string,
    expected: string,
    received?: unknown,
  ): ValidationError {
    return new ValidationError(
      `Invalid format for field: ${field} (expected ${expected})`,
      [{ field, message: `Expected ${expected}`, rule: 'format', expected, received }],
      { field },
      ErrorCode.INVALID_FORMAT,
    );
  }

  /**
   * Create for a field the target does not accept
   */
  static unknownField(field: string, accepted: readonly string[]): ValidationError {
    const expected = accepted.length > 0 ? accepted.join(', ') : 'no fields';
    return new ValidationError(
      `Unrecognized field: ${field}`,
      [{ field, message: `Accepted fields: ${expected}`, rule: 'known-field', expected }],
      { field },
      ErrorCode.UNKNOWN_FIELD,
    );
  }

  /**
   * Create for a value outside an accepted set
   */
  static invalidValue(
    field: string,
    received: unknown,
    accepted: readonly string[],
  ): ValidationError {
    return new ValidationError(
      `Unknown ${field}: ${String(received)}`,
      [{ field, message: `Must be one of: ${accepted.join(', ')}`, rule: 'enum', received }],
      { field },
      ErrorCode.INVALID_INPUT,
    );
  }

  /**
   * Create from multiple field errors
   */
  static multiple(errors: ValidationErrorDetail[]): ValidationError {
    const fieldNames = errors.map(e => e.field).join(', ');
    return new ValidationError(
      `Validation failed for fields: ${fieldNames}`,
      errors,
    );
  }

  /**
   * Check if a specific field has an error
   */
  hasFieldError(field: string): boolean {
    return this.details.some(d => d.field === field);
  }

  /**
   * Convert to JSON for API responses
   */
  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      details: this.details,
    };
  }
}

/**
 * Check if an error is a ValidationError
 */
export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError;
}

/**
 * Validation result type
 */
export type ValidationResult<T> =
  | { valid: true; value: T }
  | { valid: false; error: ValidationError };

/**
 * Create a successful validation result
 */
export function validResult<T>(value: T): ValidationResult<T> {
  return { valid: true, value };
}

/**
 * Create a failed validation result
 */
export function invalidResult<T>(error: ValidationError): ValidationResult<T> {
  return { valid: false, error };
}
