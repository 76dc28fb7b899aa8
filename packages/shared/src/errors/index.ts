/**
 * Error classes for the fault proxy
 * @module @fault-proxy/shared/errors
 */

// Base error
export {
  FaultProxyError,
  ErrorCode,
  isFaultProxyError,
  statusCodeFor,
  wrapError,
} from './base-error.js';

export type { ErrorMeta } from './base-error.js';

// Validation errors
export {
  ValidationError,
  isValidationError,
  validResult,
  invalidResult,
} from './validation-error.js';

export type {
  ValidationErrorDetail,
  ValidationResult,
} from './validation-error.js';

// Resource errors
export { NotFoundError, isNotFoundError } from './not-found-error.js';

// Protocol errors
export { DecodeError, isDecodeError } from './decode-error.js';
