/**
 * Verification request validation
 * @module @fault-proxy/shared/validation/verification-validation
 */

import {
  ValidationError,
  validResult,
  invalidResult,
  type ValidationResult,
} from '../errors/validation-error.js';
import {
  VERIFICATION_TYPES,
  type VerificationRequest,
  type VerificationType,
} from '../types/verification.js';
import { isPlainObject } from '../utils/index.js';

function isVerificationType(value: string): value is VerificationType {
  return VERIFICATION_TYPES.some((type) => type === value);
}

function readMethods(body: Record<string, unknown>): ValidationResult<string[]> {
  const methods = body.methods;
  if (methods === undefined || methods === null) {
    return invalidResult(ValidationError.required('methods'));
  }
  if (!Array.isArray(methods)) {
    return invalidResult(ValidationError.invalidFormat('methods', 'an array of strings', methods));
  }
  const names: string[] = [];
  for (const entry of methods) {
    if (typeof entry !== 'string') {
      return invalidResult(ValidationError.invalidFormat('methods', 'an array of strings', methods));
    }
    names.push(entry);
  }
  return validResult(names);
}

function readMethod(body: Record<string, unknown>): ValidationResult<string> {
  const method = body.method;
  if (method === undefined || method === null || method === '') {
    return invalidResult(ValidationError.required('method'));
  }
  if (typeof method !== 'string') {
    return invalidResult(ValidationError.invalidFormat('method', 'a string', method));
  }
  return validResult(method);
}

function readCount(body: Record<string, unknown>): ValidationResult<number> {
  const count = body.count;
  if (count === undefined || count === null) {
    return invalidResult(ValidationError.required('count'));
  }
  if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
    return invalidResult(ValidationError.invalidFormat('count', 'a non-negative integer', count));
  }
  return validResult(count);
}

/**
 * Parse the JSON body of a verify request into a typed assertion
 */
export function validateVerificationRequest(body: unknown): ValidationResult<VerificationRequest> {
  if (!isPlainObject(body)) {
    return invalidResult(ValidationError.required('body'));
  }

  const type = body.type;
  if (type === undefined || type === null || type === '') {
    return invalidResult(ValidationError.required('type'));
  }
  if (typeof type !== 'string' || !isVerificationType(type)) {
    return invalidResult(ValidationError.invalidValue('verification type', type, VERIFICATION_TYPES));
  }

  switch (type) {
    case 'exact_sequence':
    case 'contains_sequence': {
      const methods = readMethods(body);
      if (!methods.valid) return methods;
      return validResult({ type, methods: methods.value });
    }
    case 'method_count': {
      const method = readMethod(body);
      if (!method.valid) return method;
      const count = readCount(body);
      if (!count.valid) return count;
      return validResult({ type, method: method.value, count: count.value });
    }
    case 'method_exists': {
      const method = readMethod(body);
      if (!method.valid) return method;
      return validResult({ type, method: method.value });
    }
  }
}
