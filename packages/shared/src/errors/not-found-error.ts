/**
 * Not-found error class
 * @module @fault-proxy/shared/errors/not-found-error
 */

import { FaultProxyError, ErrorCode } from './base-error.js';

/**
 * Raised when a named resource (such as a scenario) does not exist
 */
export class NotFoundError extends FaultProxyError {
  constructor(resourceType: string, resourceId: string) {
    super(`${resourceType} not found: ${resourceId}`, ErrorCode.NOT_FOUND, {
      resourceType,
      resourceId,
    });
    this.name = 'NotFoundError';
  }

  /**
   * Create for an unknown scenario name
   */
  static scenario(name: string): NotFoundError {
    return new NotFoundError('Scenario', name);
  }
}

/**
 * Check if an error is a NotFoundError
 */
export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}
