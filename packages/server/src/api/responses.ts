/**
 * Shared response helpers for the control API
 * @module @fault-proxy/server/api/responses
 */

import type { Response } from 'express';
import { wrapError, type Logger } from '@fault-proxy/shared';

/**
 * Send an error as `{ error }` with the status its code maps to.
 * Unknown faults become 500.
 */
export function sendError(res: Response, error: unknown, logger: Logger): void {
  const fault = wrapError(error);

  if (fault.isServerError()) {
    logger.error('Control request failed', fault);
  } else {
    logger.warn('Control request rejected', { error: fault.message, code: fault.code });
  }

  res.status(fault.statusCode).json({ error: fault.message });
}
