/**
 * Call History Endpoints
 *
 * Read, reset and verify the recorded call history.
 * @module @fault-proxy/server/api/thrift-calls
 */

import { Router, type Request, type Response } from 'express';
import {
  createServiceLogger,
  generateCorrelationId,
  validateVerificationRequest,
} from '@fault-proxy/shared';
import type { CallHistory } from '../faults/call-history.js';
import type { CallVerifier } from '../faults/verifier.js';
import { serializeCallRecord, serializeVerificationResult } from './serializers.js';
import { sendError } from './responses.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'api-thrift-calls' },
);

export interface ThriftCallHandlers {
  listCalls(req: Request, res: Response): void;
  resetCalls(req: Request, res: Response): void;
  verifyCalls(req: Request, res: Response): void;
}

export function createThriftCallHandlers(
  history: CallHistory,
  verifier: CallVerifier,
): ThriftCallHandlers {
  return {
    /**
     * GET /thrift/calls
     */
    listCalls(_req, res) {
      const calls = history.snapshot().map(serializeCallRecord);
      res.status(200).json({
        calls,
        count: calls.length,
        max_history: history.capacity,
      });
    },

    /**
     * POST /thrift/calls/reset
     */
    resetCalls(_req, res) {
      const removed = history.clear();
      logger.info('Call history reset', { removed });
      res.status(200).json({ message: 'Call history reset', count: 0 });
    },

    /**
     * POST /thrift/calls/verify - body `{ type, ... }`
     */
    verifyCalls(req, res) {
      const requestLogger = logger.withCorrelationId(generateCorrelationId());
      const parsed = validateVerificationRequest(req.body);
      if (!parsed.valid) {
        sendError(res, parsed.error, requestLogger);
        return;
      }

      try {
        const result = verifier.verify(parsed.value);
        requestLogger.info('Verification evaluated', {
          type: result.type,
          verified: result.verified,
        });
        res.status(200).json(serializeVerificationResult(result));
      } catch (error) {
        sendError(res, error, requestLogger);
      }
    },
  };
}

export function createThriftCallsRouter(history: CallHistory, verifier: CallVerifier): Router {
  const router = Router();
  const handlers = createThriftCallHandlers(history, verifier);

  router.get('/', handlers.listCalls);
  router.post('/reset', handlers.resetCalls);
  router.post('/verify', handlers.verifyCalls);

  return router;
}
