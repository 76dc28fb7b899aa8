/**
 * Control API Router
 *
 * Combines the scenario and call-history routes into the control API the
 * test harness talks to.
 * @module @fault-proxy/server/api/router
 */

import express, { Router, type Request, type Response, type NextFunction } from 'express';
import { createServiceLogger, generateCorrelationId } from '@fault-proxy/shared';
import type { FaultInjectionState } from '../faults/state.js';
import { createScenariosRouter } from './scenarios.js';
import { createThriftCallsRouter } from './thrift-calls.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'control-api' },
);

/**
 * Control router options
 */
export interface ControlRouterOptions {
  /** Enable request logging */
  enableLogging?: boolean;
}

interface HealthCheckResponse {
  status: 'healthy';
  timestamp: string;
  uptime: number;
  scenariosEnabled: number;
  historySize: number;
}

/**
 * Server start time for uptime calculation
 */
const startTime = Date.now();

/**
 * GET /health
 */
export function createHealthCheck(state: FaultInjectionState) {
  return (_req: Request, res: Response): void => {
    const response: HealthCheckResponse = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - startTime) / 1000),
      scenariosEnabled: state.registry.list().filter((s) => s.enabled).length,
      historySize: state.history.size(),
    };
    res.status(200).json(response);
  };
}

/**
 * Request logging middleware
 */
export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' && header ? header : generateCorrelationId();
  const started = Date.now();

  res.setHeader('X-Correlation-ID', correlationId);
  const requestLogger = logger.withCorrelationId(correlationId);

  res.on('finish', () => {
    const meta = {
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - started,
    };
    if (res.statusCode >= 400) {
      requestLogger.warn('Request completed', meta);
    } else {
      requestLogger.info('Request completed', meta);
    }
  });

  next();
}

/**
 * Body-parser failures carry an HTTP status; anything else is an internal fault
 */
function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null || !('status' in err)) {
    return null;
  }
  const status = err.status;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

/**
 * Error handling middleware
 */
export function errorHandlingMiddleware(
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction,
): void {
  const status = clientErrorStatus(err);
  if (status !== null) {
    logger.warn('Malformed control request', { method: req.method, path: req.path, status });
    res.status(status).json({ error: 'Malformed request body' });
    return;
  }

  const error = err instanceof Error ? err : new Error(String(err));
  logger.error('Unhandled error', error, { method: req.method, path: req.path });
  res.status(500).json({ error: error.message });
}

/**
 * 404 Not Found handler
 */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({ error: `Route ${req.method} ${req.path} not found` });
}

/**
 * Create the control API router
 */
export function createControlRouter(
  state: FaultInjectionState,
  options: ControlRouterOptions = {},
): Router {
  const { enableLogging = true } = options;
  const router = Router();

  if (enableLogging) {
    router.use(requestLoggingMiddleware);
  }

  // Parsed here so malformed bodies reach this router's error handler
  router.use(express.json({ limit: '1mb' }));

  router.get('/health', createHealthCheck(state));
  router.use('/scenarios', createScenariosRouter(state.registry));
  router.use('/thrift/calls', createThriftCallsRouter(state.history, state.verifier));

  router.use(notFoundHandler);
  router.use(errorHandlingMiddleware);

  logger.info('Control router initialized', {
    routes: ['/health', '/scenarios', '/thrift/calls'],
    scenarios: state.registry.names().length,
  });

  return router;
}
