/**
 * API Module
 *
 * Re-exports the control API routers and handlers
 * @module @fault-proxy/server/api
 */

export {
  createControlRouter,
  createHealthCheck,
  requestLoggingMiddleware,
  errorHandlingMiddleware,
  notFoundHandler,
  type ControlRouterOptions,
} from './router.js';

export {
  createScenariosRouter,
  createScenarioHandlers,
  type ScenarioHandlers,
} from './scenarios.js';

export {
  createThriftCallsRouter,
  createThriftCallHandlers,
  type ThriftCallHandlers,
} from './thrift-calls.js';

export * from './serializers.js';
export { sendError } from './responses.js';
