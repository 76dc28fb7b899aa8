/**
 * Request validation
 * @module @fault-proxy/shared/validation
 */

export {
  isPositiveInteger,
  validateScenarioOverrides,
  validateOverridesForAction,
} from './scenario-validation.js';

export { validateVerificationRequest } from './verification-validation.js';
