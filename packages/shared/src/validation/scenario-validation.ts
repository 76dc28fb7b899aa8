/**
 * Scenario enable-request validation
 * @module @fault-proxy/shared/validation/scenario-validation
 */

import {
  ValidationError,
  validResult,
  invalidResult,
  type ValidationResult,
} from '../errors/validation-error.js';
import {
  OVERRIDE_KEYS_BY_ACTION,
  type ScenarioAction,
  type ScenarioOverrides,
} from '../types/scenario.js';
import { isPlainObject } from '../utils/index.js';

/**
 * Wire name of each override key
 */
const OVERRIDE_WIRE_KEYS: Record<keyof ScenarioOverrides, string> = {
  durationSeconds: 'duration_seconds',
};

const ACCEPTED_WIRE_KEYS = Object.values(OVERRIDE_WIRE_KEYS);

/**
 * Check for a positive whole number
 */
export function isPositiveInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0;
}

/**
 * Parse the JSON body of an enable request.
 * A missing or empty body means "no overrides".
 */
export function validateScenarioOverrides(body: unknown): ValidationResult<ScenarioOverrides> {
  if (body === undefined || body === null) {
    return validResult({});
  }

  if (!isPlainObject(body)) {
    return invalidResult(ValidationError.invalidFormat('body', 'a JSON object', body));
  }

  const overrides: ScenarioOverrides = {};

  for (const [key, value] of Object.entries(body)) {
    if (key === OVERRIDE_WIRE_KEYS.durationSeconds) {
      if (!isPositiveInteger(value)) {
        return invalidResult(
          ValidationError.invalidFormat('duration_seconds', 'a positive integer', value),
        );
      }
      overrides.durationSeconds = value;
      continue;
    }
    return invalidResult(ValidationError.unknownField(key, ACCEPTED_WIRE_KEYS));
  }

  return validResult(overrides);
}

/**
 * Check that every supplied override applies to the scenario's action
 */
export function validateOverridesForAction(
  action: ScenarioAction,
  overrides: ScenarioOverrides,
): ValidationError | null {
  const accepted = OVERRIDE_KEYS_BY_ACTION[action];
  for (const key of Object.keys(OVERRIDE_WIRE_KEYS)) {
    if (!isOverrideKey(key) || overrides[key] === undefined) continue;
    if (!accepted.includes(key)) {
      return ValidationError.unknownField(
        OVERRIDE_WIRE_KEYS[key],
        accepted.map((k) => OVERRIDE_WIRE_KEYS[k]),
      );
    }
  }
  return null;
}

function isOverrideKey(key: string): key is keyof ScenarioOverrides {
  return key in OVERRIDE_WIRE_KEYS;
}
