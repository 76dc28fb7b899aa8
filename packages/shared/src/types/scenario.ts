/**
 * Fault scenario types
 * @module @fault-proxy/shared/types/scenario
 */

/**
 * Traffic classes the proxy distinguishes
 */
export type OperationKind = 'CloudFetchDownload' | 'ThriftCall' | 'Other';

/**
 * Operations a scenario may target
 */
export type TargetOperation = Exclude<OperationKind, 'Other'>;

/**
 * Fault actions
 */
export type ScenarioAction = 'expire_cloud_link' | 'return_error' | 'delay' | 'close_connection';

/**
 * Action-specific parameters, discriminated by `action`.
 * Omitted parameters fall back to the action's defaults when a scenario is enabled.
 */
export type ScenarioParams =
  | { action: 'expire_cloud_link' }
  | { action: 'return_error'; statusCode?: number; message?: string }
  | { action: 'delay'; durationSeconds?: number }
  | { action: 'close_connection' };

/**
 * Effective configuration of a scenario: template defaults with overrides applied
 */
export type ScenarioConfig = ScenarioParams & {
  description: string;
  operation: TargetOperation;
};

/**
 * Immutable scenario definition registered at startup
 */
export type ScenarioTemplate = ScenarioConfig & {
  /** Unique scenario name */
  readonly name: string;
};

/**
 * Runtime overrides accepted by `enable`
 */
export interface ScenarioOverrides {
  /** Delay length in whole seconds (delay scenarios only) */
  durationSeconds?: number;
}

/**
 * Override keys each action accepts
 */
export const OVERRIDE_KEYS_BY_ACTION: Readonly<Record<ScenarioAction, readonly (keyof ScenarioOverrides)[]>> = {
  expire_cloud_link: [],
  return_error: [],
  delay: ['durationSeconds'],
  close_connection: [],
};

/**
 * Scenario entry returned by `list`
 */
export interface ScenarioSummary {
  name: string;
  description: string;
  enabled: boolean;
}

/**
 * Scenario state returned by `status`
 */
export interface ScenarioStatus extends ScenarioSummary {
  /** Effective config, null while disabled */
  config: ScenarioConfig | null;
}
