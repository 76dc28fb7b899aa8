/**
 * Scenario Registry
 *
 * Static catalog of scenario templates plus their mutable enabled state.
 * All reads and writes go through the critical section shared with the
 * call history, so control-plane writes and proxy-callback reads never
 * observe a partial update.
 *
 * @module @fault-proxy/server/faults/scenario-registry
 */

import {
  NotFoundError,
  validateOverridesForAction,
  createServiceLogger,
  type ScenarioConfig,
  type ScenarioOverrides,
  type ScenarioStatus,
  type ScenarioSummary,
  type ScenarioTemplate,
  type TargetOperation,
} from '@fault-proxy/shared';
import { CriticalSection } from './critical-section.js';
import { CallHistory } from './call-history.js';
import {
  DEFAULT_DELAY_SECONDS,
  DEFAULT_ERROR_MESSAGE,
  DEFAULT_ERROR_STATUS,
} from './scenario-catalog.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'scenario-registry' },
);

/**
 * An enabled scenario as seen at lookup time
 */
export interface EnabledScenario {
  name: string;
  config: ScenarioConfig;
}

/**
 * Build the effective config of a template with overrides applied and
 * action defaults filled in. Always returns a fresh object.
 */
export function mergeScenarioConfig(
  template: ScenarioTemplate,
  overrides: ScenarioOverrides,
): ScenarioConfig {
  const base = { description: template.description, operation: template.operation };

  switch (template.action) {
    case 'delay':
      return {
        ...base,
        action: 'delay',
        durationSeconds:
          overrides.durationSeconds ?? template.durationSeconds ?? DEFAULT_DELAY_SECONDS,
      };
    case 'return_error':
      return {
        ...base,
        action: 'return_error',
        statusCode: template.statusCode ?? DEFAULT_ERROR_STATUS,
        message: template.message ?? DEFAULT_ERROR_MESSAGE,
      };
    case 'expire_cloud_link':
      return { ...base, action: 'expire_cloud_link' };
    case 'close_connection':
      return { ...base, action: 'close_connection' };
  }
}

export class ScenarioRegistry {
  private readonly templates = new Map<string, ScenarioTemplate>();
  private readonly states = new Map<string, ScenarioConfig>();

  constructor(
    templates: readonly ScenarioTemplate[],
    private readonly history: CallHistory,
    private readonly section: CriticalSection,
  ) {
    for (const template of templates) {
      if (this.templates.has(template.name)) {
        throw new Error(`Duplicate scenario name: ${template.name}`);
      }
      this.templates.set(template.name, template);
    }
  }

  private requireTemplate(name: string): ScenarioTemplate {
    const template = this.templates.get(name);
    if (!template) {
      throw NotFoundError.scenario(name);
    }
    return template;
  }

  has(name: string): boolean {
    return this.templates.has(name);
  }

  /**
   * All templates with their enabled flag, in registration order
   */
  list(): ScenarioSummary[] {
    return this.section.run(() =>
      Array.from(this.templates.values(), (template) => ({
        name: template.name,
        description: template.description,
        enabled: this.states.has(template.name),
      })),
    );
  }

  /**
   * Enable a scenario, replacing any previous state for it.
   * Enabling a CloudFetch scenario starts a fresh call history.
   *
   * @throws NotFoundError for an unknown name
   * @throws ValidationError for an override the scenario's action does not take
   */
  enable(name: string, overrides: ScenarioOverrides = {}): ScenarioConfig {
    const template = this.requireTemplate(name);
    const invalid = validateOverridesForAction(template.action, overrides);
    if (invalid) {
      throw invalid;
    }

    const config = mergeScenarioConfig(template, overrides);
    const cleared = this.section.run(() => {
      this.states.set(name, config);
      return template.operation === 'CloudFetchDownload' ? this.history.clear() : 0;
    });

    logger.info('Enabled scenario', { scenario: name, config, historyCleared: cleared });
    return { ...config };
  }

  /**
   * @throws NotFoundError for an unknown name
   */
  disable(name: string): void {
    this.requireTemplate(name);
    this.section.run(() => {
      this.states.delete(name);
    });
    logger.info('Disabled scenario', { scenario: name });
  }

  disableAll(): void {
    const count = this.section.run(() => {
      const enabled = this.states.size;
      this.states.clear();
      return enabled;
    });
    logger.info('Disabled all scenarios', { previouslyEnabled: count });
  }

  /**
   * @throws NotFoundError for an unknown name
   */
  status(name: string): ScenarioStatus {
    const template = this.requireTemplate(name);
    const config = this.section.run(() => this.states.get(name));
    return {
      name,
      description: template.description,
      enabled: config !== undefined,
      config: config ? { ...config } : null,
    };
  }

  /**
   * First enabled scenario targeting `operation`, in registration order
   */
  findFirstEnabled(operation: TargetOperation): EnabledScenario | null {
    return this.section.run(() => this.scanEnabled(operation));
  }

  /**
   * One-shot selection: find the first enabled scenario targeting `operation`
   * and disable it in the same critical section, so concurrent callers never
   * claim the same state twice.
   */
  claimFirstEnabled(operation: TargetOperation): EnabledScenario | null {
    const claimed = this.section.run(() => {
      const found = this.scanEnabled(operation);
      if (found) {
        this.states.delete(found.name);
      }
      return found;
    });
    if (claimed) {
      logger.info('Auto-disabled scenario', { scenario: claimed.name });
    }
    return claimed;
  }

  private scanEnabled(operation: TargetOperation): EnabledScenario | null {
    for (const template of this.templates.values()) {
      const config = this.states.get(template.name);
      if (config && config.operation === operation) {
        return { name: template.name, config };
      }
    }
    return null;
  }

  /**
   * Names of all templates, in registration order
   */
  names(): string[] {
    return Array.from(this.templates.keys());
  }
}
