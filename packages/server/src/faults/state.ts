/**
 * Fault Injection State
 *
 * Owns the shared state (scenario states and call history, behind one
 * critical section) and the components operating on it. One instance per
 * proxy process; passed explicitly to the control API and the data plane.
 *
 * @module @fault-proxy/server/faults/state
 */

import type { ScenarioTemplate } from '@fault-proxy/shared';
import { CriticalSection } from './critical-section.js';
import { CallHistory, DEFAULT_MAX_HISTORY } from './call-history.js';
import { ScenarioRegistry } from './scenario-registry.js';
import { SCENARIO_CATALOG } from './scenario-catalog.js';
import { CallRecorder } from './call-recorder.js';
import { FaultInjector } from './injector.js';
import { CallVerifier } from './verifier.js';
import { FaultInjectionAddon } from './addon.js';
import type { ThriftDecoder } from './ports.js';

export interface FaultInjectionOptions {
  /** History capacity (default 1000) */
  maxHistory?: number;
  /** Scenario catalog (default: the CloudFetch catalog) */
  templates?: readonly ScenarioTemplate[];
  /** Thrift decoder; without one Thrift payloads are not recorded */
  decoder?: ThriftDecoder | null;
}

export interface FaultInjectionState {
  section: CriticalSection;
  history: CallHistory;
  registry: ScenarioRegistry;
  recorder: CallRecorder;
  injector: FaultInjector;
  verifier: CallVerifier;
  addon: FaultInjectionAddon;
}

export function createFaultInjectionState(options: FaultInjectionOptions = {}): FaultInjectionState {
  const section = new CriticalSection();
  const history = new CallHistory(section, options.maxHistory ?? DEFAULT_MAX_HISTORY);
  const registry = new ScenarioRegistry(options.templates ?? SCENARIO_CATALOG, history, section);
  const recorder = new CallRecorder(history, options.decoder ?? null);
  const injector = new FaultInjector(registry);
  const verifier = new CallVerifier(history);
  const addon = new FaultInjectionAddon(recorder, injector);

  return { section, history, registry, recorder, injector, verifier, addon };
}
