/**
 * Fault Injector
 *
 * Runs once per CloudFetch download request, before it is forwarded. Claims the
 * first enabled CloudFetch scenario, disabling it so it fires exactly once,
 * then applies its action.
 *
 * @module @fault-proxy/server/faults/injector
 */

import { EventEmitter } from 'events';
import {
  createServiceLogger,
  sleep,
  wrapError,
  type ScenarioAction,
  type ScenarioConfig,
} from '@fault-proxy/shared';
import type { ExchangeFlow, SyntheticResponse } from './ports.js';
import type { ScenarioRegistry } from './scenario-registry.js';
import {
  DEFAULT_DELAY_SECONDS,
  DEFAULT_ERROR_MESSAGE,
  DEFAULT_ERROR_STATUS,
} from './scenario-catalog.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'fault-injector' },
);

/** Body of the synthesized expired-link response (Azure SAS error) */
export const EXPIRED_LINK_BODY =
  'AuthorizationQueryParametersError: Query Parameters are not supported for this operation';

/** Body of the response written before a connection is killed */
export const CONNECTION_RESET_BODY = 'Connection reset by peer';

/**
 * Emitted once per selected scenario
 */
export interface InjectionEvent {
  timestamp: Date;
  scenario: string;
  action: ScenarioAction;
  url: string;
  /** `failed_open` when an internal fault let the request through */
  outcome: 'applied' | 'failed_open';
  error?: string;
}

export function textResponse(statusCode: number, body: string): SyntheticResponse {
  return {
    statusCode,
    body,
    headers: { 'Content-Type': 'text/plain' },
  };
}

export class FaultInjector extends EventEmitter {
  constructor(private readonly registry: ScenarioRegistry) {
    super();
  }

  /**
   * Apply the first enabled CloudFetch scenario to `flow`.
   * Returns the name of the scenario that fired, or null when none was enabled.
   * Never rejects: internal faults leave the request unmodified.
   */
  async inject(flow: ExchangeFlow): Promise<string | null> {
    // Selected and disabled atomically: the scenario is spent before any await
    const claimed = this.registry.claimFirstEnabled('CloudFetchDownload');
    if (!claimed) {
      return null;
    }

    const { name, config } = claimed;
    const event: InjectionEvent = {
      timestamp: new Date(),
      scenario: name,
      action: config.action,
      url: flow.request.url,
      outcome: 'applied',
    };

    logger.info('Triggering scenario', { scenario: name, action: config.action, url: flow.request.url });

    try {
      await this.apply(config, flow);
    } catch (error) {
      const fault = wrapError(error);
      event.outcome = 'failed_open';
      event.error = fault.message;
      logger.error('Injection failed, forwarding request unmodified', fault, { scenario: name });
      this.revert(flow);
    }

    this.emit('injection', event);
    return name;
  }

  private async apply(
    config: ScenarioConfig,
    flow: ExchangeFlow,
  ): Promise<void> {
    switch (config.action) {
      case 'expire_cloud_link':
        flow.respond(textResponse(403, EXPIRED_LINK_BODY));
        return;

      case 'return_error':
        flow.respond(
          textResponse(
            config.statusCode ?? DEFAULT_ERROR_STATUS,
            config.message ?? DEFAULT_ERROR_MESSAGE,
          ),
        );
        return;

      case 'delay': {
        const seconds = config.durationSeconds ?? DEFAULT_DELAY_SECONDS;
        logger.info('Delaying request', { seconds, url: flow.request.url });
        await sleep(seconds * 1000);
        return;
      }

      case 'close_connection':
        flow.respond(textResponse(500, CONNECTION_RESET_BODY));
        flow.kill();
        return;
    }
  }

  private revert(flow: ExchangeFlow): void {
    try {
      flow.revert();
    } catch (error) {
      logger.error('Could not revert flow', wrapError(error), { url: flow.request.url });
    }
  }
}
