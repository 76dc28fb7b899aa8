/**
 * Fault Injection Addon
 *
 * The hook object handed to the interception engine. Classifies each
 * exchange and routes it to the recorder and the injector.
 *
 * @module @fault-proxy/server/faults/addon
 */

import { createServiceLogger, wrapError } from '@fault-proxy/shared';
import { classifyRequest } from './classifier.js';
import type { CallRecorder } from './call-recorder.js';
import type { FaultInjector } from './injector.js';
import type { ExchangeFlow, ExchangeHooks } from './ports.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'fault-addon' },
);

export class FaultInjectionAddon implements ExchangeHooks {
  constructor(
    private readonly recorder: CallRecorder,
    private readonly injector: FaultInjector,
  ) {}

  async request(flow: ExchangeFlow): Promise<void> {
    const kind = classifyRequest(flow.request);

    try {
      switch (kind) {
        case 'CloudFetchDownload':
          this.recorder.recordCloudDownload(flow.request.url);
          await this.injector.inject(flow);
          return;
        case 'ThriftCall':
          this.recorder.recordThriftRequest(flow.request.body);
          return;
        case 'Other':
          return;
      }
    } catch (error) {
      // Never let a hook fault reach the proxied client
      logger.error('Request hook failed', wrapError(error), { kind, url: flow.request.url });
    }
  }

  response(flow: ExchangeFlow): void {
    if (!flow.response || classifyRequest(flow.request) !== 'ThriftCall') {
      return;
    }

    try {
      this.recorder.inspectThriftResponse(flow.response.body);
    } catch (error) {
      logger.error('Response hook failed', wrapError(error), { url: flow.request.url });
    }
  }
}
