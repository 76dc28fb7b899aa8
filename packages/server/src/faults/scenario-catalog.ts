/**
 * Scenario Catalog
 *
 * The fixed set of CloudFetch failure scenarios, in registration order.
 * Registration order decides which scenario wins when several are enabled.
 *
 * @module @fault-proxy/server/faults/scenario-catalog
 */

import type { ScenarioTemplate } from '@fault-proxy/shared';

/** Default suspension when a delay scenario carries no duration */
export const DEFAULT_DELAY_SECONDS = 5;

/** Defaults for return_error when a scenario carries no status */
export const DEFAULT_ERROR_STATUS = 500;
export const DEFAULT_ERROR_MESSAGE = 'Internal Server Error';

function httpErrorScenario(statusCode: number, message: string, reason: string): ScenarioTemplate {
  return {
    name: `cloudfetch_${statusCode}`,
    description: `CloudFetch returns ${statusCode} ${message} (${reason})`,
    operation: 'CloudFetchDownload',
    action: 'return_error',
    statusCode,
    message,
  };
}

export const SCENARIO_CATALOG: readonly ScenarioTemplate[] = [
  {
    name: 'cloudfetch_expired_link',
    description: 'CloudFetch link expires, driver should retry via FetchResults',
    operation: 'CloudFetchDownload',
    action: 'expire_cloud_link',
  },
  httpErrorScenario(400, 'Bad Request', 'malformed request or missing parameters'),
  httpErrorScenario(403, 'Forbidden', 'expired link or insufficient permissions'),
  httpErrorScenario(404, 'Not Found', 'object does not exist'),
  httpErrorScenario(405, 'Method Not Allowed', 'incorrect HTTP method'),
  httpErrorScenario(412, 'Precondition Failed', 'condition not met'),
  httpErrorScenario(500, 'Internal Server Error', 'server-side error'),
  httpErrorScenario(503, 'Service Unavailable', 'rate limiting or temporary failure'),
  {
    name: 'cloudfetch_timeout',
    description: 'CloudFetch download times out (exceeds 60s) - configurable delay',
    operation: 'CloudFetchDownload',
    action: 'delay',
    durationSeconds: 65,
  },
  {
    name: 'cloudfetch_connection_reset',
    description: 'Connection reset during CloudFetch download',
    operation: 'CloudFetchDownload',
    action: 'close_connection',
  },
];
