/**
 * Request Classifier
 *
 * Tags intercepted traffic from method, host and path alone.
 * @module @fault-proxy/server/faults/classifier
 */

import type { OperationKind } from '@fault-proxy/shared';

/**
 * Object-storage domains serving CloudFetch result files
 */
export const CLOUD_STORAGE_DOMAINS: readonly string[] = [
  'blob.core.windows.net',
  's3.amazonaws.com',
  'storage.googleapis.com',
];

/**
 * Thrift routes of the SQL warehouse: /sql/1.0/warehouses/{id} and
 * /sql/1.0/endpoints/{id}. The REST statement route (/api/2.0/sql/statements)
 * deliberately does not match.
 */
const THRIFT_PATH_PATTERN = /\/sql\/1\.0\/(?:warehouses|endpoints)\//;

/**
 * Minimal request shape the classifier needs
 */
export interface ClassifiableRequest {
  method: string;
  host: string;
  path: string;
}

/**
 * Lowercase a host and strip any port
 */
export function normalizeHost(host: string): string {
  const lower = host.trim().toLowerCase();
  if (lower.startsWith('[')) {
    // IPv6 literal
    const end = lower.indexOf(']');
    return end === -1 ? lower : lower.slice(0, end + 1);
  }
  const colon = lower.indexOf(':');
  return colon === -1 ? lower : lower.slice(0, colon);
}

export function isCloudStorageHost(host: string): boolean {
  const normalized = normalizeHost(host);
  return CLOUD_STORAGE_DOMAINS.some(
    (domain) => normalized === domain || normalized.endsWith(`.${domain}`),
  );
}

export function isThriftPath(path: string): boolean {
  return THRIFT_PATH_PATTERN.test(path);
}

/**
 * Classify a request. No side effects.
 */
export function classifyRequest(request: ClassifiableRequest): OperationKind {
  const method = request.method.toUpperCase();

  if (method === 'GET' && isCloudStorageHost(request.host)) {
    return 'CloudFetchDownload';
  }

  if (method === 'POST' && isThriftPath(request.path)) {
    return 'ThriftCall';
  }

  return 'Other';
}
