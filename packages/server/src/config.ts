/**
 * Proxy Configuration
 *
 * Reads the process environment into a typed configuration.
 * LOG_LEVEL is read by the shared logger itself.
 * @module @fault-proxy/server/config
 */

import { ValidationError } from '@fault-proxy/shared';
import { DEFAULT_MAX_HISTORY } from './faults/call-history.js';

export interface ProxyConfig {
  /** Control API port (default: 18081) */
  controlPort: number;
  /** Data plane port (default: 18080) */
  proxyPort: number;
  /** Interface to bind (default: '0.0.0.0') */
  host: string;
  /** Upstream for reverse-proxy mode; absolute-URI requests ignore it */
  targetServer?: string;
  /** Call history capacity (default: 1000) */
  maxCallHistory: number;
  /** Enable CORS on the control API (default: true) */
  enableCors: boolean;
  /** CORS allowed origins; `*` matches anything (default: localhost) */
  corsOrigins: string[];
}

export const DEFAULT_CONTROL_PORT = 18081;
export const DEFAULT_PROXY_PORT = 18080;
export const DEFAULT_CORS_ORIGINS = [
  'http://localhost',
  'http://localhost:*',
  'http://127.0.0.1',
  'http://127.0.0.1:*',
];

function parsePort(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const port = Number(raw);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw ValidationError.invalidFormat(name, 'a port number between 0 and 65535', raw);
  }
  return port;
}

function parsePositiveInt(name: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw ValidationError.invalidFormat(name, 'a positive integer', raw);
  }
  return value;
}

function parseTarget(raw: string | undefined): string | undefined {
  if (raw === undefined || raw === '') return undefined;
  try {
    const url = new URL(raw);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      throw new TypeError(`unsupported protocol ${url.protocol}`);
    }
    return url.toString();
  } catch {
    throw ValidationError.invalidFormat('TARGET_SERVER', 'an http(s) URL', raw);
  }
}

function parseOrigins(raw: string | undefined): string[] {
  if (raw === undefined || raw.trim() === '') return [...DEFAULT_CORS_ORIGINS];
  return raw
    .split(',')
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
}

/**
 * Build the configuration from environment variables.
 * @throws ValidationError when a variable is set to an unusable value
 */
export function loadProxyConfig(env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  return {
    controlPort: parsePort('CONTROL_PORT', env.CONTROL_PORT, DEFAULT_CONTROL_PORT),
    proxyPort: parsePort('PROXY_PORT', env.PROXY_PORT, DEFAULT_PROXY_PORT),
    host: env.HOST || '0.0.0.0',
    targetServer: parseTarget(env.TARGET_SERVER),
    maxCallHistory: parsePositiveInt('MAX_CALL_HISTORY', env.MAX_CALL_HISTORY, DEFAULT_MAX_HISTORY),
    enableCors: env.ENABLE_CORS !== 'false',
    corsOrigins: parseOrigins(env.CORS_ORIGINS),
  };
}
