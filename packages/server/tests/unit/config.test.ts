/**
 * Unit tests for configuration loading
 * @module @fault-proxy/server/tests/unit/config
 */

import { describe, it, expect } from 'vitest';
import { loadProxyConfig } from '../../src/config.js';

describe('loadProxyConfig', () => {
  it('applies defaults for an empty environment', () => {
    expect(loadProxyConfig({})).toEqual({
      controlPort: 18081,
      proxyPort: 18080,
      host: '0.0.0.0',
      targetServer: undefined,
      maxCallHistory: 1000,
      enableCors: true,
      corsOrigins: ['http://localhost', 'http://localhost:*', 'http://127.0.0.1', 'http://127.0.0.1:*'],
    });
  });

  it('reads every variable', () => {
    expect(
      loadProxyConfig({
        CONTROL_PORT: '9001',
        PROXY_PORT: '9000',
        HOST: '127.0.0.1',
        TARGET_SERVER: 'http://localhost:8443',
        MAX_CALL_HISTORY: '25',
        ENABLE_CORS: 'false',
        CORS_ORIGINS: 'https://harness.example.com, http://localhost:*,',
      }),
    ).toEqual({
      controlPort: 9001,
      proxyPort: 9000,
      host: '127.0.0.1',
      targetServer: 'http://localhost:8443/',
      maxCallHistory: 25,
      enableCors: false,
      corsOrigins: ['https://harness.example.com', 'http://localhost:*'],
    });
  });

  it('leaves log settings to the logger', () => {
    const config = loadProxyConfig({ LOG_LEVEL: 'debug', NODE_ENV: 'production' });
    expect(Object.keys(config).sort()).toEqual([
      'controlPort',
      'corsOrigins',
      'enableCors',
      'host',
      'maxCallHistory',
      'proxyPort',
      'targetServer',
    ]);
  });

  it('rejects an invalid port', () => {
    expect(() => loadProxyConfig({ CONTROL_PORT: 'eighty' })).toThrow(
      'Invalid format for field: CONTROL_PORT (expected a port number between 0 and 65535)',
    );
    expect(() => loadProxyConfig({ PROXY_PORT: '70000' })).toThrow(
      'Invalid format for field: PROXY_PORT (expected a port number between 0 and 65535)',
    );
  });

  it('rejects a history capacity below one', () => {
    expect(() => loadProxyConfig({ MAX_CALL_HISTORY: '0' })).toThrow(
      'Invalid format for field: MAX_CALL_HISTORY (expected a positive integer)',
    );
  });

  it('rejects a non-HTTP target server', () => {
    expect(() => loadProxyConfig({ TARGET_SERVER: 'ftp://files.example.com' })).toThrow(
      'Invalid format for field: TARGET_SERVER (expected an http(s) URL)',
    );
    expect(() => loadProxyConfig({ TARGET_SERVER: 'not a url' })).toThrow(
      'Invalid format for field: TARGET_SERVER (expected an http(s) URL)',
    );
  });
});
