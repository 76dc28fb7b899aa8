/**
 * Unit tests for the structured logger
 * @module @fault-proxy/shared/tests/unit/logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  createLogger,
  createServiceLogger,
  isLogLevel,
  type LogEntry,
} from '../../src/logging/logger.js';
import { ValidationError } from '../../src/errors/index.js';

describe('Logger', () => {
  let entries: LogEntry[];

  beforeEach(() => {
    entries = [];
  });

  function capture(level: 'debug' | 'info' | 'warn' = 'info') {
    return createLogger(
      { level, service: 'fault-proxy', output: (entry) => entries.push(entry) },
      { component: 'test' },
    );
  }

  it('drops entries below the configured level', () => {
    const log = capture('warn');
    log.info('ignored');
    log.warn('kept');
    expect(entries.map((e) => e.message)).toEqual(['kept']);
    expect(entries[0]?.level).toBe('warn');
  });

  it('merges service metadata and omits undefined values', () => {
    capture().info('Recorded call', { method: 'OpenSession', sequenceId: undefined });
    expect(entries[0]?.meta).toEqual({
      service: 'fault-proxy',
      component: 'test',
      method: 'OpenSession',
    });
  });

  it('attaches the correlation id of a child logger', () => {
    capture().withCorrelationId('abc-123').info('hello');
    expect(entries[0]?.meta?.correlationId).toBe('abc-123');
  });

  it('serializes errors with their code', () => {
    capture().error('Rejected', ValidationError.required('type'), { path: '/verify' });
    const entry = entries[0];
    expect(entry?.error?.name).toBe('ValidationError');
    expect(entry?.error?.message).toBe('Missing required field: type');
    expect(entry?.error?.code).toBe(2002);
    expect(entry?.meta?.path).toBe('/verify');
  });
});

describe('createServiceLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('takes its level from LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    const entries: LogEntry[] = [];
    const log = createServiceLogger(
      { service: 'fault-proxy', output: (entry) => entries.push(entry) },
      { component: 'test' },
    );

    log.info('ignored');
    log.warn('kept');

    expect(entries.map((e) => e.message)).toEqual(['kept']);
  });

  it('stays silent under test without LOG_LEVEL', () => {
    vi.stubEnv('LOG_LEVEL', '');
    const entries: LogEntry[] = [];
    const log = createServiceLogger(
      { service: 'fault-proxy', output: (entry) => entries.push(entry) },
      { component: 'test' },
    );

    log.fatal('dropped');

    expect(entries).toEqual([]);
  });
});

describe('isLogLevel', () => {
  it('recognizes the five levels only', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('fatal')).toBe(true);
    expect(isLogLevel('trace')).toBe(false);
    expect(isLogLevel('toString')).toBe(false);
    expect(isLogLevel(undefined)).toBe(false);
  });
});
