/**
 * Unit tests for the call history endpoints
 * @module @fault-proxy/server/tests/unit/api-thrift-calls
 *
 * These tests call the handlers directly with mock request/response objects.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { Request, Response } from 'express';
import { createFaultInjectionState, type FaultInjectionState } from '../../src/faults/state.js';
import { createThriftCallHandlers, type ThriftCallHandlers } from '../../src/api/thrift-calls.js';
import { downloadRecord, thriftRecord } from '../helpers/fakes.js';

function createMockRequest(body: unknown = {}): Request {
  return {
    body,
    params: {},
    query: {},
    headers: {},
  } as Request;
}

function createMockResponse(): Response & { _json: unknown; _status: number } {
  const res = {
    _json: null as unknown,
    _status: 200,
    status(code: number) {
      this._status = code;
      return this;
    },
    json(data: unknown) {
      this._json = data;
      return this;
    },
    send() {
      return this;
    },
  };
  return res as Response & { _json: unknown; _status: number };
}

describe('Call history API handlers', () => {
  let state: FaultInjectionState;
  let handlers: ThriftCallHandlers;

  beforeEach(() => {
    state = createFaultInjectionState({ maxHistory: 50 });
    handlers = createThriftCallHandlers(state.history, state.verifier);
  });

  describe('GET /thrift/calls', () => {
    it('returns an empty history', () => {
      const res = createMockResponse();
      handlers.listCalls(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({ calls: [], count: 0, max_history: 50 });
    });

    it('serializes records in snake_case', () => {
      state.history.append(thriftRecord('OpenSession', 1));
      state.history.append(downloadRecord('https://acct.blob.core.windows.net/chunk-0'));
      const res = createMockResponse();
      handlers.listCalls(createMockRequest(), res);

      expect(res._json).toEqual({
        calls: [
          {
            timestamp: '2024-01-01T00:00:00.000Z',
            type: 'thrift',
            method: 'OpenSession',
            message_type: 'CALL',
            sequence_id: 1,
            fields: {},
          },
          {
            timestamp: '2024-01-01T00:00:00.000Z',
            type: 'cloud_download',
            url: 'https://acct.blob.core.windows.net/chunk-0',
          },
        ],
        count: 2,
        max_history: 50,
      });
    });
  });

  describe('POST /thrift/calls/reset', () => {
    it('clears the history', () => {
      state.history.append(thriftRecord('OpenSession'));
      const res = createMockResponse();
      handlers.resetCalls(createMockRequest(), res);

      expect(res._status).toBe(200);
      expect(res._json).toEqual({ message: 'Call history reset', count: 0 });
      expect(state.history.size()).toBe(0);
    });
  });

  describe('POST /thrift/calls/verify', () => {
    beforeEach(() => {
      state.history.append(thriftRecord('OpenSession', 1));
      state.history.append(thriftRecord('FetchResults', 2));
      state.history.append(thriftRecord('FetchResults', 3));
    });

    it('evaluates a sequence assertion', () => {
      const res = createMockResponse();
      handlers.verifyCalls(
        createMockRequest({ type: 'contains_sequence', methods: ['OpenSession', 'FetchResults'] }),
        res,
      );

      expect(res._status).toBe(200);
      expect(res._json).toEqual({
        type: 'contains_sequence',
        verified: true,
        expected: ['OpenSession', 'FetchResults'],
        actual: ['OpenSession', 'FetchResults', 'FetchResults'],
      });
    });

    it('evaluates a count assertion', () => {
      const res = createMockResponse();
      handlers.verifyCalls(
        createMockRequest({ type: 'method_count', method: 'FetchResults', count: 1 }),
        res,
      );

      expect(res._status).toBe(200);
      expect(res._json).toEqual({
        type: 'method_count',
        verified: false,
        method: 'FetchResults',
        expected_count: 1,
        actual_count: 2,
        actual: ['OpenSession', 'FetchResults', 'FetchResults'],
      });
    });

    it('omits expected_count for existence checks', () => {
      const res = createMockResponse();
      handlers.verifyCalls(createMockRequest({ type: 'method_exists', method: 'CloseSession' }), res);

      expect(res._json).toEqual({
        type: 'method_exists',
        verified: false,
        method: 'CloseSession',
        actual_count: 0,
        actual: ['OpenSession', 'FetchResults', 'FetchResults'],
      });
    });

    it('returns 400 for a missing type', () => {
      const res = createMockResponse();
      handlers.verifyCalls(createMockRequest({}), res);

      expect(res._status).toBe(400);
      expect(res._json).toEqual({ error: 'Missing required field: type' });
    });

    it('returns 400 for an unknown type', () => {
      const res = createMockResponse();
      handlers.verifyCalls(createMockRequest({ type: 'at_least' }), res);

      expect(res._status).toBe(400);
      expect(res._json).toEqual({ error: 'Unknown verification type: at_least' });
    });

    it('returns 500 when evaluation fails', () => {
      vi.spyOn(state.verifier, 'verify').mockImplementation(() => {
        throw new Error('history unavailable');
      });
      const res = createMockResponse();
      handlers.verifyCalls(createMockRequest({ type: 'method_exists', method: 'OpenSession' }), res);

      expect(res._status).toBe(500);
      expect(res._json).toEqual({ error: 'history unavailable' });
    });
  });
});
