/**
 * Test doubles for the data-plane collaborators
 * @module @fault-proxy/server/tests/helpers/fakes
 */

import { DecodeError, type CallRecord, type DecodedThriftMessage } from '@fault-proxy/shared';
import { ProxiedExchange } from '../../src/data-plane/http-proxy-engine.js';
import type { DecodeResult, ThriftDecoder } from '../../src/faults/ports.js';

/**
 * Decoder for a toy text encoding: `Method:sequenceId`.
 * Anything else is rejected as undecodable.
 */
export class TextThriftDecoder implements ThriftDecoder {
  decode(payload: Uint8Array): DecodeResult {
    const match = /^([A-Za-z]+):(\d+)$/.exec(Buffer.from(payload).toString('utf8'));
    if (!match) {
      return { ok: false, error: new DecodeError('not a thrift message', payload.length) };
    }
    return {
      ok: true,
      message: {
        method: match[1] ?? '',
        messageType: 'CALL',
        sequenceId: Number(match[2]),
        fields: {},
      },
    };
  }

  format(message: DecodedThriftMessage): string {
    return `${message.method}#${message.sequenceId}`;
  }
}

export function cloudFetchFlow(path = '/results/chunk-0?sig=test-signature'): ProxiedExchange {
  const host = 'testaccount.blob.core.windows.net';
  return new ProxiedExchange({
    method: 'GET',
    host,
    path,
    url: `https://${host}${path}`,
    body: new Uint8Array(0),
  });
}

export function thriftFlow(payload: string, path = '/sql/1.0/warehouses/test-warehouse'): ProxiedExchange {
  const host = 'workspace.example.com';
  return new ProxiedExchange({
    method: 'POST',
    host,
    path,
    url: `https://${host}${path}`,
    body: Buffer.from(payload),
  });
}

export function thriftRecord(method: string, sequenceId = 0): CallRecord {
  return {
    kind: 'thrift',
    timestamp: new Date('2024-01-01T00:00:00.000Z'),
    method,
    messageType: 'CALL',
    sequenceId,
    fields: {},
  };
}

export function downloadRecord(url: string): CallRecord {
  return { kind: 'cloud_download', timestamp: new Date('2024-01-01T00:00:00.000Z'), url };
}
