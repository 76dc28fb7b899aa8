/**
 * Call Recorder
 *
 * Appends classified traffic to the call history. Thrift requests are decoded
 * and recorded in full; CloudFetch downloads get a URL-only record. Thrift
 * responses are decoded for logging and never recorded.
 *
 * @module @fault-proxy/server/faults/call-recorder
 */

import {
  createServiceLogger,
  wrapError,
  type CloudDownloadRecord,
  type DecodedThriftMessage,
  type ThriftCallRecord,
} from '@fault-proxy/shared';
import type { CallHistory } from './call-history.js';
import type { ThriftDecoder } from './ports.js';

const logger = createServiceLogger(
  { service: 'fault-proxy' },
  { component: 'call-recorder' },
);

export class CallRecorder {
  constructor(
    private readonly history: CallHistory,
    private readonly decoder: ThriftDecoder | null = null,
  ) {}

  /**
   * Record a CloudFetch download attempt. Called before injection, so the
   * history also shows attempts a scenario later short-circuits.
   */
  recordCloudDownload(url: string): CloudDownloadRecord {
    const record: CloudDownloadRecord = { kind: 'cloud_download', timestamp: new Date(), url };
    this.history.append(record);
    logger.debug('Recorded CloudFetch download', { url });
    return record;
  }

  /**
   * Decode and record a Thrift request payload.
   * Returns null when the payload is empty or cannot be decoded.
   */
  recordThriftRequest(payload: Uint8Array): ThriftCallRecord | null {
    const message = this.decode(payload, 'request');
    if (!message) {
      return null;
    }

    const record: ThriftCallRecord = {
      kind: 'thrift',
      timestamp: new Date(),
      method: message.method,
      messageType: message.messageType,
      sequenceId: message.sequenceId,
      fields: message.fields,
    };
    const evicted = this.history.append(record);

    logger.info('Recorded Thrift call', {
      method: record.method,
      sequenceId: record.sequenceId,
      ...(evicted > 0 && { evicted }),
    });
    return record;
  }

  /**
   * Decode a Thrift response for diagnostics only
   */
  inspectThriftResponse(payload: Uint8Array): DecodedThriftMessage | null {
    return this.decode(payload, 'response');
  }

  private decode(payload: Uint8Array, direction: 'request' | 'response'): DecodedThriftMessage | null {
    if (payload.length === 0) {
      return null;
    }
    if (!this.decoder) {
      logger.debug('No Thrift decoder configured, skipping payload', { direction, bytes: payload.length });
      return null;
    }

    try {
      const result = this.decoder.decode(payload);
      if (!result.ok) {
        logger.warn('Failed to decode Thrift payload', {
          direction,
          bytes: payload.length,
          error: result.error.message,
        });
        return null;
      }
      logger.debug(`Thrift ${direction}: ${this.decoder.format(result.message)}`);
      return result.message;
    } catch (error) {
      logger.error('Thrift decoder raised', wrapError(error), { direction, bytes: payload.length });
      return null;
    }
  }
}
