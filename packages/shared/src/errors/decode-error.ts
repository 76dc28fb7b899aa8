/**
 * Wire-format decode error
 * @module @fault-proxy/shared/errors/decode-error
 */

import { FaultProxyError, ErrorCode } from './base-error.js';

/**
 * Raised by a protocol decoder when a payload is not valid wire format.
 * Never fatal for the data plane: the payload is logged and skipped.
 */
export class DecodeError extends FaultProxyError {
  /** Number of payload bytes the decoder was given */
  public readonly payloadLength: number;

  constructor(message: string, payloadLength: number, cause?: Error) {
    super(message, ErrorCode.DECODE_FAILED, { payloadLength }, cause);
    this.name = 'DecodeError';
    this.payloadLength = payloadLength;
  }
}

/**
 * Check if an error is a DecodeError
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}
