/**
 * Recorded call types
 * @module @fault-proxy/shared/types/call-record
 */

/**
 * Thrift message types
 */
export type ThriftMessageType = 'CALL' | 'REPLY' | 'EXCEPTION' | 'ONEWAY';

/**
 * Structured Thrift message produced by a decoder
 */
export interface DecodedThriftMessage {
  /** RPC method name, e.g. ExecuteStatement */
  method: string;
  messageType: ThriftMessageType;
  sequenceId: number;
  /** Decoded argument struct, keyed by field name (or id when unnamed) */
  fields: Record<string, unknown>;
}

/**
 * Recorded Thrift call
 */
export interface ThriftCallRecord extends DecodedThriftMessage {
  kind: 'thrift';
  timestamp: Date;
}

/**
 * Recorded CloudFetch download attempt
 */
export interface CloudDownloadRecord {
  kind: 'cloud_download';
  timestamp: Date;
  url: string;
}

/**
 * Any entry of the call history
 */
export type CallRecord = ThriftCallRecord | CloudDownloadRecord;
