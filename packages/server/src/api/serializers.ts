/**
 * Wire Serializers
 *
 * Map internal camelCase models onto the snake_case JSON the test harness
 * reads.
 * @module @fault-proxy/server/api/serializers
 */

import type {
  CallRecord,
  ScenarioConfig,
  VerificationResult,
} from '@fault-proxy/shared';

export interface ScenarioConfigJson {
  description: string;
  operation: string;
  action: string;
  error_code?: number;
  error_message?: string;
  duration_seconds?: number;
}

export type CallRecordJson =
  | {
      timestamp: string;
      type: 'thrift';
      method: string;
      message_type: string;
      sequence_id: number;
      fields: Record<string, unknown>;
    }
  | {
      timestamp: string;
      type: 'cloud_download';
      url: string;
    };

export function serializeScenarioConfig(config: ScenarioConfig): ScenarioConfigJson {
  const json: ScenarioConfigJson = {
    description: config.description,
    operation: config.operation,
    action: config.action,
  };

  switch (config.action) {
    case 'return_error':
      json.error_code = config.statusCode;
      json.error_message = config.message;
      break;
    case 'delay':
      json.duration_seconds = config.durationSeconds;
      break;
    default:
      break;
  }

  return json;
}

export function serializeCallRecord(record: CallRecord): CallRecordJson {
  if (record.kind === 'cloud_download') {
    return {
      timestamp: record.timestamp.toISOString(),
      type: 'cloud_download',
      url: record.url,
    };
  }

  return {
    timestamp: record.timestamp.toISOString(),
    type: 'thrift',
    method: record.method,
    message_type: record.messageType,
    sequence_id: record.sequenceId,
    fields: record.fields,
  };
}

export function serializeVerificationResult(result: VerificationResult): Record<string, unknown> {
  switch (result.type) {
    case 'exact_sequence':
    case 'contains_sequence':
      return {
        type: result.type,
        verified: result.verified,
        expected: result.expected,
        actual: result.actual,
      };
    case 'method_count':
    case 'method_exists':
      return {
        type: result.type,
        verified: result.verified,
        method: result.method,
        ...(result.expectedCount !== undefined && { expected_count: result.expectedCount }),
        actual_count: result.actualCount,
        actual: result.actual,
      };
  }
}
