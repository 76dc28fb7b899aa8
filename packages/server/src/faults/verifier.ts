/**
 * Call Verifier
 *
 * Evaluates declarative assertions over the method names of the recorded
 * Thrift calls, in history order. CloudFetch records are not part of the
 * projection.
 *
 * @module @fault-proxy/server/faults/verifier
 */

import type {
  CallRecord,
  VerificationRequest,
  VerificationResult,
} from '@fault-proxy/shared';
import type { CallHistory } from './call-history.js';

/**
 * Ordered method names of the Thrift records
 */
export function projectMethodSequence(records: readonly CallRecord[]): string[] {
  const methods: string[] = [];
  for (const record of records) {
    if (record.kind === 'thrift') {
      methods.push(record.method);
    }
  }
  return methods;
}

/**
 * Whether `expected` appears in `actual` in order, not necessarily contiguous.
 * Single greedy pass.
 */
export function containsSubsequence(actual: readonly string[], expected: readonly string[]): boolean {
  let next = 0;
  for (const method of actual) {
    if (next === expected.length) break;
    if (method === expected[next]) next++;
  }
  return next === expected.length;
}

export function sequencesEqual(actual: readonly string[], expected: readonly string[]): boolean {
  return actual.length === expected.length && actual.every((method, i) => method === expected[i]);
}

export function countOccurrences(actual: readonly string[], method: string): number {
  return actual.filter((m) => m === method).length;
}

/**
 * Evaluate one assertion against a record list
 */
export function verifyCalls(
  records: readonly CallRecord[],
  request: VerificationRequest,
): VerificationResult {
  const actual = projectMethodSequence(records);

  switch (request.type) {
    case 'exact_sequence':
      return {
        type: request.type,
        verified: sequencesEqual(actual, request.methods),
        expected: [...request.methods],
        actual,
      };
    case 'contains_sequence':
      return {
        type: request.type,
        verified: containsSubsequence(actual, request.methods),
        expected: [...request.methods],
        actual,
      };
    case 'method_count': {
      const actualCount = countOccurrences(actual, request.method);
      return {
        type: request.type,
        verified: actualCount === request.count,
        method: request.method,
        expectedCount: request.count,
        actualCount,
        actual,
      };
    }
    case 'method_exists': {
      const actualCount = countOccurrences(actual, request.method);
      return {
        type: request.type,
        verified: actualCount > 0,
        method: request.method,
        actualCount,
        actual,
      };
    }
  }
}

/**
 * Verifier bound to a live call history
 */
export class CallVerifier {
  constructor(private readonly history: CallHistory) {}

  verify(request: VerificationRequest): VerificationResult {
    return verifyCalls(this.history.snapshot(), request);
  }
}
