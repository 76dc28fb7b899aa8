/**
 * Call verification types
 * @module @fault-proxy/shared/types/verification
 */

/**
 * Verification kinds
 */
export type VerificationType =
  | 'exact_sequence'
  | 'contains_sequence'
  | 'method_count'
  | 'method_exists';

/**
 * All verification kinds
 */
export const VERIFICATION_TYPES: readonly VerificationType[] = [
  'exact_sequence',
  'contains_sequence',
  'method_count',
  'method_exists',
];

/**
 * Declarative assertion over the recorded method sequence
 */
export type VerificationRequest =
  | { type: 'exact_sequence'; methods: string[] }
  | { type: 'contains_sequence'; methods: string[] }
  | { type: 'method_count'; method: string; count: number }
  | { type: 'method_exists'; method: string };

/**
 * Result of a sequence assertion
 */
export interface SequenceVerificationResult {
  type: 'exact_sequence' | 'contains_sequence';
  verified: boolean;
  expected: string[];
  actual: string[];
}

/**
 * Result of a per-method assertion
 */
export interface MethodVerificationResult {
  type: 'method_count' | 'method_exists';
  verified: boolean;
  method: string;
  /** Only present for method_count */
  expectedCount?: number;
  actualCount: number;
  actual: string[];
}

export type VerificationResult = SequenceVerificationResult | MethodVerificationResult;
