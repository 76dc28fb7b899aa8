/**
 * Critical Section
 *
 * The single mutual-exclusion section guarding the shared fault-injection
 * state (scenario states and call history). Both entry points, the control
 * API listener and the proxy callbacks, go through it.
 *
 * The section only accepts synchronous bodies, so it can never be held across
 * an `await`, an upstream I/O wait or an injected delay. Re-entry from the
 * same call stack is allowed so a guarded operation may call another one.
 *
 * @module @fault-proxy/server/faults/critical-section
 */

import { isPromiseLike } from '@fault-proxy/shared';

export class CriticalSection {
  private depth = 0;
  private entries = 0;

  /**
   * Run `body` while holding the section
   */
  run<T>(body: () => T): T {
    this.depth++;
    this.entries++;
    try {
      const result = body();
      if (isPromiseLike(result)) {
        throw new Error('CriticalSection bodies must be synchronous');
      }
      return result;
    } finally {
      this.depth--;
    }
  }

  isHeld(): boolean {
    return this.depth > 0;
  }

  /**
   * Number of times the section has been entered (diagnostics)
   */
  entryCount(): number {
    return this.entries;
  }
}
