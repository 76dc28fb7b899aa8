/**
 * Call History
 *
 * Ordered, bounded FIFO of call records. Appending past capacity evicts the
 * oldest records first; the order of the rest is preserved.
 *
 * @module @fault-proxy/server/faults/call-history
 */

import type { CallRecord } from '@fault-proxy/shared';
import { CriticalSection } from './critical-section.js';

/** Default history capacity */
export const DEFAULT_MAX_HISTORY = 1000;

export class CallHistory {
  private records: CallRecord[] = [];
  private evicted = 0;

  constructor(
    private readonly section: CriticalSection,
    readonly capacity: number = DEFAULT_MAX_HISTORY,
  ) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Append a record, evicting the oldest ones while over capacity.
   * Returns the number of records evicted.
   */
  append(record: CallRecord): number {
    return this.section.run(() => {
      this.records.push(record);
      const overflow = this.records.length - this.capacity;
      if (overflow <= 0) return 0;
      this.records.splice(0, overflow);
      this.evicted += overflow;
      return overflow;
    });
  }

  /**
   * Copy of the current records, oldest first
   */
  snapshot(): CallRecord[] {
    return this.section.run(() => [...this.records]);
  }

  /**
   * Drop every record. Returns how many were removed.
   */
  clear(): number {
    return this.section.run(() => {
      const removed = this.records.length;
      this.records = [];
      return removed;
    });
  }

  size(): number {
    return this.section.run(() => this.records.length);
  }

  /**
   * Total records evicted by overflow since startup
   */
  evictedCount(): number {
    return this.section.run(() => this.evicted);
  }
}
