/**
 * Shared types
 * @module @fault-proxy/shared/types
 */

export * from './scenario.js';
export * from './call-record.js';
export * from './verification.js';
