/**
 * Fault Injection Module Index
 */

export * from './critical-section.js';
export * from './classifier.js';
export * from './scenario-catalog.js';
export * from './call-history.js';
export * from './scenario-registry.js';
export * from './ports.js';
export * from './injector.js';
export * from './call-recorder.js';
export * from './verifier.js';
export * from './addon.js';
export * from './state.js';
