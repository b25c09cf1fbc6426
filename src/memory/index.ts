/**
 * Memory core: keyword classifier, per-user store, and the six operations
 * adapters call.
 */

export * from './types.js';
export * from './classifier.js';
export * from './clock.js';
export * from './query.js';
export * from './store.js';
export * from './operations.js';
