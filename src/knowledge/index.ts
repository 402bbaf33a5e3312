/**
 * @fileoverview Knowledge module exports
 */

export * from './knowledge-store.js';
export * from './knowledge-executor.js';
export * from './knowledge-bridge.js';
