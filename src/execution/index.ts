/**
 * @fileoverview Execution module exports
 * @module orga-runtime/execution
 */

export * from './circuit-breaker.js';
export * from './recovery.js';
export * from './executor.js';
