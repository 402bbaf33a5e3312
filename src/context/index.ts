/**
 * @fileoverview Context module exports
 * @module orga-runtime/context
 */

export * from './conversation.js';
export * from './token-estimator.js';
export * from './context-budgeter.js';
