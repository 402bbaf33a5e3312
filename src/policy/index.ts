/**
 * @fileoverview Policy module exports
 * @module orga-runtime/policy
 */

export * from './gate.js';
export * from './rules.js';
