/**
 * @fileoverview Type module public exports.
 *
 * @module orga-runtime/types
 */

export * from './core.types.js';
export * from './errors.js';
export * from './loop.types.js';
export * from './journal.types.js';
