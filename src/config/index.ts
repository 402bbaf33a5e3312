/**
 * @fileoverview Configuration exports
 * @module orga-runtime/config
 */

export * from './loop-config.js';
