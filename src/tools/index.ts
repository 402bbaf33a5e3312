/**
 * @fileoverview Tools module public exports.
 *
 * @module orga-runtime/tools
 */

export * from './tool-registry.js';
