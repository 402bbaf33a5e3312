/**
 * @fileoverview ORGA runtime public API.
 *
 * A bounded agent loop: Reasoning → PolicyCheck → ToolDispatching →
 * Observing, with policy-gated tool calls, per-tool circuit breakers,
 * context budgeting and a sequenced journal of every phase.
 *
 * @example
 * ```typescript
 * import { ReasoningLoopRunner, OpenAIProvider, ToolRegistry, resolveLoopConfig, createAgentId } from 'orga-runtime';
 *
 * const registry = new ToolRegistry().register(lookupInvoice);
 * const runner = new ReasoningLoopRunner({ provider: new OpenAIProvider({ apiKey }), invoker: registry });
 * const result = await runner.run(
 *   createAgentId('billing'),
 *   [{ role: 'user', content: 'Is invoice-7 paid?' }],
 *   resolveLoopConfig({ tools: registry.definitions() }),
 * );
 * ```
 *
 * @module orga-runtime
 */

export * from './types/index.js';
export * from './config/index.js';
export * from './context/index.js';
export * from './providers/index.js';
export * from './policy/index.js';
export * from './execution/index.js';
export * from './tools/index.js';
export * from './knowledge/index.js';
export * from './observability/index.js';
export * from './agent/index.js';
