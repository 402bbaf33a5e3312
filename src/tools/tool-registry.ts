/**
 * @fileoverview Tool Registry - in-process tools behind the invoker interface.
 *
 * The registry holds the tools an agent may call, validates their
 * arguments with zod, runs them and tracks usage metrics. It implements
 * {@link ToolInvoker}, so the executor reaches registered tools the same
 * way it reaches any other tool host.
 *
 * @module orga-runtime/tools/tool-registry
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import { EventEmitter } from 'eventemitter3';
import type { z } from 'zod';
import { createTimestamp, createUniqueId, type Timestamp, type UniqueId } from '../types/core.types.js';
import { toError } from '../types/errors.js';
import type { ToolDefinition } from '../types/loop.types.js';
import { parseToolArguments } from '../context/conversation.js';
import { defaultLogger, type Logger } from '../observability/logger.js';
import {
  toolFailure,
  toolSuccess,
  type ToolInvokeOptions,
  type ToolInvoker,
  type ToolOutcome,
} from '../execution/executor.js';

/**
 * What a running tool gets besides its input.
 */
export interface ToolHandlerContext {
  readonly executionId: UniqueId;

  /** Aborted when the call times out or the run ends */
  readonly signal: AbortSignal;
  readonly timeoutMs: number;
  readonly logger: Logger;
}

/**
 * An in-process tool.
 */
export interface RegisteredTool<TInput = unknown> {
  readonly name: string;
  readonly description: string;

  /** JSON Schema handed to the model unchanged */
  readonly parameters: Readonly<Record<string, unknown>>;

  /** Runtime check of the decoded arguments */
  readonly input: z.ZodType<TInput>;

  /** Whether a thrown error is worth retrying (default true) */
  readonly retriable?: boolean;

  /**
   * Strings are returned as-is, anything else is JSON-encoded (`String()` where JSON cannot encode it).
   */
  execute(input: TInput, context: ToolHandlerContext): unknown;
}

/**
 * Identity helper that infers `TInput` from the zod schema.
 *
 * @example
 * ```typescript
 * const add = defineTool({
 *   name: 'add',
 *   description: 'Adds two numbers',
 *   parameters: { type: 'object', properties: { a: { type: 'number' }, b: { type: 'number' } }, required: ['a', 'b'] },
 *   input: z.object({ a: z.number(), b: z.number() }),
 *   execute: ({ a, b }) => String(a + b),
 * });
 * ```
 */
export function defineTool<TInput>(tool: RegisteredTool<TInput>): RegisteredTool<TInput> {
  return tool;
}

export interface ToolRegistryEntry {
  readonly tool: RegisteredTool;
  readonly registeredAt: Timestamp;
  readonly enabled: boolean;
  readonly invocationCount: number;
  readonly failureCount: number;
  readonly lastInvokedAt: Timestamp | null;
  readonly averageDurationMs: number;
}

/**
 * Events emitted by the Tool Registry.
 */
export interface ToolRegistryEvents {
  'tool:registered': (name: string) => void;
  'tool:unregistered': (name: string) => void;
  'tool:invoked': (name: string, executionId: UniqueId) => void;
  'tool:completed': (name: string, executionId: UniqueId, durationMs: number) => void;
  'tool:failed': (name: string, executionId: UniqueId, message: string) => void;
}

export interface ToolRegistryConfig {
  readonly logger: Logger;
}

/**
 * Registry of in-process tools.
 *
 * @example
 * ```typescript
 * const registry = new ToolRegistry();
 * registry.register(add);
 * const executor = new DefaultActionExecutor({ invoker: registry });
 * const config = resolveLoopConfig({ tools: registry.definitions() });
 * ```
 */
export class ToolRegistry extends EventEmitter<ToolRegistryEvents> implements ToolInvoker {
  private readonly tools = new Map<string, ToolRegistryEntry>();
  private readonly logger: Logger;

  constructor(config: Partial<ToolRegistryConfig> = {}) {
    super();
    this.logger = config.logger ?? defaultLogger.child({ module: 'tools' });
  }

  /**
   * @throws Error if the name is already registered
   */
  register<TInput>(tool: RegisteredTool<TInput>): this {
    if (this.tools.has(tool.name)) {
      throw new Error(`Tool '${tool.name}' is already registered`);
    }

    this.tools.set(tool.name, {
      tool,
      registeredAt: createTimestamp(),
      enabled: true,
      invocationCount: 0,
      failureCount: 0,
      lastInvokedAt: null,
      averageDurationMs: 0,
    });
    this.emit('tool:registered', tool.name);
    return this;
  }

  unregister(name: string): boolean {
    const existed = this.tools.delete(name);
    if (existed) {
      this.emit('tool:unregistered', name);
    }
    return existed;
  }

  has(name: string): boolean {
    return this.tools.get(name)?.enabled === true;
  }

  setEnabled(name: string, enabled: boolean): void {
    const entry = this.tools.get(name);
    if (entry) {
      this.tools.set(name, { ...entry, enabled });
    }
  }

  /**
   * Declarations of the enabled tools, for `LoopConfig.tools`.
   */
  definitions(): ToolDefinition[] {
    const definitions: ToolDefinition[] = [];
    for (const entry of this.tools.values()) {
      if (!entry.enabled) continue;
      const { name, description, parameters } = entry.tool;
      definitions.push({ name, description, parameters });
    }
    return definitions;
  }

  getMetrics(name: string): ToolRegistryEntry | null {
    return this.tools.get(name) ?? null;
  }

  async invoke(name: string, args: string, options: ToolInvokeOptions): Promise<ToolOutcome> {
    const entry = this.tools.get(name);
    if (!entry) {
      return toolFailure(`Tool "${name}" is not registered`, { notFound: true });
    }
    if (!entry.enabled) {
      return toolFailure(`Tool "${name}" is currently disabled`, { retriable: false });
    }

    const decoded = parseToolArguments(args);
    if (decoded === null) {
      return toolFailure(`Arguments for "${name}" are not a JSON object`, { retriable: false });
    }
    const parsed = entry.tool.input.safeParse(decoded);
    if (!parsed.success) {
      const issues = parsed.error.issues.map(issue =>
        issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
      );
      return toolFailure(`Input validation failed: ${issues.join(', ')}`, { retriable: false });
    }

    const executionId = createUniqueId(uuidv4());
    const startTime = Date.now();
    const logger = this.logger.child({ bindings: { executionId } });
    this.emit('tool:invoked', name, executionId);

    let output: unknown;
    try {
      output = await entry.tool.execute(parsed.data, {
        executionId,
        signal: options.signal,
        timeoutMs: options.timeoutMs,
        logger,
      });
    } catch (error) {
      const message = toError(error).message;
      this.updateMetrics(name, Date.now() - startTime, true);
      logger.debug('Tool failed', { tool: name, error: message });
      this.emit('tool:failed', name, executionId, message);
      return toolFailure(message, { retriable: entry.tool.retriable ?? true });
    }

    const payload = encodeOutput(output);
    const durationMs = Date.now() - startTime;
    this.updateMetrics(name, durationMs, false);
    this.emit('tool:completed', name, executionId, durationMs);
    return toolSuccess(payload);
  }

  // ============ Private Methods ============

  private updateMetrics(name: string, durationMs: number, failed: boolean): void {
    const entry = this.tools.get(name);
    if (!entry) return;
    const invocationCount = entry.invocationCount + 1;
    this.tools.set(name, {
      ...entry,
      invocationCount,
      failureCount: entry.failureCount + (failed ? 1 : 0),
      lastInvokedAt: createTimestamp(),
      averageDurationMs: (entry.averageDurationMs * entry.invocationCount + durationMs) / invocationCount,
    });
  }
}

/**
 * Tool results reach the model as text. Values JSON cannot encode (functions,
 * symbols, bigints, cycles) fall back to `String()`.
 */
function encodeOutput(output: unknown): string {
  if (typeof output === 'string') return output;
  if (output === undefined) return '';
  try {
    const json: string | undefined = JSON.stringify(output);
    return json ?? String(output);
  } catch {
    return String(output);
  }
}
