/**
 * @fileoverview Executor wrapper that answers knowledge tools locally.
 *
 * @module orga-runtime/knowledge/knowledge-executor
 */

import { systemClock, type AgentId, type Clock } from '../types/core.types.js';
import type { Observation, ToolCallAction } from '../types/loop.types.js';
import { thrownOutcome, type ActionExecutor, type ExecutionContext, type ToolOutcome } from '../execution/executor.js';
import { mapWithConcurrency } from '../utils/concurrency.js';

/**
 * Answers the reserved tool names directly from a knowledge store.
 */
export interface KnowledgeToolHandler {
  handles(toolName: string): boolean;
  handle(agentId: AgentId, toolName: string, args: string): Promise<ToolOutcome>;
}

const TIMED_OUT = Symbol('timed-out');

type LocalOutcome =
  | ToolOutcome
  | { readonly status: 'Failure'; readonly kind: 'ToolTimeout'; readonly message: string; readonly retriable: boolean };

function timeout(message: string): LocalOutcome {
  return { status: 'Failure', kind: 'ToolTimeout', message, retriable: false };
}

/**
 * Sits in front of the action executor. Calls to knowledge tools never
 * reach the inner executor, its breakers or its recovery; every other
 * call is delegated unchanged. A mixed batch shares one pool of
 * `maxConcurrentTools` slots, and knowledge calls get the same timeout as
 * tools. Observations keep the order of the actions.
 */
export class KnowledgeInterceptingExecutor implements ActionExecutor {
  private readonly inner: ActionExecutor;
  private readonly handler: KnowledgeToolHandler;
  private readonly clock: Clock;

  constructor(inner: ActionExecutor, handler: KnowledgeToolHandler, clock: Clock = systemClock) {
    this.inner = inner;
    this.handler = handler;
    this.clock = clock;
  }

  async executeActions(actions: ReadonlyArray<ToolCallAction>, context: ExecutionContext): Promise<Observation[]> {
    if (!actions.some(action => this.handler.handles(action.name))) {
      return this.inner.executeActions(actions, context);
    }

    return mapWithConcurrency(actions, context.config.maxConcurrentTools, async action => {
      if (this.handler.handles(action.name)) return this.answer(action, context);
      const [observation] = await this.inner.executeActions([action], context);
      return observation;
    });
  }

  // ============ Private Methods ============

  private async answer(action: ToolCallAction, context: ExecutionContext): Promise<Observation> {
    const settled = context.traceTool?.(action);
    const started = this.clock.now();
    const timeoutMs = Math.min(context.config.toolTimeoutMs, context.deadline - started);
    const outcome = await this.handleWithin(action, context, timeoutMs);
    const observation: Observation = {
      sourceActionId: action.id,
      toolName: action.name,
      result:
        outcome.status === 'Success'
          ? { status: 'Success', payload: outcome.output }
          : { status: 'Failure', error: { kind: outcome.kind, message: outcome.message }, retriable: outcome.retriable },
      durationMs: this.clock.now() - started,
      escalated: false,
      recovery: null,
    };
    settled?.(observation);
    return observation;
  }

  private async handleWithin(action: ToolCallAction, context: ExecutionContext, timeoutMs: number): Promise<LocalOutcome> {
    if (context.signal.aborted || timeoutMs <= 0) {
      return timeout(`Run ended before knowledge tool "${action.name}" was invoked`);
    }

    const settled = new AbortController();
    try {
      const outcome = await Promise.race([
        this.handler.handle(context.agentId, action.name, action.arguments).catch(thrownOutcome),
        this.clock
          .sleep(timeoutMs, AbortSignal.any([context.signal, settled.signal]))
          .then((): typeof TIMED_OUT => TIMED_OUT),
      ]);
      if (outcome !== TIMED_OUT) return outcome;
      return context.signal.aborted
        ? timeout(`Knowledge tool "${action.name}" was cancelled when the run ended`)
        : timeout(`Knowledge tool "${action.name}" timed out after ${timeoutMs}ms`);
    } finally {
      settled.abort();
    }
  }
}
