/**
 * @fileoverview Action executor - dispatches approved tool calls.
 *
 * Each call passes its tool's circuit breaker, runs under a timeout of
 * `min(toolTimeoutMs, time left in the run)` with at most
 * `maxConcurrentTools` calls in flight, and on failure goes through the
 * recovery strategy resolved for its tool. Observations come back in the
 * order of the actions. Every call settles: tool errors and timeouts
 * become failure observations, never rejections.
 *
 * @module orga-runtime/execution/executor
 */

import { systemClock, type AgentId, type Clock, type UniqueId } from '../types/core.types.js';
import { ExecutionError, toError, type ExecutionErrorKind } from '../types/errors.js';
import type {
  LoopConfig,
  LoopDecision,
  Message,
  Observation,
  ObservationFailureKind,
  RecoveryKind,
  RecoveryStrategy,
  ToolCallAction,
} from '../types/loop.types.js';
import { defaultLogger, type Logger } from '../observability/logger.js';
import { mapWithConcurrency } from '../utils/concurrency.js';
import type { CircuitBreakerRegistry } from './circuit-breaker.js';
import {
  resolveRecovery,
  DeadLetterQueue,
  type EscalationHandler,
  type ResultCache,
} from './recovery.js';

// ============ Tool Invocation ============

export type ToolOutcome =
  | { readonly status: 'Success'; readonly output: string }
  | {
      readonly status: 'Failure';
      readonly kind: 'ToolNotFound' | 'InvocationFailed';
      readonly message: string;
      readonly retriable: boolean;
    };

export interface ToolInvokeOptions {
  readonly timeoutMs: number;

  /** Aborted when the call times out or the run ends */
  readonly signal: AbortSignal;
}

/**
 * The only way tools are reached. Implementations may route calls through
 * any isolation layer.
 */
export interface ToolInvoker {
  invoke(name: string, args: string, options: ToolInvokeOptions): Promise<ToolOutcome>;
}

export const toolSuccess = (output: string): ToolOutcome => ({ status: 'Success', output });

export const toolFailure = (
  message: string,
  options: { retriable?: boolean; notFound?: boolean } = {},
): ToolOutcome => ({
  status: 'Failure',
  kind: options.notFound === true ? 'ToolNotFound' : 'InvocationFailed',
  message,
  retriable: options.retriable ?? options.notFound !== true,
});

/**
 * Outcome for an invoker that threw. An {@link ExecutionError} keeps its
 * own retry flag, and its ToolNotFound kind.
 */
export function thrownOutcome(error: unknown): ToolOutcome {
  if (error instanceof ExecutionError) {
    return toolFailure(error.message, { notFound: error.kind === 'ToolNotFound', retriable: error.retryable });
  }
  return toolFailure(toError(error).message);
}

// ============ Executor ============

export interface RecoveryEvent {
  readonly actionId: string;
  readonly toolName: string;
  readonly strategy: RecoveryKind;
  readonly error: string;
}

/**
 * Per-run state and collaborators handed to the executor by the runner.
 */
export interface ExecutionContext {
  readonly runId: UniqueId;
  readonly agentId: AgentId;
  readonly iteration: number;
  readonly config: LoopConfig;
  readonly breakers: CircuitBreakerRegistry;

  /** Epoch ms at which the run times out */
  readonly deadline: number;

  /** Aborted when the run deadline passes or the caller cancels */
  readonly signal: AbortSignal;
  readonly cache: ResultCache;

  /** LlmRecovery uses so far, per tool, for this run */
  readonly llmRecoveries: Map<string, number>;

  /** Run-scoped logger; the executor's own logger otherwise */
  readonly logger?: Logger;
  conversation(): ReadonlyArray<Message>;

  /**
   * Policy decision for a call the executor makes on its own, such as a
   * fallback tool. Without it every such call is allowed.
   */
  authorize?(action: ToolCallAction): LoopDecision;

  /** Called as each call starts; the returned callback receives its observation */
  traceTool?(action: ToolCallAction): (observation: Observation) => void;
  onRecovery?(event: RecoveryEvent): void;
}

export interface ActionExecutor {
  executeActions(actions: ReadonlyArray<ToolCallAction>, context: ExecutionContext): Promise<Observation[]>;
}

export interface DefaultActionExecutorOptions {
  invoker: ToolInvoker;
  clock?: Clock;
  logger?: Logger;
  deadLetters?: DeadLetterQueue;
  escalation?: EscalationHandler;
}

interface Failure {
  readonly kind: ObservationFailureKind;
  readonly message: string;
  readonly retriable: boolean;
}

type Attempt = { readonly ok: true; readonly output: string } | ({ readonly ok: false } & Failure);

const TIMED_OUT = Symbol('timed-out');

export const LLM_RECOVERY_HINT =
  'The tool call failed. Consider different arguments or another way to reach the answer.';

export class DefaultActionExecutor implements ActionExecutor {
  readonly deadLetters: DeadLetterQueue;
  private readonly invoker: ToolInvoker;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly escalation: EscalationHandler | undefined;

  constructor(options: DefaultActionExecutorOptions) {
    this.invoker = options.invoker;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger.child({ module: 'executor' });
    this.deadLetters = options.deadLetters ?? new DeadLetterQueue();
    this.escalation = options.escalation;
  }

  executeActions(actions: ReadonlyArray<ToolCallAction>, context: ExecutionContext): Promise<Observation[]> {
    return mapWithConcurrency(actions, context.config.maxConcurrentTools, action => this.executeOne(action, context));
  }

  // ============ Private Methods ============

  private async executeOne(action: ToolCallAction, context: ExecutionContext): Promise<Observation> {
    const settled = context.traceTool?.(action);
    const observation = await this.observe(action, context);
    settled?.(observation);
    return observation;
  }

  private async observe(action: ToolCallAction, context: ExecutionContext): Promise<Observation> {
    const started = this.clock.now();
    const attempt = await this.attempt(action.name, action.arguments, context);

    if (attempt.ok) {
      context.cache.set(action.name, action.arguments, attempt.output);
      return this.success(action, attempt.output, started, null);
    }
    return this.recover(action, attempt, context, started);
  }

  /**
   * One breaker-guarded, time-bounded invocation.
   */
  private async attempt(toolName: string, args: string, context: ExecutionContext): Promise<Attempt> {
    if (context.signal.aborted) {
      return failure('ToolTimeout', `Run deadline reached before "${toolName}" was invoked`, false);
    }

    const breaker = context.breakers.breaker(toolName);
    const admission = breaker.tryAcquire();
    if (!admission.admitted) {
      return failure('BreakerOpen', `Circuit breaker for "${toolName}" is open`, false);
    }

    const remaining = context.deadline - this.clock.now();
    const timeoutMs = Math.min(context.config.toolTimeoutMs, remaining);
    if (timeoutMs <= 0) {
      breaker.release(admission);
      return failure('ToolTimeout', `Run deadline reached before "${toolName}" was invoked`, false);
    }

    const controller = new AbortController();
    const signal = AbortSignal.any([context.signal, controller.signal]);
    let outcome: ToolOutcome | typeof TIMED_OUT;
    try {
      outcome = await Promise.race([
        this.invoker
          .invoke(toolName, args, { timeoutMs, signal })
          .catch(thrownOutcome),
        this.clock.sleep(timeoutMs, signal).then((): typeof TIMED_OUT => TIMED_OUT),
      ]);
    } finally {
      controller.abort();
    }

    // A tool that gives up because the run ended says nothing about its health.
    if (context.signal.aborted && (outcome === TIMED_OUT || outcome.status === 'Failure')) {
      breaker.release(admission);
      return failure('ToolTimeout', `Tool "${toolName}" was cancelled when the run ended`, false);
    }

    if (outcome === TIMED_OUT) {
      breaker.recordFailure();
      return failure('ToolTimeout', `Tool "${toolName}" timed out after ${timeoutMs}ms`, true);
    }

    if (outcome.status === 'Success') {
      breaker.recordSuccess();
      return { ok: true, output: outcome.output };
    }
    breaker.recordFailure();
    return failure(outcome.kind, outcome.message, outcome.retriable);
  }

  private async recover(
    action: ToolCallAction,
    initial: Failure,
    context: ExecutionContext,
    started: number,
  ): Promise<Observation> {
    if (context.signal.aborted) return this.failed(action, initial, started, null);

    const strategy = resolveRecovery(action.name, context.config);
    if (!this.applies(strategy, initial, action, context)) {
      return this.failed(action, initial, started, null);
    }

    context.onRecovery?.({ actionId: action.id, toolName: action.name, strategy: strategy.type, error: initial.message });
    (context.logger ?? this.logger).debug('Recovering failed tool call', {
      tool: action.name,
      strategy: strategy.type,
      error: initial.message,
    });

    switch (strategy.type) {
      case 'Retry':
        return this.retry(action, initial, strategy.maxAttempts, strategy.baseDelayMs, context, started);

      case 'Fallback':
        return this.fallback(action, initial, strategy.alternatives, context, started);

      case 'CachedResult': {
        const cached = context.cache.get(action.name, action.arguments, strategy.maxStalenessMs);
        if (cached === null) return this.failed(action, initial, started, 'CachedResult');
        return this.success(action, `[Cached result from ${cached.ageMs}ms ago] ${cached.payload}`, started, 'CachedResult');
      }

      case 'LlmRecovery':
        context.llmRecoveries.set(action.name, (context.llmRecoveries.get(action.name) ?? 0) + 1);
        return this.failed(
          action,
          { ...initial, message: `${initial.message}\n[Recovery hint] ${LLM_RECOVERY_HINT}` },
          started,
          'LlmRecovery',
        );

      case 'Escalate':
        await this.escalate(action, initial, strategy.queue, strategy.contextSnapshot, context);
        return this.failed(action, initial, started, 'Escalate', true);

      case 'DeadLetter':
        this.deadLetters.push({
          runId: context.runId,
          agentId: context.agentId,
          actionId: action.id,
          toolName: action.name,
          arguments: action.arguments,
          error: { kind: initial.kind, message: initial.message },
          recordedAt: this.clock.now(),
        });
        return this.failed(
          action,
          { ...initial, message: `${initial.message} (recorded as a dead letter)`, retriable: false },
          started,
          'DeadLetter',
        );
    }
  }

  /**
   * Whether a strategy has anything to do for this failure.
   */
  private applies(strategy: RecoveryStrategy, failure: Failure, action: ToolCallAction, context: ExecutionContext): boolean {
    switch (strategy.type) {
      case 'Retry':
        return (
          strategy.maxAttempts > 1 &&
          failure.retriable &&
          failure.kind !== 'BreakerOpen' &&
          failure.kind !== 'ToolNotFound'
        );
      case 'Fallback':
        return strategy.alternatives.some(name => name !== action.name);
      case 'LlmRecovery':
        return (context.llmRecoveries.get(action.name) ?? 0) < strategy.maxRecoveryAttempts;
      case 'CachedResult':
      case 'Escalate':
      case 'DeadLetter':
        return true;
    }
  }

  /**
   * `maxAttempts` counts the first call; attempt n waits
   * `baseDelayMs * 2^(n-2)` and never past the run deadline.
   */
  private async retry(
    action: ToolCallAction,
    initial: Failure,
    maxAttempts: number,
    baseDelayMs: number,
    context: ExecutionContext,
    started: number,
  ): Promise<Observation> {
    let last = initial;
    for (let attemptNo = 2; attemptNo <= maxAttempts; attemptNo++) {
      const delay = baseDelayMs * 2 ** (attemptNo - 2);
      if (this.clock.now() + delay >= context.deadline) break;
      await this.clock.sleep(delay, context.signal);
      if (context.signal.aborted) break;

      const next = await this.attempt(action.name, action.arguments, context);
      if (next.ok) {
        context.cache.set(action.name, action.arguments, next.output);
        return this.success(action, next.output, started, 'Retry');
      }
      last = next;
      if (!next.retriable || next.kind === 'BreakerOpen') break;
    }
    return this.failed(action, last, started, 'Retry');
  }

  private async fallback(
    action: ToolCallAction,
    initial: Failure,
    alternatives: ReadonlyArray<string>,
    context: ExecutionContext,
    started: number,
  ): Promise<Observation> {
    const notes: string[] = [];
    for (const alternative of alternatives) {
      if (alternative === action.name) continue;
      const substitute = this.authorize({ ...action, name: alternative }, context);
      if (typeof substitute === 'string') {
        (context.logger ?? this.logger).warn('Fallback tool denied by policy', { tool: action.name, alternative });
        notes.push(`${alternative}: [Policy denied] ${substitute}`);
        continue;
      }
      const next = await this.attempt(substitute.name, substitute.arguments, context);
      if (next.ok) {
        return this.success(action, `[Result from fallback tool "${alternative}"] ${next.output}`, started, 'Fallback');
      }
      notes.push(`${alternative}: ${next.message}`);
    }
    return this.failed(
      action,
      { ...initial, message: `${initial.message}; fallbacks failed (${notes.join('; ')})` },
      started,
      'Fallback',
    );
  }

  /**
   * The call to make after the policy decision, or the denial reason.
   */
  private authorize(action: ToolCallAction, context: ExecutionContext): ToolCallAction | string {
    const decision: LoopDecision = context.authorize?.(action) ?? { type: 'Allow' };
    switch (decision.type) {
      case 'Allow':
        return action;
      case 'Deny':
        return decision.reason;
      case 'Modify':
        return decision.replacement.kind === 'ToolCall'
          ? { ...decision.replacement, id: action.id }
          : `Replaced by a final answer: ${decision.reason}`;
    }
  }

  private async escalate(
    action: ToolCallAction,
    initial: Failure,
    queue: string,
    contextSnapshot: boolean,
    context: ExecutionContext,
  ): Promise<void> {
    const logger = context.logger ?? this.logger;
    if (this.escalation === undefined) {
      logger.warn('Escalation requested but no handler is configured', { tool: action.name, queue });
      return;
    }
    try {
      await this.escalation({
        queue,
        runId: context.runId,
        agentId: context.agentId,
        actionId: action.id,
        toolName: action.name,
        arguments: action.arguments,
        error: { kind: initial.kind, message: initial.message },
        context: contextSnapshot ? context.conversation() : null,
      });
    } catch (error) {
      logger.warn('Escalation handler failed', { tool: action.name, queue }, toError(error));
    }
  }

  private success(action: ToolCallAction, payload: string, started: number, recovery: RecoveryKind | null): Observation {
    return {
      sourceActionId: action.id,
      toolName: action.name,
      result: { status: 'Success', payload },
      durationMs: this.clock.now() - started,
      escalated: false,
      recovery,
    };
  }

  private failed(
    action: ToolCallAction,
    error: Failure,
    started: number,
    recovery: RecoveryKind | null,
    escalated: boolean = false,
  ): Observation {
    return {
      sourceActionId: action.id,
      toolName: action.name,
      result: {
        status: 'Failure',
        error: { kind: error.kind, message: error.message },
        retriable: error.retriable,
      },
      durationMs: this.clock.now() - started,
      escalated,
      recovery,
    };
  }
}

function failure(kind: ExecutionErrorKind, message: string, retriable: boolean): Attempt {
  return { ok: false, kind, message, retriable };
}
