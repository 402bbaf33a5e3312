/**
 * @fileoverview Loop runner - drives one ORGA run from start to result.
 *
 * The runner builds the per-run collaborators, walks the phase machine
 * until it terminates and turns every outcome, including unexpected
 * faults, into a {@link LoopResult}. It never rejects.
 *
 * @module orga-runtime/agent/loop-runner
 */

import { EventEmitter } from 'eventemitter3';
import { createUniqueId, generateId, systemClock, type AgentId, type Clock, type UniqueId } from '../types/core.types.js';
import { toError } from '../types/errors.js';
import {
  EMPTY_USAGE,
  type CircuitBreakerState,
  type LoopConfig,
  type LoopResult,
  type Message,
  type Observation,
  type PhaseName,
  type TerminationReason,
  type ToolDefinition,
} from '../types/loop.types.js';
import { Conversation, ConversationError } from '../context/conversation.js';
import { ContextBudgeter } from '../context/context-budgeter.js';
import { CalibratedTokenEstimator, type TokenEstimator } from '../context/token-estimator.js';
import type { InferenceProvider } from '../providers/base.js';
import { permissivePolicyGate, type PolicyGate } from '../policy/gate.js';
import {
  DefaultActionExecutor,
  type ActionExecutor,
  type RecoveryEvent,
  type ToolInvoker,
} from '../execution/executor.js';
import { CircuitBreakerRegistry } from '../execution/circuit-breaker.js';
import { ResultCache } from '../execution/recovery.js';
import { noopKnowledgeBridge, type KnowledgeBridge } from '../knowledge/knowledge-bridge.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { JournalWriter, nullJournal, type JournalSink } from '../observability/journal.js';
import { defaultLogger, type Logger } from '../observability/logger.js';
import { ReasoningMetrics } from '../observability/metrics.js';
import { SpanStatus, SpanType, TraceRecorder, type ExecutionTrace } from '../observability/tracer.js';
import { ReasoningPhase, type Phase, type RunContext, type Terminated } from './phases.js';

/**
 * Events emitted by the loop runner.
 */
export interface LoopRunnerEvents {
  'loop:start': (runId: UniqueId, agentId: AgentId) => void;
  'loop:phase': (phase: PhaseName, iteration: number, runId: UniqueId) => void;
  'loop:observation': (observation: Observation, runId: UniqueId) => void;
  'loop:recovery': (event: RecoveryEvent, runId: UniqueId) => void;
  'loop:terminated': (result: LoopResult, trace: ExecutionTrace | null) => void;
}

export interface LoopRunnerOptions {
  provider: InferenceProvider;

  /** Tool backend for the default executor; an empty registry otherwise */
  invoker?: ToolInvoker;

  /** Replaces the default executor entirely */
  executor?: ActionExecutor;
  policyGate?: PolicyGate;
  knowledgeBridge?: KnowledgeBridge;
  journal?: JournalSink;
  logger?: Logger;
  clock?: Clock;

  /**
   * Registry shared by every run of this runner, so tool health carries
   * over between runs. Each run gets a fresh one built from its config
   * when omitted.
   */
  breakers?: CircuitBreakerRegistry;
  estimator?: TokenEstimator;

  /** Counters updated by every run; a fresh instance when omitted */
  metrics?: ReasoningMetrics;

  /** Record a trace of every run (default false) */
  tracing?: boolean;
  random?: () => number;
}

export interface RunOptions {
  runId?: string;

  /** Cancels the run; it then ends with an `Error` reason of kind `Cancelled` */
  signal?: AbortSignal;
}

/**
 * Runs agent invocations through the Reasoning → PolicyCheck →
 * ToolDispatching → Observing cycle.
 *
 * @example
 * ```typescript
 * const runner = new ReasoningLoopRunner({ provider, invoker: registry, journal });
 * runner.on('loop:phase', (phase, iteration) => console.log(iteration, phase));
 *
 * const result = await runner.run(createAgentId('billing'), [{ role: 'user', content: 'Is invoice-7 paid?' }], resolveLoopConfig());
 * ```
 */
export class ReasoningLoopRunner extends EventEmitter<LoopRunnerEvents> {
  readonly metrics: ReasoningMetrics;
  private readonly provider: InferenceProvider;
  private readonly executor: ActionExecutor;
  private readonly policyGate: PolicyGate;
  private readonly knowledge: KnowledgeBridge;
  private readonly journal: JournalSink;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly sharedBreakers: CircuitBreakerRegistry | null;
  private readonly estimator: TokenEstimator;
  private readonly tracing: boolean;
  private readonly random: () => number;

  constructor(options: LoopRunnerOptions) {
    super();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? defaultLogger.child({ module: 'loop' });
    this.provider = options.provider;
    this.executor =
      options.executor ??
      new DefaultActionExecutor({
        invoker: options.invoker ?? new ToolRegistry(),
        clock: this.clock,
        logger: this.logger.child({ module: 'executor' }),
      });
    this.policyGate = options.policyGate ?? permissivePolicyGate;
    this.knowledge = options.knowledgeBridge ?? noopKnowledgeBridge;
    this.journal = options.journal ?? nullJournal;
    this.sharedBreakers = options.breakers ?? null;
    this.metrics = options.metrics ?? new ReasoningMetrics();
    this.estimator = options.estimator ?? new CalibratedTokenEstimator();
    this.tracing = options.tracing ?? false;
    this.random = options.random ?? Math.random;
  }

  /**
   * Runs one agent invocation to completion.
   *
   * @param initialConversation - Copied; the caller's value is never mutated
   */
  async run(
    agentId: AgentId,
    initialConversation: Conversation | ReadonlyArray<Message>,
    config: LoopConfig,
    options: RunOptions = {},
  ): Promise<LoopResult> {
    const runId = options.runId !== undefined ? createRunId(options.runId) : generateId();
    const startedAt = this.clock.now();
    const deadline = startedAt + config.timeoutMs;
    const logger = this.logger.child({ runId, agentId });
    const journal = new JournalWriter({ sink: this.journal, runId, agentId, logger, clock: this.clock });
    const tracer = this.tracing ? new TraceRecorder(runId, this.clock) : null;
    const tools = mergeTools(config.tools, this.knowledge.toolDefinitions());

    const breakers =
      this.sharedBreakers ??
      new CircuitBreakerRegistry({ defaults: config.breaker, overrides: config.toolBreakers, clock: this.clock });
    const onTransition = (toolName: string, from: CircuitBreakerState, to: CircuitBreakerState): void =>
      logger.info('Circuit breaker transition', { tool: toolName, from: from.status, to: to.status });
    breakers.on('breaker:transition', onTransition);

    // `controller` ends the run's work; `timer` only stops the deadline sleep.
    const controller = new AbortController();
    const timer = new AbortController();
    let cancelled = options.signal?.aborted === true;
    const onCancel = (): void => {
      cancelled = true;
      controller.abort();
    };
    options.signal?.addEventListener('abort', onCancel, { once: true });
    if (cancelled) controller.abort();
    const deadlineTimer = this.clock.sleep(config.timeoutMs, timer.signal).then(() => {
      if (!timer.signal.aborted) controller.abort();
    });

    const interrupted = (): TerminationReason | null => {
      if (cancelled) return { type: 'Error', kind: 'Cancelled', message: 'Run cancelled by caller' };
      if (controller.signal.aborted || this.clock.now() >= deadline) return { type: 'Timeout' };
      return null;
    };

    let conversation = Conversation.from([]);
    let iteration = 0;
    let usage = EMPTY_USAGE;
    let outcome: Terminated;
    let accepted = false;
    const rootSpan = tracer?.startSpan('run', { type: SpanType.RUN, attributes: { agentId } }) ?? null;

    logger.info('Loop run started', { maxIterations: config.maxIterations, tools: tools.length });
    this.metrics.recordLoopStarted();
    this.emit('loop:start', runId, agentId);
    await journal.record(0, {
      type: 'Started',
      maxIterations: config.maxIterations,
      maxTotalTokens: config.maxTotalTokens,
      timeoutMs: config.timeoutMs,
      toolCount: tools.length,
    });

    try {
      conversation = Conversation.from(
        initialConversation instanceof Conversation ? initialConversation.getMessages() : initialConversation,
      );
      accepted = true;

      const context: RunContext = {
        runId,
        agentId,
        config,
        conversation,
        tools,
        provider: this.provider,
        policyGate: this.policyGate,
        executor: this.knowledge.wrapExecutor(this.executor),
        knowledge: this.knowledge,
        budgeter: new ContextBudgeter(this.estimator),
        estimator: this.estimator,
        breakers,
        cache: new ResultCache(this.clock),
        llmRecoveries: new Map(),
        journal,
        logger,
        clock: this.clock,
        tracer,
        listener: {
          observation: observation => {
            this.metrics.recordObservation(observation);
            this.emit('loop:observation', observation, runId);
          },
          recovery: event => this.emit('loop:recovery', event, runId),
          denial: () => this.metrics.recordPolicyDenial(),
        },
        random: this.random,
        startedAt,
        deadline,
        signal: controller.signal,
        interrupted,
        iteration: 0,
        usage: EMPTY_USAGE,
      };

      outcome = await this.drive(ReasoningPhase.start(context), context, controller);
      iteration = context.iteration;
      usage = context.usage;
    } catch (error) {
      const cause = toError(error);
      if (!accepted && error instanceof ConversationError) {
        logger.warn('Rejected initial conversation', {}, cause);
        outcome = { phase: 'Terminated', reason: { type: 'Error', kind: 'InvalidInput', message: cause.message }, answer: null };
      } else {
        logger.error('Loop run failed unexpectedly', {}, cause);
        outcome = { phase: 'Terminated', reason: { type: 'Error', kind: 'Internal', message: cause.message }, answer: null };
      }
    } finally {
      timer.abort();
      controller.abort();
      options.signal?.removeEventListener('abort', onCancel);
      breakers.off('breaker:transition', onTransition);
      await deadlineTimer;
    }

    const durationMs = this.clock.now() - startedAt;
    const result: LoopResult = {
      runId,
      agentId,
      output: outcome.answer ?? conversation.lastAssistantText(),
      iterations: iteration,
      usage,
      terminationReason: outcome.reason,
      durationMs,
      conversation: conversation.getMessages(),
    };

    this.metrics.recordLoopFinished(result);
    await journal.record(iteration, { type: 'Terminated', reason: outcome.reason, iterations: iteration, usage, durationMs });
    logger.info('Loop run terminated', {
      reason: outcome.reason.type,
      iterations: iteration,
      totalTokens: usage.totalTokens,
      durationMs,
    });

    try {
      await this.knowledge.afterRun(agentId, result);
    } catch (error) {
      logger.warn('Knowledge persistence failed', {}, toError(error));
    }

    const success = outcome.reason.type === 'Completed';
    if (rootSpan !== null) tracer?.endSpan(rootSpan, success ? SpanStatus.OK : SpanStatus.ERROR, { reason: outcome.reason.type });
    const trace = tracer?.finalize(success) ?? null;

    this.emit('loop:terminated', result, trace);
    return result;
  }

  // ============ Private Methods ============

  /**
   * Advances the phase machine until it terminates. Past the deadline the
   * run signal is aborted, so the rest of the cycle does no work and the
   * next Reasoning phase ends the run.
   */
  private async drive(start: Phase, context: RunContext, controller: AbortController): Promise<Terminated> {
    let phase: Phase | Terminated = start;

    while (phase.phase !== 'Terminated') {
      if (!controller.signal.aborted && this.clock.now() >= context.deadline) {
        controller.abort();
      }
      this.emit('loop:phase', phase.phase, context.iteration, context.runId);

      switch (phase.phase) {
        case 'Reasoning':
          phase = await phase.produceOutput();
          break;
        case 'PolicyCheck':
          phase = await phase.checkPolicy();
          break;
        case 'ToolDispatching':
          phase = await phase.dispatchTools();
          break;
        case 'Observing':
          phase = await phase.observeResults();
          break;
      }
    }
    return phase;
  }
}

// ============ Helpers ============

function createRunId(value: string): UniqueId {
  return value === '' ? generateId() : createUniqueId(value);
}

/**
 * Declared tools first; bridge tools whose names are already declared are
 * skipped.
 */
function mergeTools(
  declared: ReadonlyArray<ToolDefinition>,
  bridged: ReadonlyArray<ToolDefinition>,
): ReadonlyArray<ToolDefinition> {
  const names = new Set(declared.map(tool => tool.name));
  return [...declared, ...bridged.filter(tool => !names.has(tool.name))];
}
