/**
 * @fileoverview Phase state machine for one loop run.
 *
 * Each phase object exposes exactly one transition, and that transition
 * returns the only phase allowed to follow:
 *
 *   ReasoningPhase.produceOutput()       → PolicyCheckPhase | Terminated
 *   PolicyCheckPhase.checkPolicy()       → ToolDispatchingPhase
 *   ToolDispatchingPhase.dispatchTools() → ObservingPhase
 *   ObservingPhase.observeResults()      → ReasoningPhase | Terminated
 *
 * Only a ReasoningPhase can be created from outside this module, so an
 * action cannot reach the executor without passing the policy gate. Phase
 * objects are single-use; a second transition call throws.
 *
 * @module orga-runtime/agent/phases
 */

import { createTimestamp, generateId, type AgentId, type Clock, type UniqueId } from '../types/core.types.js';
import { BudgetExceededError, InferenceError, OrgaError, PolicyError, toError } from '../types/errors.js';
import {
  addUsage,
  type FinalAnswerAction,
  type LoopConfig,
  type LoopDecision,
  type LoopState,
  type Observation,
  type PhaseName,
  type ProposedAction,
  type TerminationReason,
  type ToolCallAction,
  type ToolDefinition,
  type Usage,
} from '../types/loop.types.js';
import type { ActionSummary, DecisionSummary, LoopEvent } from '../types/journal.types.js';
import type { Conversation } from '../context/conversation.js';
import type { ContextBudgeter } from '../context/context-budgeter.js';
import type { TokenEstimator } from '../context/token-estimator.js';
import type { InferenceOptions, InferenceProvider, InferenceResponse } from '../providers/base.js';
import { withId, type PolicyGate } from '../policy/gate.js';
import type { ActionExecutor, ExecutionContext, RecoveryEvent } from '../execution/executor.js';
import type { CircuitBreakerRegistry } from '../execution/circuit-breaker.js';
import type { ResultCache } from '../execution/recovery.js';
import type { KnowledgeBridge } from '../knowledge/knowledge-bridge.js';
import type { JournalWriter } from '../observability/journal.js';
import type { Logger } from '../observability/logger.js';
import { SpanStatus, SpanType, type TraceRecorder } from '../observability/tracer.js';
import { withInferenceRetry } from './inference-retry.js';

/**
 * Receives progress notifications from the phases.
 */
export interface PhaseListener {
  observation(observation: Observation): void;
  recovery(event: RecoveryEvent): void;
  denial(action: ProposedAction, reason: string): void;
}

/**
 * Everything one run shares between its phases. `iteration` and `usage`
 * are the only fields that change, and only inside a transition.
 */
export interface RunContext {
  readonly runId: UniqueId;
  readonly agentId: AgentId;
  readonly config: LoopConfig;
  readonly conversation: Conversation;

  /** Declared tools plus knowledge tools */
  readonly tools: ReadonlyArray<ToolDefinition>;
  readonly provider: InferenceProvider;
  readonly policyGate: PolicyGate;
  readonly executor: ActionExecutor;
  readonly knowledge: KnowledgeBridge;
  readonly budgeter: ContextBudgeter;
  readonly estimator: TokenEstimator;
  readonly breakers: CircuitBreakerRegistry;
  readonly cache: ResultCache;
  readonly llmRecoveries: Map<string, number>;
  readonly journal: JournalWriter;
  readonly logger: Logger;
  readonly clock: Clock;
  readonly tracer: TraceRecorder | null;
  readonly listener: PhaseListener;
  readonly random: () => number;
  readonly startedAt: number;
  readonly deadline: number;

  /** Aborted when the deadline passes or the caller cancels */
  readonly signal: AbortSignal;

  /** Why the run must stop now for reasons outside its limits, if it must */
  interrupted(): TerminationReason | null;
  iteration: number;
  usage: Usage;
}

export interface Terminated {
  readonly phase: 'Terminated';
  readonly reason: TerminationReason;

  /** Text of the approved final answer, when there is one */
  readonly answer: string | null;
}

export type Phase = ReasoningPhase | PolicyCheckPhase | ToolDispatchingPhase | ObservingPhase;

interface Denial {
  readonly action: ProposedAction;
  readonly reason: string;
}

/** Guards the constructors of the phases that must be earned */
const TRANSITION: unique symbol = Symbol('phase-transition');

const EXPIRED = Symbol('inference-expired');
const INFERENCE_EXPIRED = 'INFERENCE_EXPIRED';

const DENIED_TOOL_PREFIX = '[Policy denied]';
const DENIED_ANSWER_PREFIX = '[Policy Feedback]';

/**
 * Snapshot of the running totals handed to the policy gate.
 */
export function loopState(context: RunContext): LoopState {
  return {
    runId: context.runId,
    agentId: context.agentId,
    iteration: context.iteration,
    usage: context.usage,
    startedAt: createTimestamp(context.startedAt),
    breakers: context.breakers.view(),
    tools: context.tools,
  };
}

abstract class PhaseBase {
  abstract readonly phase: PhaseName;
  protected readonly context: RunContext;
  private consumed = false;

  protected constructor(context: RunContext) {
    this.context = context;
  }

  get iteration(): number {
    return this.context.iteration;
  }

  protected consume(): void {
    if (this.consumed) {
      throw new OrgaError(`${this.phase} phase has already advanced`, 'PHASE_REUSED', false);
    }
    this.consumed = true;
  }

  protected record(event: LoopEvent): Promise<void> {
    return this.context.journal.record(this.context.iteration, event);
  }

  protected openSpan(attributes: Record<string, unknown> = {}): UniqueId | null {
    return (
      this.context.tracer?.startSpan(this.phase, {
        type: SpanType.PHASE,
        phase: this.phase,
        iteration: this.context.iteration,
        attributes,
      }) ?? null
    );
  }

  protected closeSpan(spanId: UniqueId | null, status: SpanStatus, attributes?: Record<string, unknown>): void {
    if (spanId !== null) this.context.tracer?.endSpan(spanId, status, attributes);
  }
}

// ============ Reasoning ============

export class ReasoningPhase extends PhaseBase {
  readonly phase = 'Reasoning' as const;

  private constructor(context: RunContext) {
    super(context);
  }

  /**
   * First phase of a run.
   */
  static start(context: RunContext): ReasoningPhase {
    return new ReasoningPhase(context);
  }

  /** @internal */
  static next(key: typeof TRANSITION, context: RunContext): ReasoningPhase {
    guard(key);
    return new ReasoningPhase(context);
  }

  /**
   * Checks the limits, calls the model and turns its reply into proposed
   * actions.
   */
  async produceOutput(): Promise<PolicyCheckPhase | Terminated> {
    this.consume();
    const context = this.context;

    const limit = this.limitReached();
    if (limit !== null) return terminated(limit);

    const spanId = this.openSpan();
    try {
      await this.refreshKnowledge();
      await this.enforceBudget();

      const prompt = context.conversation.getMessages();
      let response: InferenceResponse;
      try {
        response = await this.infer();
      } catch (error) {
        this.closeSpan(spanId, SpanStatus.ERROR);
        return terminated(this.inferenceFailure(error));
      }

      context.usage = addUsage(context.usage, response.usage);
      context.estimator.reconcile(prompt, response.usage.promptTokens);

      const actions = response.actions.length > 0 ? response.actions : [finalAnswer(response.content)];
      const calls = actions.filter(isToolCall);
      context.conversation.push(
        calls.length > 0
          ? {
              role: 'assistant',
              content: response.content,
              toolCalls: calls.map(call => ({ id: call.id, name: call.name, arguments: call.arguments })),
            }
          : { role: 'assistant', content: response.content },
      );

      context.iteration += 1;
      context.tracer?.setIteration(context.iteration);
      await this.record({
        type: 'ReasoningComplete',
        actions: actions.map(summarizeAction),
        promptTokens: response.usage.promptTokens,
        completionTokens: response.usage.completionTokens,
        model: response.model,
      });
      context.logger.debug('Reasoning complete', {
        iteration: context.iteration,
        actions: actions.length,
        finishReason: response.finishReason,
      });

      this.closeSpan(spanId, SpanStatus.OK, { actions: actions.length, model: response.model });
      return new PolicyCheckPhase(TRANSITION, context, actions);
    } catch (error) {
      this.closeSpan(spanId, SpanStatus.ERROR);
      throw error;
    }
  }

  // ============ Private Methods ============

  /**
   * Iterations, then tokens, then time.
   */
  private limitReached(): TerminationReason | null {
    const exceeded = budgetExceeded(this.context);
    // A cancellation outranks the clock but not the counters.
    if (exceeded === null || exceeded.limit === 'time') {
      const interrupted = this.context.interrupted();
      if (interrupted !== null) return interrupted;
    }
    if (exceeded === null) return null;
    this.context.logger.info('Run budget exhausted', { limit: exceeded.limit, reason: exceeded.message });
    return exceeded.terminationReason;
  }

  private async refreshKnowledge(): Promise<void> {
    const { knowledge, agentId, conversation, logger } = this.context;
    try {
      const injected = await knowledge.beforeReasoning(agentId, conversation);
      if (injected > 0) logger.debug('Knowledge context injected', { items: injected });
    } catch (error) {
      logger.warn('Knowledge retrieval failed; reasoning without it', {}, toError(error));
    }
  }

  private async enforceBudget(): Promise<void> {
    const { budgeter, conversation, config } = this.context;
    const report = budgeter.enforceBudget(conversation, config.contextTokenBudget, config.contextStrategy);
    if (!report.changed) return;

    await this.record({
      type: 'ContextTrimmed',
      strategy: report.strategy,
      tokensBefore: report.tokensBefore,
      tokensAfter: report.tokensAfter,
    });
    this.context.logger.debug('Context budget enforced', {
      strategy: report.strategy,
      tokensBefore: report.tokensBefore,
      tokensAfter: report.tokensAfter,
      removed: report.removed,
      masked: report.masked,
      fellBack: report.fellBack,
    });
  }

  private infer(): Promise<InferenceResponse> {
    const context = this.context;
    const { inference, maxTotalTokens } = context.config;
    const remaining = Math.max(maxTotalTokens - context.usage.totalTokens, 1);
    const retries: Promise<void>[] = [];
    const spanId = context.tracer?.startSpan(`inference:${context.provider.name}`, { type: SpanType.INFERENCE }) ?? null;

    const call = withInferenceRetry(
      () =>
        this.completeBeforeDeadline({
          model: inference.model,
          temperature: inference.temperature,
          maxTokens: Math.min(inference.maxTokens, remaining),
          tools: context.tools,
          signal: context.signal,
        }),
      {
        settings: context.config.inferenceRetry,
        clock: context.clock,
        deadline: context.deadline,
        signal: context.signal,
        random: context.random,
        onRetry: (error, attempt, delayMs) => {
          context.logger.warn('Retrying inference', { attempt, kind: error.kind, delayMs }, error);
          retries.push(this.record({ type: 'InferenceRetried', attempt, kind: error.kind, delayMs }));
        },
      },
    );
    return call
      .then(
        response => {
          if (spanId !== null) {
            context.tracer?.endSpan(spanId, SpanStatus.OK, {
              model: response.model,
              promptTokens: response.usage.promptTokens,
              completionTokens: response.usage.completionTokens,
            });
          }
          return response;
        },
        (error: unknown) => {
          if (spanId !== null) context.tracer?.endSpan(spanId, SpanStatus.ERROR, { error: toError(error).message });
          throw error;
        },
      )
      .finally(() => Promise.all(retries));
  }

  /**
   * The provider call raced against the run deadline, so a backend that
   * ignores the abort signal cannot hold the run open.
   */
  private async completeBeforeDeadline(options: InferenceOptions): Promise<InferenceResponse> {
    const { provider, conversation, clock, deadline, signal } = this.context;
    const settled = new AbortController();
    try {
      const outcome = await Promise.race([
        provider.complete(conversation, options),
        clock
          .sleep(deadline - clock.now(), AbortSignal.any([signal, settled.signal]))
          .then((): typeof EXPIRED => EXPIRED),
      ]);
      if (outcome === EXPIRED) {
        throw new OrgaError(`Inference by "${provider.name}" did not finish before the run ended`, INFERENCE_EXPIRED, false);
      }
      return outcome;
    } finally {
      settled.abort();
    }
  }

  private inferenceFailure(error: unknown): TerminationReason {
    const interrupted = this.context.interrupted();
    if (interrupted !== null) return interrupted;
    if (error instanceof OrgaError && error.code === INFERENCE_EXPIRED) return { type: 'Timeout' };
    if (error instanceof InferenceError) {
      this.context.logger.error('Inference failed', { kind: error.kind }, error);
      return { type: 'Error', kind: error.kind, message: error.message };
    }
    const cause = toError(error);
    this.context.logger.error('Inference failed unexpectedly', {}, cause);
    return { type: 'Error', kind: 'Internal', message: cause.message };
  }
}

// ============ Policy Check ============

export class PolicyCheckPhase extends PhaseBase {
  readonly phase = 'PolicyCheck' as const;
  readonly actions: ReadonlyArray<ProposedAction>;

  /** @internal */
  constructor(key: typeof TRANSITION, context: RunContext, actions: ReadonlyArray<ProposedAction>) {
    guard(key);
    super(context);
    this.actions = actions;
  }

  /**
   * Evaluates every action. Denied actions become feedback for the next
   * Reasoning call; modified actions are replaced, keeping their ids.
   */
  async checkPolicy(): Promise<ToolDispatchingPhase> {
    this.consume();
    const spanId = this.openSpan({ actions: this.actions.length });

    const approved: ProposedAction[] = [];
    const denials: Denial[] = [];
    const decisions: DecisionSummary[] = [];

    for (const action of this.actions) {
      const decision = evaluatePolicy(this.context, action);
      switch (decision.type) {
        case 'Allow':
          approved.push(action);
          decisions.push({ actionId: action.id, verdict: 'Allow', reason: null });
          break;
        case 'Modify':
          approved.push(withId(decision.replacement, action.id));
          decisions.push({ actionId: action.id, verdict: 'Modify', reason: decision.reason });
          break;
        case 'Deny':
          denials.push({ action, reason: decision.reason });
          this.context.listener.denial(action, decision.reason);
          decisions.push({ actionId: action.id, verdict: 'Deny', reason: decision.reason });
          break;
      }
    }

    const modifiedCount = decisions.filter(d => d.verdict === 'Modify').length;
    await this.record({
      type: 'PolicyEvaluated',
      actionCount: this.actions.length,
      deniedCount: denials.length,
      modifiedCount,
      decisions,
    });
    if (denials.length > 0) {
      this.context.logger.info('Actions denied by policy', {
        denied: denials.map(d => ({ action: d.action.id, reason: d.reason })),
      });
    }

    this.closeSpan(spanId, SpanStatus.OK, { denied: denials.length, modified: modifiedCount });
    return new ToolDispatchingPhase(TRANSITION, this.context, this.actions, approved, denials);
  }
}

// ============ Tool Dispatching ============

export class ToolDispatchingPhase extends PhaseBase {
  readonly phase = 'ToolDispatching' as const;
  private readonly proposed: ReadonlyArray<ProposedAction>;
  private readonly approved: ReadonlyArray<ProposedAction>;
  private readonly denials: ReadonlyArray<Denial>;

  /** @internal */
  constructor(
    key: typeof TRANSITION,
    context: RunContext,
    proposed: ReadonlyArray<ProposedAction>,
    approved: ReadonlyArray<ProposedAction>,
    denials: ReadonlyArray<Denial>,
  ) {
    guard(key);
    super(context);
    this.proposed = proposed;
    this.approved = approved;
    this.denials = denials;
  }

  /**
   * Hands approved tool calls to the executor. Nothing is dispatched when
   * an approved final answer ends the run.
   */
  async dispatchTools(): Promise<ObservingPhase> {
    this.consume();
    const context = this.context;
    const answer = this.approved.find(isFinalAnswer) ?? null;
    const calls = answer === null ? this.approved.filter(isToolCall) : [];
    const spanId = this.openSpan({ tools: calls.length });

    const started = context.clock.now();
    const recoveries: Promise<void>[] = [];
    const observations =
      calls.length > 0
        ? await this.execute(calls, spanId, event => {
            context.listener.recovery(event);
            recoveries.push(
              this.record({ type: 'RecoveryTriggered', toolName: event.toolName, strategy: event.strategy, error: event.error }),
            );
          })
        : [];
    await Promise.all(recoveries);

    const durationMs = context.clock.now() - started;
    await this.record({ type: 'ToolsDispatched', toolCount: calls.length, durationMs });

    this.closeSpan(spanId, SpanStatus.OK, { durationMs });
    return new ObservingPhase(TRANSITION, context, this.proposed, answer, observations, this.denials);
  }

  private async execute(
    calls: ToolCallAction[],
    spanId: UniqueId | null,
    onRecovery: (event: RecoveryEvent) => void,
  ): Promise<Observation[]> {
    const context = this.context;
    const execution: ExecutionContext = {
      runId: context.runId,
      agentId: context.agentId,
      iteration: context.iteration,
      config: context.config,
      breakers: context.breakers,
      deadline: context.deadline,
      signal: context.signal,
      cache: context.cache,
      llmRecoveries: context.llmRecoveries,
      logger: context.logger,
      conversation: () => context.conversation.getMessages(),
      authorize: action => evaluatePolicy(context, action),
      traceTool: action => this.traceTool(action, spanId),
      onRecovery,
    };

    try {
      return await context.executor.executeActions(calls, execution);
    } catch (error) {
      const message = toError(error).message;
      context.logger.error('Executor failed; reporting every call as failed', { tools: calls.length }, toError(error));
      return calls.map((call): Observation => ({
        sourceActionId: call.id,
        toolName: call.name,
        result: { status: 'Failure', error: { kind: 'InvocationFailed', message }, retriable: false },
        durationMs: 0,
        escalated: false,
        recovery: null,
      }));
    }
  }

  /**
   * One TOOL span per call under the phase span. Calls run concurrently, so
   * the parent is explicit rather than the innermost open span.
   */
  private traceTool(action: ToolCallAction, phaseSpanId: UniqueId | null): (observation: Observation) => void {
    const tracer = this.context.tracer;
    if (tracer === null || phaseSpanId === null) return () => undefined;
    const spanId = tracer.startSpan(`tool:${action.name}`, {
      type: SpanType.TOOL,
      parentId: phaseSpanId,
      phase: this.phase,
      iteration: this.context.iteration,
      attributes: { actionId: action.id },
    });
    return observation => {
      const { result, recovery } = observation;
      if (result.status === 'Success') tracer.endSpan(spanId, SpanStatus.OK, { recovery });
      else tracer.endSpan(spanId, SpanStatus.ERROR, { recovery, error: result.error.kind });
    };
  }
}

/**
 * The first run limit reached, checking iterations, then tokens, then time.
 */
export function budgetExceeded(context: RunContext): BudgetExceededError | null {
  const { config, usage, iteration, clock } = context;
  if (iteration >= config.maxIterations) {
    return new BudgetExceededError('iterations', `Reached maxIterations (${config.maxIterations})`);
  }
  if (usage.totalTokens >= config.maxTotalTokens) {
    return new BudgetExceededError('tokens', `Used ${usage.totalTokens} of ${config.maxTotalTokens} tokens`);
  }
  const elapsed = clock.now() - context.startedAt;
  if (elapsed >= config.timeoutMs) {
    return new BudgetExceededError('time', `Ran for ${elapsed}ms of ${config.timeoutMs}ms`);
  }
  return null;
}

/**
 * A gate that throws denies the action.
 */
function evaluatePolicy(context: RunContext, action: ProposedAction): LoopDecision {
  try {
    return context.policyGate.evaluate(context.agentId, action, loopState(context));
  } catch (error) {
    const reason = error instanceof PolicyError ? error.message : `Policy evaluation failed: ${toError(error).message}`;
    return { type: 'Deny', reason };
  }
}

// ============ Observing ============

export class ObservingPhase extends PhaseBase {
  readonly phase = 'Observing' as const;
  private readonly proposed: ReadonlyArray<ProposedAction>;
  private readonly answer: FinalAnswerAction | null;
  private readonly observations: ReadonlyArray<Observation>;
  private readonly denials: ReadonlyArray<Denial>;

  /** @internal */
  constructor(
    key: typeof TRANSITION,
    context: RunContext,
    proposed: ReadonlyArray<ProposedAction>,
    answer: FinalAnswerAction | null,
    observations: ReadonlyArray<Observation>,
    denials: ReadonlyArray<Denial>,
  ) {
    guard(key);
    super(context);
    this.proposed = proposed;
    this.answer = answer;
    this.observations = observations;
    this.denials = denials;
  }

  /**
   * Appends every observation, denials included, in the order the actions
   * were proposed. Ends the run when a final answer was approved.
   */
  async observeResults(): Promise<ReasoningPhase | Terminated> {
    this.consume();
    const { conversation, listener } = this.context;
    const spanId = this.openSpan();

    const byAction = new Map(this.observations.map(observation => [observation.sourceActionId, observation]));
    const denied = new Map(this.denials.map(denial => [denial.action.id, denial.reason]));
    const collected: Observation[] = [];

    for (const action of this.proposed) {
      const reason = denied.get(action.id);
      if (reason !== undefined) {
        if (action.kind === 'ToolCall') {
          const observation = deniedObservation(action, reason);
          conversation.push({
            role: 'tool',
            toolCallId: action.id,
            toolName: action.name,
            content: `${DENIED_TOOL_PREFIX} ${reason}`,
          });
          collected.push(observation);
        } else {
          conversation.push({ role: 'user', content: `${DENIED_ANSWER_PREFIX} ${reason}` });
        }
        continue;
      }

      const observation = byAction.get(action.id);
      if (observation === undefined) continue;
      conversation.push({
        role: 'tool',
        toolCallId: observation.sourceActionId,
        toolName: observation.toolName,
        content: observationText(observation),
      });
      collected.push(observation);
    }

    for (const observation of collected) listener.observation(observation);

    const failureCount = collected.filter(o => o.result.status === 'Failure').length;
    await this.record({
      type: 'ObservationsCollected',
      count: collected.length,
      failureCount,
      observations: collected.map(o => ({
        sourceActionId: o.sourceActionId,
        toolName: o.toolName,
        status: o.result.status,
      })),
    });

    this.closeSpan(spanId, SpanStatus.OK, { observations: collected.length, failures: failureCount });
    if (this.answer !== null) {
      return { phase: 'Terminated', reason: { type: 'Completed' }, answer: this.answer.text };
    }
    return ReasoningPhase.next(TRANSITION, this.context);
  }
}

// ============ Helpers ============

function guard(key: typeof TRANSITION): void {
  if (key !== TRANSITION) throw new OrgaError('Phases are created by transitions only', 'PHASE_FORGED', false);
}

function terminated(reason: TerminationReason): Terminated {
  return { phase: 'Terminated', reason, answer: null };
}

function isToolCall(action: ProposedAction): action is ToolCallAction {
  return action.kind === 'ToolCall';
}

function isFinalAnswer(action: ProposedAction): action is FinalAnswerAction {
  return action.kind === 'FinalAnswer';
}

function finalAnswer(text: string): FinalAnswerAction {
  return { kind: 'FinalAnswer', id: `answer_${generateId()}`, text };
}

function summarizeAction(action: ProposedAction): ActionSummary {
  return { id: action.id, kind: action.kind, name: action.kind === 'ToolCall' ? action.name : null };
}

function deniedObservation(action: ToolCallAction, reason: string): Observation {
  return {
    sourceActionId: action.id,
    toolName: action.name,
    result: { status: 'Failure', error: { kind: 'PolicyDenied', message: reason }, retriable: false },
    durationMs: 0,
    escalated: false,
    recovery: null,
  };
}

/**
 * Tool message text for an observation.
 */
export function observationText(observation: Observation): string {
  return observation.result.status === 'Success'
    ? observation.result.payload
    : `[Error] ${observation.result.error.message}`;
}
