/**
 * @fileoverview Data model of the reasoning loop.
 *
 * Messages, proposed actions, policy decisions, observations, the
 * immutable run configuration and the terminal result. Discriminated
 * unions are tagged by `type`, `kind` or `status` so callers can narrow
 * exhaustively with a `switch`.
 *
 * @module orga-runtime/types/loop
 * @version 0.1.0
 */

import type { AgentId, Timestamp, UniqueId } from './core.types.js';
import type { ExecutionErrorKind } from './errors.js';

// ============ Conversation ============

export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

/**
 * A tool call carried on an assistant message.
 * `arguments` is the raw JSON text produced by the model.
 */
export interface ToolCallRecord {
  readonly id: string;
  readonly name: string;
  readonly arguments: string;
}

export interface Message {
  readonly role: MessageRole;
  readonly content: string;

  /** Id of the tool call a `tool` message answers */
  readonly toolCallId?: string;

  /** Name of the tool a `tool` message answers */
  readonly toolName?: string;

  /** Tool calls requested by an `assistant` message */
  readonly toolCalls?: ReadonlyArray<ToolCallRecord>;
}

// ============ Actions & Decisions ============

export interface ToolCallAction {
  readonly kind: 'ToolCall';
  readonly id: string;
  readonly name: string;
  readonly arguments: string;
}

export interface FinalAnswerAction {
  readonly kind: 'FinalAnswer';
  readonly id: string;
  readonly text: string;
}

/**
 * Candidate step emitted by the model before policy review.
 * Lives only for the iteration that produced it.
 */
export type ProposedAction = ToolCallAction | FinalAnswerAction;

export type LoopDecision =
  | { readonly type: 'Allow' }
  | { readonly type: 'Deny'; readonly reason: string }
  | { readonly type: 'Modify'; readonly replacement: ProposedAction; readonly reason: string };

// ============ Observations ============

export type ObservationFailureKind = ExecutionErrorKind | 'PolicyDenied';

export type RecoveryKind = RecoveryStrategy['type'];

export type ObservationResult =
  | { readonly status: 'Success'; readonly payload: string }
  | {
      readonly status: 'Failure';
      readonly error: { readonly kind: ObservationFailureKind; readonly message: string };
      readonly retriable: boolean;
    };

export interface Observation {
  readonly sourceActionId: string;
  readonly toolName: string;
  readonly result: ObservationResult;
  readonly durationMs: number;

  /** Set when the failure was handed to a human/external queue */
  readonly escalated: boolean;

  /** Recovery strategy that shaped this observation, if any */
  readonly recovery: RecoveryKind | null;
}

// ============ Accounting ============

export interface Usage {
  readonly promptTokens: number;
  readonly completionTokens: number;
  readonly totalTokens: number;
}

export const EMPTY_USAGE: Usage = { promptTokens: 0, completionTokens: 0, totalTokens: 0 };

export function addUsage(a: Usage, b: { promptTokens: number; completionTokens: number }): Usage {
  const promptTokens = a.promptTokens + b.promptTokens;
  const completionTokens = a.completionTokens + b.completionTokens;
  return { promptTokens, completionTokens, totalTokens: promptTokens + completionTokens };
}

// ============ Circuit Breakers ============

export type CircuitBreakerState =
  | { readonly status: 'Closed' }
  | { readonly status: 'Open'; readonly since: number }
  | { readonly status: 'HalfOpen'; readonly probesRemaining: number };

/**
 * Read-only view of the breaker registry exposed through LoopState.
 */
export interface BreakerView {
  stateOf(toolName: string): CircuitBreakerState;
  consecutiveFailures(toolName: string): number;
}

export interface BreakerSettings {
  /** Consecutive failures that open the breaker */
  readonly failureThreshold: number;

  /** Time an open breaker waits before admitting probes */
  readonly cooldownMs: number;

  /** Calls admitted while half-open */
  readonly halfOpenProbes: number;
}

// ============ Configuration ============

/**
 * Declared tool, passed unchanged to the inference provider.
 */
export interface ToolDefinition {
  readonly name: string;
  readonly description: string;
  readonly parameters: Readonly<Record<string, unknown>>;
}

export type RecoveryStrategy =
  | { readonly type: 'Retry'; readonly maxAttempts: number; readonly baseDelayMs: number }
  | { readonly type: 'Fallback'; readonly alternatives: ReadonlyArray<string> }
  | { readonly type: 'CachedResult'; readonly maxStalenessMs: number }
  | { readonly type: 'LlmRecovery'; readonly maxRecoveryAttempts: number }
  | { readonly type: 'Escalate'; readonly queue: string; readonly contextSnapshot: boolean }
  | { readonly type: 'DeadLetter' };

export type ContextStrategy =
  | { readonly type: 'SlidingWindow' }
  | { readonly type: 'ObservationMasking'; readonly keepRecent: number; readonly triggerRatio: number }
  | { readonly type: 'AnchoredSummary'; readonly keepRecent: number };

export interface InferenceSettings {
  readonly model: string | undefined;
  readonly temperature: number;
  readonly maxTokens: number;
}

export interface InferenceRetrySettings {
  /** Retries after the first call */
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: boolean;
}

/**
 * Immutable input of one loop run.
 */
export interface LoopConfig {
  readonly maxIterations: number;
  readonly maxTotalTokens: number;
  readonly timeoutMs: number;
  readonly toolTimeoutMs: number;
  readonly maxConcurrentTools: number;
  readonly contextTokenBudget: number;
  readonly contextStrategy: ContextStrategy;
  readonly defaultRecovery: RecoveryStrategy;
  readonly toolRecovery: Readonly<Record<string, RecoveryStrategy>>;
  readonly breaker: BreakerSettings;
  readonly toolBreakers: Readonly<Record<string, BreakerSettings>>;
  readonly tools: ReadonlyArray<ToolDefinition>;
  readonly inference: InferenceSettings;
  readonly inferenceRetry: InferenceRetrySettings;
}

// ============ Run State & Result ============

/**
 * Running totals carried across iterations. Mutated only by the runner.
 */
export interface LoopState {
  readonly runId: UniqueId;
  readonly agentId: AgentId;
  readonly iteration: number;
  readonly usage: Usage;
  readonly startedAt: Timestamp;
  readonly breakers: BreakerView;

  /** Tools callable in this run: declared tools plus bridge tools */
  readonly tools: ReadonlyArray<ToolDefinition>;
}

export type TerminationReason =
  | { readonly type: 'Completed' }
  | { readonly type: 'MaxIterations' }
  | { readonly type: 'MaxTokens' }
  | { readonly type: 'Timeout' }
  | { readonly type: 'Error'; readonly kind: string; readonly message: string };

export interface LoopResult {
  readonly runId: UniqueId;
  readonly agentId: AgentId;
  readonly output: string;
  readonly iterations: number;
  readonly usage: Usage;
  readonly terminationReason: TerminationReason;
  readonly durationMs: number;
  readonly conversation: ReadonlyArray<Message>;
}

export type PhaseName = 'Reasoning' | 'PolicyCheck' | 'ToolDispatching' | 'Observing';
