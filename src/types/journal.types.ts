/**
 * @fileoverview Journal entry and loop event definitions.
 *
 * Every phase transition and terminal outcome of a run is recorded as a
 * sequenced {@link JournalEntry}. The zod schemas validate entries read
 * back from durable storage.
 *
 * @module orga-runtime/types/journal
 */

import { z } from 'zod';
import type { TerminationReason, Usage } from './loop.types.js';

export interface ActionSummary {
  readonly id: string;
  readonly kind: 'ToolCall' | 'FinalAnswer';
  readonly name: string | null;
}

export interface DecisionSummary {
  readonly actionId: string;
  readonly verdict: 'Allow' | 'Deny' | 'Modify';
  readonly reason: string | null;
}

export interface ObservationSummary {
  readonly sourceActionId: string;
  readonly toolName: string;
  readonly status: 'Success' | 'Failure';
}

/**
 * Tagged record of one step of a run.
 *
 * The four phase events (`ReasoningComplete`, `PolicyEvaluated`,
 * `ToolsDispatched`, `ObservationsCollected`) always appear in that order
 * within an iteration. `InferenceRetried`, `ContextTrimmed` and
 * `RecoveryTriggered` are auxiliary and may appear inside a phase.
 */
export type LoopEvent =
  | {
      readonly type: 'Started';
      readonly maxIterations: number;
      readonly maxTotalTokens: number;
      readonly timeoutMs: number;
      readonly toolCount: number;
    }
  | {
      readonly type: 'ContextTrimmed';
      readonly strategy: string;
      readonly tokensBefore: number;
      readonly tokensAfter: number;
    }
  | {
      readonly type: 'InferenceRetried';
      readonly attempt: number;
      readonly kind: string;
      readonly delayMs: number;
    }
  | {
      readonly type: 'ReasoningComplete';
      readonly actions: ReadonlyArray<ActionSummary>;
      readonly promptTokens: number;
      readonly completionTokens: number;
      readonly model: string;
    }
  | {
      readonly type: 'PolicyEvaluated';
      readonly actionCount: number;
      readonly deniedCount: number;
      readonly modifiedCount: number;
      readonly decisions: ReadonlyArray<DecisionSummary>;
    }
  | {
      readonly type: 'ToolsDispatched';
      readonly toolCount: number;
      readonly durationMs: number;
    }
  | {
      readonly type: 'RecoveryTriggered';
      readonly toolName: string;
      readonly strategy: string;
      readonly error: string;
    }
  | {
      readonly type: 'ObservationsCollected';
      readonly count: number;
      readonly failureCount: number;
      readonly observations: ReadonlyArray<ObservationSummary>;
    }
  | {
      readonly type: 'Terminated';
      readonly reason: TerminationReason;
      readonly iterations: number;
      readonly usage: Usage;
      readonly durationMs: number;
    };

export type LoopEventType = LoopEvent['type'];

export interface JournalEntry {
  readonly runId: string;
  readonly agentId: string;

  /** Monotonic per run, starting at 1 */
  readonly sequence: number;
  readonly timestamp: number;
  readonly iteration: number;
  readonly event: LoopEvent;
}

// ============ Schemas ============

const UsageSchema = z.object({
  promptTokens: z.number().int().nonnegative(),
  completionTokens: z.number().int().nonnegative(),
  totalTokens: z.number().int().nonnegative(),
});

const TerminationReasonSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Completed') }),
  z.object({ type: z.literal('MaxIterations') }),
  z.object({ type: z.literal('MaxTokens') }),
  z.object({ type: z.literal('Timeout') }),
  z.object({ type: z.literal('Error'), kind: z.string(), message: z.string() }),
]);

export const LoopEventSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('Started'),
    maxIterations: z.number(),
    maxTotalTokens: z.number(),
    timeoutMs: z.number(),
    toolCount: z.number(),
  }),
  z.object({
    type: z.literal('ContextTrimmed'),
    strategy: z.string(),
    tokensBefore: z.number(),
    tokensAfter: z.number(),
  }),
  z.object({
    type: z.literal('InferenceRetried'),
    attempt: z.number(),
    kind: z.string(),
    delayMs: z.number(),
  }),
  z.object({
    type: z.literal('ReasoningComplete'),
    actions: z.array(
      z.object({
        id: z.string(),
        kind: z.enum(['ToolCall', 'FinalAnswer']),
        name: z.string().nullable(),
      }),
    ),
    promptTokens: z.number(),
    completionTokens: z.number(),
    model: z.string(),
  }),
  z.object({
    type: z.literal('PolicyEvaluated'),
    actionCount: z.number(),
    deniedCount: z.number(),
    modifiedCount: z.number(),
    decisions: z.array(
      z.object({
        actionId: z.string(),
        verdict: z.enum(['Allow', 'Deny', 'Modify']),
        reason: z.string().nullable(),
      }),
    ),
  }),
  z.object({
    type: z.literal('ToolsDispatched'),
    toolCount: z.number(),
    durationMs: z.number(),
  }),
  z.object({
    type: z.literal('RecoveryTriggered'),
    toolName: z.string(),
    strategy: z.string(),
    error: z.string(),
  }),
  z.object({
    type: z.literal('ObservationsCollected'),
    count: z.number(),
    failureCount: z.number(),
    observations: z.array(
      z.object({
        sourceActionId: z.string(),
        toolName: z.string(),
        status: z.enum(['Success', 'Failure']),
      }),
    ),
  }),
  z.object({
    type: z.literal('Terminated'),
    reason: TerminationReasonSchema,
    iterations: z.number(),
    usage: UsageSchema,
    durationMs: z.number(),
  }),
]) satisfies z.ZodType<LoopEvent>;

export const JournalEntrySchema = z.object({
  runId: z.string(),
  agentId: z.string(),
  sequence: z.number().int().positive(),
  timestamp: z.number(),
  iteration: z.number().int().nonnegative(),
  event: LoopEventSchema,
}) satisfies z.ZodType<JournalEntry>;
