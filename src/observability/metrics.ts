/**
 * @fileoverview Reasoning Metrics - Run counters aggregated across runs.
 *
 * A runner updates one instance as its runs start, observe tool results,
 * meet policy denials and terminate. Only a `Completed` run counts as
 * completed; every other termination counts as failed.
 *
 * @module orga-runtime/observability/metrics
 */

import type { LoopResult, Observation } from '../types/loop.types.js';

/**
 * Point-in-time copy of the counters with derived averages.
 */
export interface MetricsSnapshot {
  readonly loopsStarted: number;
  readonly loopsCompleted: number;
  readonly loopsFailed: number;
  readonly totalIterations: number;
  readonly totalTokens: number;

  /** Tool calls that reached the executor, knowledge tools included */
  readonly toolCalls: number;
  readonly toolErrors: number;
  readonly policyDenials: number;

  /** Completed over finished runs; 1 before any run has finished */
  readonly successRate: number;
  readonly avgIterations: number;
  readonly avgTokens: number;
}

interface Counters {
  loopsStarted: number;
  loopsCompleted: number;
  loopsFailed: number;
  totalIterations: number;
  totalTokens: number;
  toolCalls: number;
  toolErrors: number;
  policyDenials: number;
}

const zeroCounters = (): Counters => ({
  loopsStarted: 0,
  loopsCompleted: 0,
  loopsFailed: 0,
  totalIterations: 0,
  totalTokens: 0,
  toolCalls: 0,
  toolErrors: 0,
  policyDenials: 0,
});

export class ReasoningMetrics {
  private counters: Counters = zeroCounters();

  recordLoopStarted(): void {
    this.counters.loopsStarted += 1;
  }

  recordLoopFinished(result: LoopResult): void {
    if (result.terminationReason.type === 'Completed') this.counters.loopsCompleted += 1;
    else this.counters.loopsFailed += 1;
    this.counters.totalIterations += result.iterations;
    this.counters.totalTokens += result.usage.totalTokens;
  }

  /**
   * Denied tool calls arrive here as `PolicyDenied` observations; they are
   * counted by {@link recordPolicyDenial} instead.
   */
  recordObservation(observation: Observation): void {
    if (observation.result.status === 'Failure' && observation.result.error.kind === 'PolicyDenied') return;
    this.counters.toolCalls += 1;
    if (observation.result.status === 'Failure') this.counters.toolErrors += 1;
  }

  recordPolicyDenial(): void {
    this.counters.policyDenials += 1;
  }

  snapshot(): MetricsSnapshot {
    const counters = { ...this.counters };
    const finished = counters.loopsCompleted + counters.loopsFailed;
    return {
      ...counters,
      successRate: finished === 0 ? 1 : counters.loopsCompleted / finished,
      avgIterations: finished === 0 ? 0 : counters.totalIterations / finished,
      avgTokens: finished === 0 ? 0 : counters.totalTokens / finished,
    };
  }

  reset(): void {
    this.counters = zeroCounters();
  }
}
