/**
 * @fileoverview Unit tests for the journal phase-order verifier
 */

import { describe, it, expect } from 'vitest';
import { verifyPhaseOrder } from './phase-order.js';
import type { JournalEntry, LoopEvent } from '../types/index.js';

const EVENTS: Record<string, LoopEvent> = {
  started: { type: 'Started', maxIterations: 3, maxTotalTokens: 100, timeoutMs: 1000, toolCount: 0 },
  reasoning: { type: 'ReasoningComplete', actions: [], promptTokens: 1, completionTokens: 1, model: 'm' },
  policy: { type: 'PolicyEvaluated', actionCount: 0, deniedCount: 0, modifiedCount: 0, decisions: [] },
  dispatch: { type: 'ToolsDispatched', toolCount: 0, durationMs: 0 },
  observe: { type: 'ObservationsCollected', count: 0, failureCount: 0, observations: [] },
  retry: { type: 'InferenceRetried', attempt: 1, kind: 'Transient', delayMs: 10 },
  done: {
    type: 'Terminated',
    reason: { type: 'Completed' },
    iterations: 1,
    usage: { promptTokens: 1, completionTokens: 1, totalTokens: 2 },
    durationMs: 5,
  },
};

function trail(runId: string, steps: Array<[string, number]>): JournalEntry[] {
  return steps.map(([name, iteration], index) => ({
    runId,
    agentId: 'agent',
    sequence: index + 1,
    timestamp: index,
    iteration,
    event: EVENTS[name],
  }));
}

const CYCLE: Array<[string, number]> = [
  ['reasoning', 1],
  ['policy', 1],
  ['dispatch', 1],
  ['observe', 1],
];

describe('verifyPhaseOrder', () => {
  it('should accept complete cycles with auxiliary events interleaved', () => {
    const entries = trail('r1', [['started', 0], ['retry', 0], ...CYCLE, ['reasoning', 2], ['policy', 2], ['dispatch', 2], ['observe', 2], ['done', 2]]);

    const report = verifyPhaseOrder(entries);

    expect(report.valid).toBe(true);
    expect(report.cycles).toEqual({ r1: 2 });
  });

  it('should accept a run terminated before its first reasoning phase', () => {
    expect(verifyPhaseOrder(trail('r1', [['started', 0], ['done', 0]])).valid).toBe(true);
  });

  it('should flag a skipped policy phase', () => {
    const report = verifyPhaseOrder(trail('r1', [['started', 0], ['reasoning', 1], ['dispatch', 1]]));

    expect(report.valid).toBe(false);
    expect(report.violations).toEqual(['r1#3: unexpected ToolsDispatched while expecting policy']);
  });

  it('should flag termination in the middle of a cycle', () => {
    const report = verifyPhaseOrder(trail('r1', [['started', 0], ['reasoning', 1], ['policy', 1], ['done', 1]]));

    expect(report.violations).toEqual(['r1#4: unexpected Terminated while expecting dispatch']);
  });

  it('should verify interleaved runs independently', () => {
    const a = trail('a', [['started', 0], ...CYCLE, ['done', 1]]);
    const b = trail('b', [['started', 0], ['done', 0]]);
    const interleaved = [a[0], b[0], a[1], a[2], b[1], a[3], a[4], a[5]];

    const report = verifyPhaseOrder(interleaved);

    expect(report.valid).toBe(true);
    expect(report.cycles).toEqual({ a: 1, b: 0 });
  });

  it('should flag sequence gaps', () => {
    const entries = trail('r1', [['started', 0], ...CYCLE, ['reasoning', 1]]);
    const gapped = entries.filter(e => e.sequence !== 2);

    const report = verifyPhaseOrder(gapped);

    expect(report.violations).toContain('r1: sequence jumps from 1 to 3');
  });
});
