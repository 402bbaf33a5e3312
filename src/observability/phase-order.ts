/**
 * @fileoverview Checks a recorded journal trail against the phase cycle
 * Reasoning → PolicyCheck → ToolDispatching → Observing.
 *
 * @module orga-runtime/observability/phase-order
 */

import type { JournalEntry, LoopEventType } from '../types/journal.types.js';

export interface PhaseOrderReport {
  readonly valid: boolean;

  /** Completed cycles per run */
  readonly cycles: Readonly<Record<string, number>>;
  readonly violations: ReadonlyArray<string>;
}

type Expectation = 'start' | 'reasoning' | 'policy' | 'dispatch' | 'observe' | 'done';

const PHASE_EVENTS: ReadonlySet<LoopEventType> = new Set<LoopEventType>([
  'Started',
  'ReasoningComplete',
  'PolicyEvaluated',
  'ToolsDispatched',
  'ObservationsCollected',
  'Terminated',
]);

/**
 * Verifies every run found in `entries`. Auxiliary events (retries,
 * recovery, context trimming) are ignored. Sequence numbers must be
 * contiguous within a run.
 */
export function verifyPhaseOrder(entries: ReadonlyArray<JournalEntry>): PhaseOrderReport {
  const runs = new Map<string, JournalEntry[]>();
  for (const entry of entries) {
    const list = runs.get(entry.runId) ?? [];
    list.push(entry);
    runs.set(entry.runId, list);
  }

  const violations: string[] = [];
  const cycles: Record<string, number> = {};

  for (const [runId, runEntries] of runs) {
    runEntries.sort((a, b) => a.sequence - b.sequence);
    cycles[runId] = verifyRun(runId, runEntries, violations);
  }

  return { valid: violations.length === 0, cycles, violations };
}

function verifyRun(runId: string, entries: ReadonlyArray<JournalEntry>, violations: string[]): number {
  let awaiting: Expectation = 'start';
  let completed = 0;
  let lastIteration = 0;
  let previousSequence: number | null = null;

  for (const entry of entries) {
    if (previousSequence !== null && entry.sequence !== previousSequence + 1) {
      violations.push(`${runId}: sequence jumps from ${previousSequence} to ${entry.sequence}`);
    }
    previousSequence = entry.sequence;

    const type = entry.event.type;
    if (!PHASE_EVENTS.has(type)) continue;

    const fail = (): void => {
      violations.push(`${runId}#${entry.sequence}: unexpected ${type} while expecting ${awaiting}`);
    };

    switch (awaiting) {
      case 'start':
        if (type === 'Started') awaiting = 'reasoning';
        else fail();
        break;
      case 'reasoning':
        if (type === 'ReasoningComplete') {
          if (entry.iteration !== lastIteration + 1) {
            violations.push(`${runId}#${entry.sequence}: iteration ${entry.iteration} follows ${lastIteration}`);
          }
          lastIteration = entry.iteration;
          awaiting = 'policy';
        } else if (type === 'Terminated') {
          awaiting = 'done';
        } else {
          fail();
        }
        break;
      case 'policy':
        if (type === 'PolicyEvaluated') awaiting = 'dispatch';
        else fail();
        break;
      case 'dispatch':
        if (type === 'ToolsDispatched') awaiting = 'observe';
        else fail();
        break;
      case 'observe':
        if (type === 'ObservationsCollected') {
          completed += 1;
          awaiting = 'reasoning';
        } else {
          fail();
        }
        break;
      case 'done':
        fail();
        break;
    }
  }

  return completed;
}
