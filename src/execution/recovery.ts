/**
 * @fileoverview Recovery strategy resolution and the stores recovery uses.
 *
 * @module orga-runtime/execution/recovery
 */

import { EventEmitter } from 'eventemitter3';
import { systemClock, type Clock } from '../types/core.types.js';
import { parseToolArguments } from '../context/conversation.js';
import type { LoopConfig, Message, ObservationFailureKind, RecoveryStrategy } from '../types/loop.types.js';

/**
 * Per-tool override, falling back to the run default.
 */
export function resolveRecovery(
  toolName: string,
  config: Pick<LoopConfig, 'defaultRecovery' | 'toolRecovery'>,
): RecoveryStrategy {
  return config.toolRecovery[toolName] ?? config.defaultRecovery;
}

/**
 * Stable key for tool arguments: object keys are sorted at every depth.
 * Text that is not a JSON object is used as-is.
 */
export function canonicalArguments(raw: string): string {
  const parsed = parseToolArguments(raw);
  return parsed === null ? raw.trim() : JSON.stringify(sortKeys(parsed));
}

function sortKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(sortKeys);
  if (typeof value !== 'object' || value === null) return value;
  const sorted: Record<string, unknown> = {};
  for (const key of Object.keys(value).sort()) {
    sorted[key] = sortKeys(Reflect.get(value, key));
  }
  return sorted;
}

// ============ Result Cache ============

export interface CachedResult {
  readonly payload: string;
  readonly storedAt: number;
  readonly ageMs: number;
}

/**
 * Last successful payload per tool and canonical arguments.
 */
export class ResultCache {
  private readonly entries = new Map<string, { payload: string; storedAt: number }>();
  private readonly clock: Clock;

  constructor(clock: Clock = systemClock) {
    this.clock = clock;
  }

  set(toolName: string, args: string, payload: string): void {
    this.entries.set(this.key(toolName, args), { payload, storedAt: this.clock.now() });
  }

  /**
   * Returns the entry if it is at most `maxStalenessMs` old.
   */
  get(toolName: string, args: string, maxStalenessMs: number): CachedResult | null {
    const entry = this.entries.get(this.key(toolName, args));
    if (entry === undefined) return null;
    const ageMs = this.clock.now() - entry.storedAt;
    return ageMs <= maxStalenessMs ? { ...entry, ageMs } : null;
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }

  private key(toolName: string, args: string): string {
    return `${toolName}\u0000${canonicalArguments(args)}`;
  }
}

// ============ Dead Letters ============

export interface DeadLetter {
  readonly runId: string;
  readonly agentId: string;
  readonly actionId: string;
  readonly toolName: string;
  readonly arguments: string;
  readonly error: { readonly kind: ObservationFailureKind; readonly message: string };
  readonly recordedAt: number;
}

export interface DeadLetterQueueEvents {
  'deadletter:added': [letter: DeadLetter];
}

/**
 * In-memory record of tool calls that were given up on.
 */
export class DeadLetterQueue extends EventEmitter<DeadLetterQueueEvents> {
  private readonly letters: DeadLetter[] = [];

  push(letter: DeadLetter): void {
    this.letters.push(letter);
    this.emit('deadletter:added', letter);
  }

  entries(): ReadonlyArray<DeadLetter> {
    return [...this.letters];
  }

  drain(): DeadLetter[] {
    return this.letters.splice(0, this.letters.length);
  }

  get size(): number {
    return this.letters.length;
  }
}

// ============ Escalation ============

export interface EscalationRequest {
  readonly queue: string;
  readonly runId: string;
  readonly agentId: string;
  readonly actionId: string;
  readonly toolName: string;
  readonly arguments: string;
  readonly error: { readonly kind: ObservationFailureKind; readonly message: string };

  /** Conversation at the time of failure, when the strategy asks for it */
  readonly context: ReadonlyArray<Message> | null;
}

/**
 * Receives failures flagged for human handling. Errors it throws are
 * logged and do not change the observation.
 */
export type EscalationHandler = (request: EscalationRequest) => void | Promise<void>;
