/**
 * @fileoverview Per-tool circuit breakers.
 *
 * States:
 * - Closed: calls flow through; consecutive failures are counted
 * - Open: calls fail fast until the cooldown elapses
 * - HalfOpen: a limited number of probe calls test recovery
 *
 * Every transition happens inside one synchronous method call on the
 * breaker for that tool, so concurrent tool calls observe a total order
 * of transitions per tool without locking. Breakers of different tools
 * share no state.
 *
 * @module orga-runtime/execution/circuit-breaker
 */

import { EventEmitter } from 'eventemitter3';
import { systemClock, type Clock } from '../types/core.types.js';
import type { BreakerSettings, BreakerView, CircuitBreakerState } from '../types/loop.types.js';

export const DEFAULT_BREAKER_SETTINGS: BreakerSettings = {
  failureThreshold: 5,
  cooldownMs: 30_000,
  halfOpenProbes: 2,
};

const CLOSED: CircuitBreakerState = { status: 'Closed' };

export type Admission =
  | { readonly admitted: true; readonly probe: boolean }
  | { readonly admitted: false; readonly retryInMs: number };

export type TransitionListener = (from: CircuitBreakerState, to: CircuitBreakerState) => void;

export class CircuitBreaker {
  readonly toolName: string;
  private readonly settings: BreakerSettings;
  private readonly clock: Clock;
  private readonly onTransition: TransitionListener | undefined;
  private state: CircuitBreakerState = CLOSED;
  private failures = 0;

  constructor(toolName: string, settings: BreakerSettings, clock: Clock = systemClock, onTransition?: TransitionListener) {
    this.toolName = toolName;
    this.settings = settings;
    this.clock = clock;
    this.onTransition = onTransition;
  }

  /**
   * Asks to make one call. Moving from Open to HalfOpen consumes the
   * first probe.
   */
  tryAcquire(): Admission {
    const state = this.state;
    switch (state.status) {
      case 'Closed':
        return { admitted: true, probe: false };

      case 'Open': {
        const elapsed = this.clock.now() - state.since;
        if (elapsed < this.settings.cooldownMs) {
          return { admitted: false, retryInMs: this.settings.cooldownMs - elapsed };
        }
        this.transition({ status: 'HalfOpen', probesRemaining: Math.max(this.settings.halfOpenProbes - 1, 0) });
        return { admitted: true, probe: true };
      }

      case 'HalfOpen':
        if (state.probesRemaining <= 0) return { admitted: false, retryInMs: 0 };
        this.state = { status: 'HalfOpen', probesRemaining: state.probesRemaining - 1 };
        return { admitted: true, probe: true };
    }
  }

  recordSuccess(): void {
    this.failures = 0;
    if (this.state.status === 'HalfOpen') this.transition(CLOSED);
  }

  recordFailure(): void {
    this.failures += 1;
    switch (this.state.status) {
      case 'Closed':
        if (this.failures >= this.settings.failureThreshold) this.open();
        break;
      case 'HalfOpen':
        this.open();
        break;
      case 'Open':
        break;
    }
  }

  /**
   * Returns an unused probe, for calls cancelled before they reported.
   */
  release(admission: Admission): void {
    if (!admission.admitted || !admission.probe || this.state.status !== 'HalfOpen') return;
    this.state = {
      status: 'HalfOpen',
      probesRemaining: Math.min(this.state.probesRemaining + 1, this.settings.halfOpenProbes),
    };
  }

  get current(): CircuitBreakerState {
    return this.state;
  }

  get consecutiveFailures(): number {
    return this.failures;
  }

  reset(): void {
    this.failures = 0;
    if (this.state.status !== 'Closed') this.transition(CLOSED);
  }

  // ============ Private Methods ============

  private open(): void {
    this.transition({ status: 'Open', since: this.clock.now() });
  }

  private transition(next: CircuitBreakerState): void {
    const previous = this.state;
    this.state = next;
    this.onTransition?.(previous, next);
  }
}

export interface BreakerRegistryEvents {
  'breaker:transition': [toolName: string, from: CircuitBreakerState, to: CircuitBreakerState];
}

export interface BreakerRegistryOptions {
  defaults?: BreakerSettings;
  overrides?: Readonly<Record<string, BreakerSettings>>;
  clock?: Clock;
}

/**
 * Lazily creates one breaker per tool name. May be shared by several runs
 * so that tool health carries over between them.
 *
 * @example
 * ```typescript
 * const registry = new CircuitBreakerRegistry({ defaults: { failureThreshold: 2, cooldownMs: 10_000, halfOpenProbes: 1 } });
 * registry.on('breaker:transition', (tool, from, to) => console.log(tool, from.status, '->', to.status));
 * ```
 */
export class CircuitBreakerRegistry extends EventEmitter<BreakerRegistryEvents> implements BreakerView {
  private readonly breakers = new Map<string, CircuitBreaker>();
  private readonly defaults: BreakerSettings;
  private readonly overrides: Readonly<Record<string, BreakerSettings>>;
  private readonly clock: Clock;

  constructor(options: BreakerRegistryOptions = {}) {
    super();
    this.defaults = options.defaults ?? DEFAULT_BREAKER_SETTINGS;
    this.overrides = options.overrides ?? {};
    this.clock = options.clock ?? systemClock;
  }

  breaker(toolName: string): CircuitBreaker {
    let breaker = this.breakers.get(toolName);
    if (breaker === undefined) {
      breaker = new CircuitBreaker(toolName, this.settingsFor(toolName), this.clock, (from, to) =>
        this.emit('breaker:transition', toolName, from, to),
      );
      this.breakers.set(toolName, breaker);
    }
    return breaker;
  }

  settingsFor(toolName: string): BreakerSettings {
    return this.overrides[toolName] ?? this.defaults;
  }

  stateOf(toolName: string): CircuitBreakerState {
    return this.breakers.get(toolName)?.current ?? CLOSED;
  }

  consecutiveFailures(toolName: string): number {
    return this.breakers.get(toolName)?.consecutiveFailures ?? 0;
  }

  /**
   * Read-only view handed to policy rules through LoopState.
   */
  view(): BreakerView {
    return {
      stateOf: toolName => this.stateOf(toolName),
      consecutiveFailures: toolName => this.consecutiveFailures(toolName),
    };
  }

  reset(toolName?: string): void {
    if (toolName !== undefined) {
      this.breakers.get(toolName)?.reset();
      return;
    }
    for (const breaker of this.breakers.values()) breaker.reset();
  }
}
