/**
 * @fileoverview Trace Recorder - Records spans for a loop run.
 *
 * The loop runner opens one span per run and one child span per phase,
 * with inference and tool calls nested beneath their phase. Traces are
 * in-memory and returned from {@link TraceRecorder.finalize}.
 *
 * @module orga-runtime/observability/tracer
 * @version 0.1.0
 */

import type { UniqueId, Timestamp, Clock } from '../types/core.types.js';
import { createTimestamp, generateId, systemClock } from '../types/core.types.js';
import type { PhaseName } from '../types/loop.types.js';

/**
 * A complete execution trace.
 */
export interface ExecutionTrace {
  readonly id: UniqueId;

  /** Run this trace belongs to */
  readonly runId: UniqueId;

  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp | null;

  /** Whether the run completed with a final answer */
  readonly success: boolean | null;

  readonly spans: ReadonlyArray<TraceSpan>;
  readonly totalDurationMs: number;
}

/**
 * A span within a trace representing a unit of work.
 */
export interface TraceSpan {
  readonly id: UniqueId;
  readonly parentId: UniqueId | null;
  readonly name: string;
  readonly type: SpanType;
  readonly startedAt: Timestamp;
  readonly endedAt: Timestamp | null;
  readonly durationMs: number | null;
  readonly status: SpanStatus;

  /** Loop phase the span belongs to */
  readonly phase: PhaseName | null;

  /** Iteration number when the span was created */
  readonly iteration: number;

  readonly attributes: Readonly<Record<string, unknown>>;
  readonly events: ReadonlyArray<SpanEvent>;
}

export enum SpanType {
  RUN = 'RUN',
  PHASE = 'PHASE',
  INFERENCE = 'INFERENCE',
  TOOL = 'TOOL',
  CUSTOM = 'CUSTOM',
}

export enum SpanStatus {
  RUNNING = 'RUNNING',
  OK = 'OK',
  ERROR = 'ERROR',
  CANCELLED = 'CANCELLED',
}

export interface SpanEvent {
  readonly name: string;
  readonly timestamp: Timestamp;
  readonly attributes: Readonly<Record<string, unknown>>;
}

export interface SpanOptions {
  readonly parentId?: UniqueId;
  readonly type?: SpanType;
  readonly phase?: PhaseName;
  readonly iteration?: number;
  readonly attributes?: Record<string, unknown>;
}

/**
 * Records spans for one loop run.
 *
 * @example
 * ```typescript
 * const tracer = new TraceRecorder(runId);
 *
 * const spanId = tracer.startSpan('PolicyCheck', { type: SpanType.PHASE, phase: 'PolicyCheck' });
 * // ... evaluate actions ...
 * tracer.endSpan(spanId, SpanStatus.OK, { denied: 1 });
 *
 * const trace = tracer.finalize(true);
 * ```
 */
export class TraceRecorder {
  private readonly traceId: UniqueId;
  private readonly runId: UniqueId;
  private readonly clock: Clock;
  private readonly spans: Map<UniqueId, TraceSpan>;
  private readonly startedAt: Timestamp;
  private readonly activeSpanStack: UniqueId[];
  private currentIteration: number;

  constructor(runId: UniqueId, clock: Clock = systemClock) {
    this.traceId = generateId();
    this.runId = runId;
    this.clock = clock;
    this.spans = new Map();
    this.startedAt = createTimestamp(clock.now());
    this.activeSpanStack = [];
    this.currentIteration = 0;
  }

  getTraceId(): UniqueId {
    return this.traceId;
  }

  setIteration(iteration: number): void {
    this.currentIteration = iteration;
  }

  /**
   * Starts a new span, nested under the innermost active span unless a
   * parent is given.
   */
  startSpan(name: string, options: SpanOptions = {}): UniqueId {
    const spanId = generateId();
    const parentId = options.parentId ?? this.activeSpanStack[this.activeSpanStack.length - 1] ?? null;

    this.spans.set(spanId, {
      id: spanId,
      parentId,
      name,
      type: options.type ?? SpanType.CUSTOM,
      startedAt: createTimestamp(this.clock.now()),
      endedAt: null,
      durationMs: null,
      status: SpanStatus.RUNNING,
      phase: options.phase ?? null,
      iteration: options.iteration ?? this.currentIteration,
      attributes: options.attributes ?? {},
      events: [],
    });
    this.activeSpanStack.push(spanId);

    return spanId;
  }

  addEvent(spanId: UniqueId, name: string, attributes: Record<string, unknown> = {}): void {
    const span = this.spans.get(spanId);
    if (!span) return;

    this.spans.set(spanId, {
      ...span,
      events: [...span.events, { name, timestamp: createTimestamp(this.clock.now()), attributes }],
    });
  }

  setAttributes(spanId: UniqueId, attributes: Record<string, unknown>): void {
    const span = this.spans.get(spanId);
    if (!span) return;

    this.spans.set(spanId, { ...span, attributes: { ...span.attributes, ...attributes } });
  }

  /**
   * Ends a span. Ending an already-ended span is a no-op.
   */
  endSpan(
    spanId: UniqueId,
    status: SpanStatus = SpanStatus.OK,
    attributes?: Record<string, unknown>,
  ): void {
    const span = this.spans.get(spanId);
    if (!span || span.endedAt !== null) return;

    const now = createTimestamp(this.clock.now());
    this.spans.set(spanId, {
      ...span,
      endedAt: now,
      durationMs: now - span.startedAt,
      status,
      attributes: attributes ? { ...span.attributes, ...attributes } : span.attributes,
    });

    const stackIndex = this.activeSpanStack.indexOf(spanId);
    if (stackIndex !== -1) {
      this.activeSpanStack.splice(stackIndex, 1);
    }
  }

  /**
   * Ends every open span and returns the complete trace.
   */
  finalize(success: boolean): ExecutionTrace {
    for (const spanId of [...this.activeSpanStack].reverse()) {
      this.endSpan(spanId, success ? SpanStatus.OK : SpanStatus.CANCELLED);
    }

    const now = createTimestamp(this.clock.now());
    return {
      id: this.traceId,
      runId: this.runId,
      startedAt: this.startedAt,
      endedAt: now,
      success,
      spans: Array.from(this.spans.values()),
      totalDurationMs: now - this.startedAt,
    };
  }

  getSpans(): ReadonlyArray<TraceSpan> {
    return Array.from(this.spans.values());
  }

  getActiveSpan(): TraceSpan | null {
    const activeId = this.activeSpanStack[this.activeSpanStack.length - 1];
    return activeId === undefined ? null : this.spans.get(activeId) ?? null;
  }
}

/**
 * Runs an operation inside a span, ending it with OK or ERROR.
 */
export async function traced<T>(
  tracer: TraceRecorder,
  name: string,
  options: SpanOptions,
  operation: () => Promise<T>,
): Promise<T> {
  const spanId = tracer.startSpan(name, options);

  try {
    const result = await operation();
    tracer.endSpan(spanId, SpanStatus.OK);
    return result;
  } catch (error) {
    tracer.addEvent(spanId, 'error', {
      message: error instanceof Error ? error.message : String(error),
    });
    tracer.endSpan(spanId, SpanStatus.ERROR);
    throw error;
  }
}
