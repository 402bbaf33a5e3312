/**
 * @fileoverview Journal - append-only, sequenced record of loop runs.
 *
 * Sinks receive fully-formed {@link JournalEntry} values. The runner-side
 * {@link JournalWriter} stamps each entry with the run and agent identity
 * plus a per-run monotonic sequence, so entries from runs sharing one sink
 * stay distinguishable even when they interleave.
 *
 * Two sinks are provided:
 * - {@link BufferedJournal}: bounded in-memory ring buffer
 * - {@link DurableJournal}: delegates to a {@link JournalStorage} backend
 *   (in memory or JSON lines on disk) and supports replay and compaction
 *
 * @module orga-runtime/observability/journal
 * @version 0.1.0
 */

import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { EventEmitter } from 'eventemitter3';
import type { AgentId, Clock, UniqueId } from '../types/core.types.js';
import { systemClock } from '../types/core.types.js';
import { JournalError, toError } from '../types/errors.js';
import type { JournalEntry, LoopEvent } from '../types/journal.types.js';
import { JournalEntrySchema } from '../types/journal.types.js';
import type { Logger } from './logger.js';

/**
 * Write-only destination for journal entries.
 */
export interface JournalSink {
  append(entry: JournalEntry): void | Promise<void>;
}

export interface BufferedJournalEvents {
  'entry:appended': (entry: JournalEntry) => void;
  'entry:evicted': (entry: JournalEntry) => void;
}

export const DEFAULT_JOURNAL_CAPACITY = 1000;

/**
 * In-memory ring buffer. The oldest entry is evicted once capacity is
 * reached.
 */
export class BufferedJournal extends EventEmitter<BufferedJournalEvents> implements JournalSink {
  private readonly buffer: JournalEntry[] = [];
  private readonly capacity: number;

  constructor(capacity: number = DEFAULT_JOURNAL_CAPACITY) {
    super();
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Journal capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
  }

  append(entry: JournalEntry): void {
    this.buffer.push(entry);
    this.emit('entry:appended', entry);

    if (this.buffer.length > this.capacity) {
      const evicted = this.buffer.shift();
      if (evicted !== undefined) this.emit('entry:evicted', evicted);
    }
  }

  entries(): ReadonlyArray<JournalEntry> {
    return [...this.buffer];
  }

  entriesFor(runId: string): ReadonlyArray<JournalEntry> {
    return this.buffer.filter(e => e.runId === runId);
  }

  /**
   * Removes and returns every buffered entry.
   */
  drain(): JournalEntry[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  get size(): number {
    return this.buffer.length;
  }
}

// ============ Durable Storage ============

/**
 * Persistence backend for {@link DurableJournal}.
 */
export interface JournalStorage {
  store(entry: JournalEntry): Promise<void>;
  readEntries(runId: string): Promise<JournalEntry[]>;

  /** Entries of a run with `sequence >= fromSequence` */
  readFrom(runId: string, fromSequence: number): Promise<JournalEntry[]>;
  latestSequence(runId: string): Promise<number | null>;

  /** Deletes entries of a run with `sequence < beforeSequence`; returns the count removed */
  compact(runId: string, beforeSequence: number): Promise<number>;
  runIds(): Promise<string[]>;
}

function bySequence(a: JournalEntry, b: JournalEntry): number {
  return a.sequence - b.sequence;
}

export class MemoryJournalStorage implements JournalStorage {
  private readonly runs = new Map<string, JournalEntry[]>();

  store(entry: JournalEntry): Promise<void> {
    const entries = this.runs.get(entry.runId) ?? [];
    entries.push(entry);
    this.runs.set(entry.runId, entries);
    return Promise.resolve();
  }

  readEntries(runId: string): Promise<JournalEntry[]> {
    return Promise.resolve([...(this.runs.get(runId) ?? [])].sort(bySequence));
  }

  async readFrom(runId: string, fromSequence: number): Promise<JournalEntry[]> {
    const entries = await this.readEntries(runId);
    return entries.filter(e => e.sequence >= fromSequence);
  }

  latestSequence(runId: string): Promise<number | null> {
    const entries = this.runs.get(runId) ?? [];
    const latest = entries.reduce<number | null>((max, e) => (max === null || e.sequence > max ? e.sequence : max), null);
    return Promise.resolve(latest);
  }

  compact(runId: string, beforeSequence: number): Promise<number> {
    const entries = this.runs.get(runId) ?? [];
    const kept = entries.filter(e => e.sequence >= beforeSequence);
    this.runs.set(runId, kept);
    return Promise.resolve(entries.length - kept.length);
  }

  runIds(): Promise<string[]> {
    return Promise.resolve([...this.runs.keys()]);
  }
}

/**
 * Stores every entry as one JSON line in a single file. Writes are
 * serialized through an internal promise chain.
 */
export class FileJournalStorage implements JournalStorage {
  private readonly filePath: string;
  private queue: Promise<void> = Promise.resolve();

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  store(entry: JournalEntry): Promise<void> {
    return this.enqueue(async () => {
      await mkdir(dirname(this.filePath), { recursive: true });
      await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, 'utf8');
    });
  }

  async readEntries(runId: string): Promise<JournalEntry[]> {
    await this.queue;
    const all = await this.readAll();
    return all.filter(e => e.runId === runId).sort(bySequence);
  }

  async readFrom(runId: string, fromSequence: number): Promise<JournalEntry[]> {
    const entries = await this.readEntries(runId);
    return entries.filter(e => e.sequence >= fromSequence);
  }

  async latestSequence(runId: string): Promise<number | null> {
    const entries = await this.readEntries(runId);
    const last = entries[entries.length - 1];
    return last === undefined ? null : last.sequence;
  }

  compact(runId: string, beforeSequence: number): Promise<number> {
    let removed = 0;
    return this.enqueue(async () => {
      const all = await this.readAll();
      const kept = all.filter(e => e.runId !== runId || e.sequence >= beforeSequence);
      removed = all.length - kept.length;
      if (removed === 0) return;

      const tmpPath = `${this.filePath}.tmp`;
      await writeFile(tmpPath, kept.map(e => `${JSON.stringify(e)}\n`).join(''), 'utf8');
      await rename(tmpPath, this.filePath);
    }).then(() => removed);
  }

  async runIds(): Promise<string[]> {
    await this.queue;
    const all = await this.readAll();
    return [...new Set(all.map(e => e.runId))];
  }

  // ============ Private Methods ============

  private enqueue(task: () => Promise<void>): Promise<void> {
    const next = this.queue.then(task);
    // Keep the chain alive after a failed write; the caller still sees the rejection.
    this.queue = next.catch(() => undefined);
    return next;
  }

  private async readAll(): Promise<JournalEntry[]> {
    let text: string;
    try {
      text = await readFile(this.filePath, 'utf8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') return [];
      throw new JournalError(`Cannot read journal file ${this.filePath}`, { cause: error });
    }

    const entries: JournalEntry[] = [];
    const lines = text.split('\n');
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i].trim();
      if (line === '') continue;

      let raw: unknown;
      try {
        raw = JSON.parse(line);
      } catch (error) {
        throw new JournalError(`Malformed journal line ${i + 1} in ${this.filePath}`, { cause: error });
      }
      const parsed = JournalEntrySchema.safeParse(raw);
      if (!parsed.success) {
        throw new JournalError(
          `Invalid journal entry on line ${i + 1}: ${parsed.error.issues.map(issue => issue.message).join(', ')}`,
        );
      }
      entries.push(parsed.data);
    }
    return entries;
  }
}

/**
 * Sink backed by a {@link JournalStorage}, with replay and compaction.
 */
export class DurableJournal implements JournalSink {
  private readonly storage: JournalStorage;

  constructor(storage: JournalStorage = new MemoryJournalStorage()) {
    this.storage = storage;
  }

  async append(entry: JournalEntry): Promise<void> {
    try {
      await this.storage.store(entry);
    } catch (error) {
      throw error instanceof JournalError
        ? error
        : new JournalError(`Failed to persist journal entry ${entry.runId}#${entry.sequence}`, { cause: error });
    }
  }

  /**
   * Returns the recorded entries of a run in sequence order.
   */
  replay(runId: string, fromSequence: number = 1): Promise<JournalEntry[]> {
    return this.storage.readFrom(runId, fromSequence);
  }

  latestSequence(runId: string): Promise<number | null> {
    return this.storage.latestSequence(runId);
  }

  /**
   * Keeps only the newest `retain` entries of a run.
   */
  async compact(runId: string, retain: number): Promise<number> {
    const latest = await this.storage.latestSequence(runId);
    if (latest === null) return 0;
    return this.storage.compact(runId, latest - retain + 1);
  }

  runIds(): Promise<string[]> {
    return this.storage.runIds();
  }
}

// ============ Runner-side Writer ============

/**
 * Stamps events for one run and forwards them to a sink. Sink failures are
 * logged and counted; they never propagate to the loop.
 */
export class JournalWriter {
  private readonly sink: JournalSink;
  private readonly runId: UniqueId;
  private readonly agentId: AgentId;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private sequence = 0;
  private failures = 0;

  constructor(options: {
    sink: JournalSink;
    runId: UniqueId;
    agentId: AgentId;
    logger: Logger;
    clock?: Clock;
  }) {
    this.sink = options.sink;
    this.runId = options.runId;
    this.agentId = options.agentId;
    this.logger = options.logger;
    this.clock = options.clock ?? systemClock;
  }

  async record(iteration: number, event: LoopEvent): Promise<void> {
    this.sequence += 1;
    const entry: JournalEntry = {
      runId: this.runId,
      agentId: this.agentId,
      sequence: this.sequence,
      timestamp: this.clock.now(),
      iteration,
      event,
    };

    try {
      await this.sink.append(entry);
    } catch (error) {
      this.failures += 1;
      this.logger.warn(
        'Journal write failed; continuing',
        { sequence: entry.sequence, event: event.type },
        error instanceof JournalError ? error : new JournalError(toError(error).message, { cause: error }),
      );
    }
  }

  get lastSequence(): number {
    return this.sequence;
  }

  get failureCount(): number {
    return this.failures;
  }
}

/**
 * Sink that discards entries. Used when no journal is configured.
 */
export const nullJournal: JournalSink = {
  append: () => undefined,
};
