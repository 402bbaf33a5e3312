/**
 * @fileoverview Unit tests for journal sinks, storage and the run writer
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  BufferedJournal,
  DurableJournal,
  FileJournalStorage,
  JournalWriter,
  MemoryJournalStorage,
  type JournalSink,
} from './journal.js';
import { Logger, MemoryTransport } from './logger.js';
import {
  JournalError,
  Severity,
  createAgentId,
  createUniqueId,
  type JournalEntry,
  type LoopEvent,
} from '../types/index.js';

const started: LoopEvent = { type: 'Started', maxIterations: 5, maxTotalTokens: 1000, timeoutMs: 60_000, toolCount: 1 };

function entry(runId: string, sequence: number, event: LoopEvent = started): JournalEntry {
  return { runId, agentId: 'agent-a', sequence, timestamp: 1_000 + sequence, iteration: 0, event };
}

describe('BufferedJournal', () => {
  it('should evict the oldest entry once capacity is exceeded', () => {
    const journal = new BufferedJournal(2);
    const evicted: number[] = [];
    journal.on('entry:evicted', e => evicted.push(e.sequence));

    journal.append(entry('r1', 1));
    journal.append(entry('r1', 2));
    journal.append(entry('r1', 3));

    expect(journal.entries().map(e => e.sequence)).toEqual([2, 3]);
    expect(evicted).toEqual([1]);
  });

  it('should drain all entries and keep accepting new ones', () => {
    const journal = new BufferedJournal();
    journal.append(entry('r1', 1));
    journal.append(entry('r2', 1));

    const drained = journal.drain();

    expect(drained).toHaveLength(2);
    expect(journal.size).toBe(0);
    journal.append(entry('r1', 2));
    expect(journal.entriesFor('r1').map(e => e.sequence)).toEqual([2]);
  });

  it('should reject a non-positive capacity', () => {
    expect(() => new BufferedJournal(0)).toThrow(RangeError);
  });
});

describe('DurableJournal', () => {
  it('should replay a run in sequence order regardless of arrival order', async () => {
    const journal = new DurableJournal(new MemoryJournalStorage());
    await journal.append(entry('r1', 2));
    await journal.append(entry('r2', 1));
    await journal.append(entry('r1', 1));

    const replayed = await journal.replay('r1');

    expect(replayed.map(e => e.sequence)).toEqual([1, 2]);
    expect(await journal.runIds()).toEqual(['r1', 'r2']);
  });

  it('should compact a run down to its newest entries', async () => {
    const journal = new DurableJournal();
    for (let seq = 1; seq <= 5; seq++) await journal.append(entry('r1', seq));

    const removed = await journal.compact('r1', 2);

    expect(removed).toBe(3);
    expect((await journal.replay('r1')).map(e => e.sequence)).toEqual([4, 5]);
    expect(await journal.latestSequence('r1')).toBe(5);
  });

  it('should wrap storage failures in JournalError', async () => {
    const failing = new MemoryJournalStorage();
    failing.store = () => Promise.reject(new Error('quota exceeded'));
    const journal = new DurableJournal(failing);

    await expect(journal.append(entry('r1', 1))).rejects.toBeInstanceOf(JournalError);
  });
});

describe('FileJournalStorage', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'orga-journal-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should persist entries as JSON lines and read them back', async () => {
    const storage = new FileJournalStorage(join(dir, 'nested', 'journal.jsonl'));
    await Promise.all([storage.store(entry('r1', 1)), storage.store(entry('r1', 2)), storage.store(entry('r2', 1))]);

    const entries = await storage.readEntries('r1');

    expect(entries.map(e => e.sequence)).toEqual([1, 2]);
    expect(entries[0].event).toEqual(started);
    expect(await storage.latestSequence('r2')).toBe(1);
    expect(await storage.latestSequence('missing')).toBeNull();
  });

  it('should compact only the targeted run', async () => {
    const storage = new FileJournalStorage(join(dir, 'journal.jsonl'));
    for (let seq = 1; seq <= 3; seq++) await storage.store(entry('r1', seq));
    await storage.store(entry('r2', 1));

    expect(await storage.compact('r1', 3)).toBe(2);
    expect((await storage.readEntries('r1')).map(e => e.sequence)).toEqual([3]);
    expect(await storage.readEntries('r2')).toHaveLength(1);
  });

  it('should return no entries when the file does not exist', async () => {
    const storage = new FileJournalStorage(join(dir, 'absent.jsonl'));

    expect(await storage.readEntries('r1')).toEqual([]);
  });

  it('should reject a line that is not a journal entry', async () => {
    const path = join(dir, 'corrupt.jsonl');
    await writeFile(path, '{"runId":"r1"}\n', 'utf8');

    await expect(new FileJournalStorage(path).readEntries('r1')).rejects.toThrow(/line 1/);
  });
});

describe('JournalWriter', () => {
  let transport: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    transport = new MemoryTransport();
    logger = new Logger({ minLevel: Severity.DEBUG, transports: [transport] });
  });

  it('should stamp run identity and a contiguous sequence', async () => {
    const sink = new BufferedJournal();
    const runId = createUniqueId('run-1');
    const writer = new JournalWriter({
      sink,
      runId,
      agentId: createAgentId('agent-a'),
      logger,
      clock: { now: () => 42, sleep: () => Promise.resolve() },
    });

    await writer.record(0, started);
    await writer.record(1, { type: 'ToolsDispatched', toolCount: 0, durationMs: 0 });

    expect(sink.entries()).toEqual([
      { runId: 'run-1', agentId: 'agent-a', sequence: 1, timestamp: 42, iteration: 0, event: started },
      {
        runId: 'run-1',
        agentId: 'agent-a',
        sequence: 2,
        timestamp: 42,
        iteration: 1,
        event: { type: 'ToolsDispatched', toolCount: 0, durationMs: 0 },
      },
    ]);
  });

  it('should log sink failures at WARN without throwing', async () => {
    const sink: JournalSink = {
      append: () => {
        throw new Error('disk full');
      },
    };
    const writer = new JournalWriter({ sink, runId: createUniqueId('run-2'), agentId: createAgentId('a'), logger });

    await expect(writer.record(0, started)).resolves.toBeUndefined();
    await writer.record(0, started);

    expect(writer.failureCount).toBe(2);
    expect(writer.lastSequence).toBe(2);
    const warnings = transport.findByLevel(Severity.WARN);
    expect(warnings).toHaveLength(2);
    expect(warnings[0].error?.name).toBe('JournalError');
    expect(warnings[0].data).toEqual({ sequence: 1, event: 'Started' });
  });
});
