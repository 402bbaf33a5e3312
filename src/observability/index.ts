/**
 * @fileoverview Observability module public exports.
 *
 * @module orga-runtime/observability
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  defaultLogger,
  parseSeverity,
  type LogEntry,
  type ChildScope,
  type LogError,
  type LogScope,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

export {
  TraceRecorder,
  traced,
  SpanType,
  SpanStatus,
  type ExecutionTrace,
  type TraceSpan,
  type SpanEvent,
  type SpanOptions,
} from './tracer.js';

export {
  BufferedJournal,
  DurableJournal,
  FileJournalStorage,
  MemoryJournalStorage,
  JournalWriter,
  nullJournal,
  DEFAULT_JOURNAL_CAPACITY,
  type BufferedJournalEvents,
  type JournalSink,
  type JournalStorage,
} from './journal.js';

export { verifyPhaseOrder, type PhaseOrderReport } from './phase-order.js';

export { ReasoningMetrics, type MetricsSnapshot } from './metrics.js';
