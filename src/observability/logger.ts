/**
 * @fileoverview Structured logging for the ORGA runtime.
 *
 * Every entry is tagged with a scope: the module that wrote it and, inside a
 * run, the run id and agent id. Child loggers narrow the scope and may bind
 * extra fields that are merged into the data of each entry they write.
 *
 * @module orga-runtime/observability/logger
 */

import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, generateId } from '../types/core.types.js';

/**
 * Where an entry came from.
 */
export interface LogScope {
  readonly module: string;
  readonly runId: string | null;
  readonly agentId: string | null;
}

export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  /** `code` of an `OrgaError` */
  readonly code: string | undefined;
}

export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;
  readonly scope: LogScope;
  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
}

export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void | Promise<void>;
}

export interface LoggerConfig {
  /** Entries below this level are dropped before reaching any transport */
  readonly minLevel: Severity;
  readonly module: string;
  /** Defaults to a single console transport */
  readonly transports: readonly LogTransport[];
}

/**
 * Narrows a child logger's scope.
 */
export interface ChildScope {
  readonly module?: string;
  readonly runId?: string;
  readonly agentId?: string;
  /** Fields added to the data of every entry */
  readonly bindings?: Readonly<Record<string, unknown>>;
}

const LEVEL_RANK: Record<Severity, number> = {
  [Severity.DEBUG]: 10,
  [Severity.INFO]: 20,
  [Severity.WARN]: 30,
  [Severity.ERROR]: 40,
};

/**
 * Reads a level name such as `warn` or ` DEBUG `; anything else is null.
 */
export function parseSeverity(value: string | undefined): Severity | null {
  const name = value?.trim().toUpperCase();
  return Object.values(Severity).find(level => level === name) ?? null;
}

/**
 * One line per entry: time, level, scope, message and the data as JSON.
 * Warnings and errors go to stderr.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  write(entry: LogEntry): void {
    const line = formatLine(entry);
    if (LEVEL_RANK[entry.level] >= LEVEL_RANK[Severity.WARN]) console.error(line);
    else console.log(line);
  }
}

function formatLine(entry: LogEntry): string {
  const { module, runId, agentId } = entry.scope;
  const scope = [
    module,
    ...(runId !== null ? [`run=${runId.slice(0, 8)}`] : []),
    ...(agentId !== null ? [`agent=${agentId}`] : []),
  ].join(' ');
  const data = Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
  const error = entry.error !== null ? ` (${entry.error.name}: ${entry.error.message})` : '';
  return `${new Date(entry.timestamp).toISOString()} ${entry.level.padEnd(5)} [${scope}] ${entry.message}${data}${error}`;
}

/**
 * Keeps the most recent entries in memory, for tests and debugging.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];

  constructor(private readonly capacity: number = 1000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.capacity) this.entries.splice(0, this.entries.length - this.capacity);
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  findByRun(runId: string): ReadonlyArray<LogEntry> {
    return this.entries.filter(entry => entry.scope.runId === runId);
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(entry => entry.level === level);
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = new Logger({ module: 'loop', minLevel: Severity.DEBUG });
 * const runLogger = logger.child({ runId, agentId: 'agent-7' });
 * runLogger.warn('Tool failed', { tool: 'lookup' });
 * ```
 */
export class Logger {
  private readonly minLevel: Severity;
  private readonly transports: readonly LogTransport[];
  private readonly scope: LogScope;
  private readonly bindings: Readonly<Record<string, unknown>>;

  constructor(
    config: Partial<LoggerConfig> = {},
    scope: Omit<LogScope, 'module'> = { runId: null, agentId: null },
    bindings: Readonly<Record<string, unknown>> = {},
  ) {
    this.minLevel = config.minLevel ?? Severity.INFO;
    this.transports = config.transports !== undefined && config.transports.length > 0
      ? config.transports
      : [new ConsoleTransport()];
    this.scope = { module: config.module ?? 'orga', ...scope };
    this.bindings = bindings;
  }

  child(scope: ChildScope): Logger {
    return new Logger(
      { minLevel: this.minLevel, module: scope.module ?? this.scope.module, transports: this.transports },
      { runId: scope.runId ?? this.scope.runId, agentId: scope.agentId ?? this.scope.agentId },
      { ...this.bindings, ...scope.bindings },
    );
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.WARN, message, data, error);
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  isEnabled(level: Severity): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  private log(level: Severity, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (!this.isEnabled(level)) return;
    const entry: LogEntry = {
      id: generateId(),
      timestamp: createTimestamp(),
      level,
      message,
      scope: this.scope,
      data: { ...this.bindings, ...data },
      error: error !== undefined ? describeError(error) : null,
    };
    for (const transport of this.transports) this.dispatch(transport, entry);
  }

  private dispatch(transport: LogTransport, entry: LogEntry): void {
    const report = (failure: unknown): void => {
      console.error(`Logger transport '${transport.name}' failed:`, failure);
    };
    try {
      const pending = transport.write(entry);
      if (pending instanceof Promise) pending.catch(report);
    } catch (failure) {
      report(failure);
    }
  }
}

function describeError(error: Error): LogError {
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code: 'code' in error && typeof error.code === 'string' ? error.code : undefined,
  };
}

/**
 * Creates a logger for a module. The minimum level comes from
 * `ORGA_LOG_LEVEL` unless the config sets one.
 */
export function createLogger(module: string, config: Partial<LoggerConfig> = {}): Logger {
  const envLevel = parseSeverity(process.env['ORGA_LOG_LEVEL']);
  return new Logger({ ...(envLevel !== null ? { minLevel: envLevel } : {}), ...config, module });
}

export const defaultLogger = createLogger('orga');
