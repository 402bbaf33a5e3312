/**
 * @fileoverview Unit tests for Logger
 */

import { describe, it, expect, beforeEach, vi, afterEach } from 'vitest';
import { ConsoleTransport, Logger, MemoryTransport, createLogger, parseSeverity, type LogTransport } from './logger.js';
import { ExecutionError, Severity, generateId } from '../types/index.js';

describe('Logger', () => {
  let memoryTransport: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    memoryTransport = new MemoryTransport(100);
    logger = new Logger({
      minLevel: Severity.DEBUG,
      transports: [memoryTransport],
      module: 'test',
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('logging levels', () => {
    it('should log DEBUG messages with data', () => {
      logger.debug('budget applied', { strategy: 'SlidingWindow' });

      const entries = memoryTransport.getEntries();
      expect(entries).toHaveLength(1);
      expect(entries[0].level).toBe(Severity.DEBUG);
      expect(entries[0].message).toBe('budget applied');
      expect(entries[0].data).toEqual({ strategy: 'SlidingWindow' });
      expect(entries[0].scope).toEqual({ module: 'test', runId: null, agentId: null });
    });

    it('should attach error details including the runtime error code', () => {
      const error = new ExecutionError('ToolTimeout', 'lookup', 'timed out after 50ms', true);
      logger.warn('tool failed', { tool: 'lookup' }, error);

      const entry = memoryTransport.getEntries()[0];
      expect(entry.level).toBe(Severity.WARN);
      expect(entry.error?.name).toBe('ExecutionError');
      expect(entry.error?.message).toBe('timed out after 50ms');
      expect(entry.error?.code).toBe('EXECUTION_TOOLTIMEOUT');
    });

    it('should leave code undefined for plain errors', () => {
      logger.error('boom', {}, new Error('plain'));

      expect(memoryTransport.getEntries()[0].error?.code).toBeUndefined();
    });
  });

  describe('level filtering', () => {
    it('should filter messages below minimum level', () => {
      const warnLogger = new Logger({
        minLevel: Severity.WARN,
        transports: [memoryTransport],
        module: 'test',
      });

      warnLogger.debug('debug');
      warnLogger.info('info');
      warnLogger.warn('warn');
      warnLogger.error('error');

      expect(memoryTransport.getEntries().map(entry => entry.level)).toEqual([Severity.WARN, Severity.ERROR]);
      expect(warnLogger.isEnabled(Severity.INFO)).toBe(false);
    });

    it('should default to INFO', () => {
      const plain = new Logger({ transports: [memoryTransport] });

      plain.debug('dropped');
      plain.info('kept');

      expect(memoryTransport.getEntries().map(entry => entry.message)).toEqual(['kept']);
    });
  });

  describe('child loggers', () => {
    it('should carry run and agent context into child entries', () => {
      const runId = generateId();
      const child = logger.child({ module: 'loop', runId, agentId: 'agent-7' });
      child.info('run started');
      logger.info('outside the run');

      const entry = memoryTransport.getEntries()[0];
      expect(entry.scope).toEqual({ module: 'loop', runId, agentId: 'agent-7' });
      expect(memoryTransport.findByRun(runId).map(e => e.message)).toEqual(['run started']);
    });

    it('should keep the parent scope when a child only narrows part of it', () => {
      logger.child({ agentId: 'agent-1' }).child({ module: 'executor' }).info('message');

      expect(memoryTransport.getEntries()[0].scope).toEqual({ module: 'executor', runId: null, agentId: 'agent-1' });
    });

    it('should merge bindings into entry data, letting call data win', () => {
      const child = logger.child({ bindings: { executionId: 'x1', tool: 'lookup' } });

      child.debug('Tool failed', { tool: 'search', error: 'down' });

      expect(memoryTransport.getEntries()[0].data).toEqual({ executionId: 'x1', tool: 'search', error: 'down' });
    });
  });

  describe('transports', () => {
    it('should keep writing to other transports when one throws', () => {
      const broken: LogTransport = {
        name: 'broken',
        write: () => {
          throw new Error('disk full');
        },
      };
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const mixed = new Logger({ transports: [broken, memoryTransport] });

      expect(() => mixed.info('still logged')).not.toThrow();
      expect(memoryTransport.getEntries()).toHaveLength(1);
      expect(consoleError).toHaveBeenCalledTimes(1);
    });

    it('should report a transport whose write rejects', async () => {
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const rejecting: LogTransport = { name: 'remote', write: () => Promise.reject(new Error('offline')) };

      new Logger({ transports: [rejecting] }).info('lost');
      await Promise.resolve();
      await Promise.resolve();

      expect(consoleError).toHaveBeenCalledWith("Logger transport 'remote' failed:", expect.any(Error));
    });

    it('should respect max entries limit', () => {
      const smallTransport = new MemoryTransport(3);
      const smallLogger = new Logger({ transports: [smallTransport] });

      for (let i = 1; i <= 4; i++) smallLogger.info(`message ${i}`);

      expect(smallTransport.getEntries().map(entry => entry.message)).toEqual(['message 2', 'message 3', 'message 4']);
    });

    it('should write one console line per entry, warnings to stderr', () => {
      const consoleLog = vi.spyOn(console, 'log').mockImplementation(() => undefined);
      const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
      const consoleLogger = new Logger({ module: 'loop', transports: [new ConsoleTransport()] })
        .child({ runId: 'abcdef0123456789', agentId: 'agent-7' });

      consoleLogger.info('Run started', { iteration: 0 });
      consoleLogger.warn('Tool failed');

      expect(consoleLog).toHaveBeenCalledTimes(1);
      expect(consoleLog.mock.calls[0][0]).toMatch(
        /^\d{4}-\d{2}-\d{2}T\S+Z INFO  \[loop run=abcdef01 agent=agent-7\] Run started \{"iteration":0\}$/,
      );
      expect(consoleError.mock.calls[0][0]).toMatch(/ WARN  \[loop run=abcdef01 agent=agent-7\] Tool failed$/);
    });
  });

  describe('configuration', () => {
    it('should parse severity names case-insensitively', () => {
      expect(parseSeverity('warn')).toBe(Severity.WARN);
      expect(parseSeverity(' DEBUG ')).toBe(Severity.DEBUG);
      expect(parseSeverity('verbose')).toBeNull();
      expect(parseSeverity(undefined)).toBeNull();
    });

    it('should take the minimum level from ORGA_LOG_LEVEL', () => {
      vi.stubEnv('ORGA_LOG_LEVEL', 'error');
      const envLogger = createLogger('env', { transports: [memoryTransport] });

      envLogger.warn('dropped');
      envLogger.error('kept');

      expect(memoryTransport.getEntries().map(e => e.message)).toEqual(['kept']);
      vi.unstubAllEnvs();
    });
  });
});
