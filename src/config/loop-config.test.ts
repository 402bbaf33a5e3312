/**
 * @fileoverview Unit tests for loop configuration loading
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadLoopConfigFile, loadLoopConfigFromEnv, resolveLoopConfig } from './loop-config.js';
import { ConfigError } from '../types/errors.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('resolveLoopConfig', () => {
  it('should fill every default', () => {
    const config = resolveLoopConfig();

    expect(config.maxIterations).toBe(25);
    expect(config.maxTotalTokens).toBe(100_000);
    expect(config.timeoutMs).toBe(300_000);
    expect(config.toolTimeoutMs).toBe(30_000);
    expect(config.maxConcurrentTools).toBe(5);
    expect(config.contextTokenBudget).toBe(32_000);
    expect(config.contextStrategy).toEqual({ type: 'SlidingWindow' });
    expect(config.defaultRecovery).toEqual({ type: 'Retry', maxAttempts: 2, baseDelayMs: 500 });
    expect(config.breaker).toEqual({ failureThreshold: 5, cooldownMs: 30_000, halfOpenProbes: 2 });
    expect(config.inference).toEqual({ model: undefined, temperature: 0.3, maxTokens: 4096 });
    expect(config.inferenceRetry).toEqual({ maxRetries: 3, baseDelayMs: 1000, maxDelayMs: 10_000, jitter: true });
    expect(config.tools).toEqual([]);
  });

  it('should keep overrides and fill nested defaults', () => {
    const config = resolveLoopConfig({
      maxIterations: 3,
      contextStrategy: { type: 'ObservationMasking' },
      toolRecovery: { search: { type: 'Escalate', queue: 'ops' } },
      tools: [{ name: 'search' }],
    });

    expect(config.maxIterations).toBe(3);
    expect(config.contextStrategy).toEqual({ type: 'ObservationMasking', keepRecent: 4, triggerRatio: 0.8 });
    expect(config.toolRecovery['search']).toEqual({ type: 'Escalate', queue: 'ops', contextSnapshot: false });
    expect(config.tools[0]).toEqual({ name: 'search', description: '', parameters: { type: 'object', properties: {} } });
  });

  it('should freeze the result deeply', () => {
    const config = resolveLoopConfig({ tools: [{ name: 'search' }] });

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.breaker)).toBe(true);
    expect(Object.isFrozen(config.tools[0])).toBe(true);
  });

  it('should list every issue with its path', () => {
    const error = configError(() =>
      resolveLoopConfig({ maxIterations: -1, tools: [{ name: 'a' }, { name: 'a' }], unknownKey: true }),
    );

    expect(error.issues).toContain('maxIterations: Number must be greater than or equal to 0');
    expect(error.issues.some(issue => issue.startsWith('(root): Unrecognized key'))).toBe(true);
  });

  it('should report duplicate tools and inverted retry delays', () => {
    const error = configError(() =>
      resolveLoopConfig({
        tools: [{ name: 'a' }, { name: 'a' }],
        inferenceRetry: { baseDelayMs: 5000, maxDelayMs: 100 },
      }),
    );

    expect(error.issues).toEqual(['tools.1.name: Duplicate tool "a"', 'inferenceRetry.baseDelayMs: Must not exceed maxDelayMs']);
  });

  it('should only fall back to declared tools', () => {
    const error = configError(() =>
      resolveLoopConfig({
        tools: [{ name: 'lookup' }, { name: 'search' }],
        toolRecovery: { lookup: { type: 'Fallback', alternatives: ['search', 'wipe'] } },
      }),
    );

    expect(error.issues).toEqual(['toolRecovery.lookup.alternatives.1: Fallback tool "wipe" is not a declared tool']);
  });
});

describe('loadLoopConfigFromEnv', () => {
  it('should apply numeric overrides on top of the base', () => {
    const config = loadLoopConfigFromEnv(
      { ORGA_MAX_ITERATIONS: '7', ORGA_TOOL_TIMEOUT_MS: ' 1500 ', ORGA_TIMEOUT_MS: '' },
      { maxConcurrentTools: 2 },
    );

    expect(config.maxIterations).toBe(7);
    expect(config.toolTimeoutMs).toBe(1500);
    expect(config.timeoutMs).toBe(300_000);
    expect(config.maxConcurrentTools).toBe(2);
  });

  it('should name the variable that is not a number', () => {
    const error = configError(() => loadLoopConfigFromEnv({ ORGA_MAX_TOTAL_TOKENS: 'lots' }));

    expect(error.issues).toEqual(['ORGA_MAX_TOTAL_TOKENS: expected a number, got "lots"']);
  });
});

describe('loadLoopConfigFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'orga-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should read and validate a JSON file', async () => {
    const path = join(dir, 'loop.json');
    await writeFile(path, JSON.stringify({ maxIterations: 4, defaultRecovery: { type: 'DeadLetter' } }));

    const config = await loadLoopConfigFile(path);

    expect(config.maxIterations).toBe(4);
    expect(config.defaultRecovery).toEqual({ type: 'DeadLetter' });
  });

  it('should reject invalid JSON', async () => {
    const path = join(dir, 'broken.json');
    await writeFile(path, '{ maxIterations: 4');

    await expect(loadLoopConfigFile(path)).rejects.toThrow(`Config file ${path} is not valid JSON`);
  });

  it('should reject a missing file', async () => {
    await expect(loadLoopConfigFile(join(dir, 'missing.json'))).rejects.toBeInstanceOf(ConfigError);
  });
});
