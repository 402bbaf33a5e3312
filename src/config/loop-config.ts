/**
 * @fileoverview Loop configuration: schema, defaults and loaders.
 *
 * Every loader goes through {@link resolveLoopConfig}, which validates with
 * zod, fills defaults and returns a deeply frozen {@link LoopConfig}.
 *
 * @module orga-runtime/config/loop-config
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, toError } from '../types/errors.js';
import type { LoopConfig } from '../types/loop.types.js';

// ============ Schemas ============

const count = z.number().int().nonnegative();
const positive = z.number().int().positive();

export const RecoveryStrategySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Retry'), maxAttempts: positive, baseDelayMs: count }),
  z.object({ type: z.literal('Fallback'), alternatives: z.array(z.string().min(1)).min(1) }),
  z.object({ type: z.literal('CachedResult'), maxStalenessMs: count }),
  z.object({ type: z.literal('LlmRecovery'), maxRecoveryAttempts: positive }),
  z.object({ type: z.literal('Escalate'), queue: z.string().min(1), contextSnapshot: z.boolean().default(false) }),
  z.object({ type: z.literal('DeadLetter') }),
]);

export const ContextStrategySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('SlidingWindow') }),
  z.object({
    type: z.literal('ObservationMasking'),
    keepRecent: count.default(4),
    triggerRatio: z.number().gt(0).lte(1).default(0.8),
  }),
  z.object({ type: z.literal('AnchoredSummary'), keepRecent: count.default(6) }),
]);

export const BreakerSettingsSchema = z.object({
  failureThreshold: positive,
  cooldownMs: count,
  halfOpenProbes: positive,
});

export const ToolDefinitionSchema = z.object({
  name: z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, 'Tool names use letters, digits, "_" or "-" (max 64)'),
  description: z.string().default(''),
  parameters: z.record(z.unknown()).default({ type: 'object', properties: {} }),
});

export const LoopConfigSchema = z
  .object({
    maxIterations: count.default(25),
    maxTotalTokens: count.default(100_000),
    timeoutMs: positive.default(300_000),
    toolTimeoutMs: positive.default(30_000),
    maxConcurrentTools: positive.default(5),
    contextTokenBudget: positive.default(32_000),
    contextStrategy: ContextStrategySchema.default({ type: 'SlidingWindow' }),
    defaultRecovery: RecoveryStrategySchema.default({ type: 'Retry', maxAttempts: 2, baseDelayMs: 500 }),
    toolRecovery: z.record(RecoveryStrategySchema).default({}),
    breaker: BreakerSettingsSchema.default({ failureThreshold: 5, cooldownMs: 30_000, halfOpenProbes: 2 }),
    toolBreakers: z.record(BreakerSettingsSchema).default({}),
    tools: z.array(ToolDefinitionSchema).default([]),
    inference: z
      .object({
        model: z.string().min(1).optional(),
        temperature: z.number().min(0).max(2).default(0.3),
        maxTokens: positive.default(4096),
      })
      .default({}),
    inferenceRetry: z
      .object({
        maxRetries: count.default(3),
        baseDelayMs: count.default(1000),
        maxDelayMs: count.default(10_000),
        jitter: z.boolean().default(true),
      })
      .default({}),
  })
  .strict()
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.tools.forEach((tool, index) => {
      if (seen.has(tool.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['tools', index, 'name'],
          message: `Duplicate tool "${tool.name}"`,
        });
      }
      seen.add(tool.name);
    });
    const fallbacks: Array<[Array<string | number>, z.infer<typeof RecoveryStrategySchema>]> = [
      [['defaultRecovery'], config.defaultRecovery],
      ...Object.entries(config.toolRecovery).map(
        ([tool, strategy]): [Array<string | number>, z.infer<typeof RecoveryStrategySchema>] => [['toolRecovery', tool], strategy],
      ),
    ];
    for (const [path, strategy] of fallbacks) {
      if (strategy.type !== 'Fallback') continue;
      strategy.alternatives.forEach((alternative, index) => {
        if (!seen.has(alternative)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [...path, 'alternatives', index],
            message: `Fallback tool "${alternative}" is not a declared tool`,
          });
        }
      });
    }
    if (config.inferenceRetry.baseDelayMs > config.inferenceRetry.maxDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['inferenceRetry', 'baseDelayMs'],
        message: 'Must not exceed maxDelayMs',
      });
    }
  });

export type LoopConfigInput = z.input<typeof LoopConfigSchema>;

// ============ Resolution ============

/**
 * Validates a partial configuration and fills in defaults.
 *
 * @throws {ConfigError} listing every issue as `path: message`
 *
 * @example
 * ```typescript
 * const config = resolveLoopConfig({ maxIterations: 10, tools: [searchTool] });
 * ```
 */
export function resolveLoopConfig(input: unknown = {}): LoopConfig {
  const parsed = LoopConfigSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(
      'Invalid loop configuration',
      parsed.error.issues.map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`),
    );
  }

  const data = parsed.data;
  return deepFreeze<LoopConfig>({
    ...data,
    inference: {
      model: data.inference.model,
      temperature: data.inference.temperature,
      maxTokens: data.inference.maxTokens,
    },
  });
}

/**
 * Environment variables read by {@link loadLoopConfigFromEnv}.
 */
export const LOOP_CONFIG_ENV = {
  ORGA_MAX_ITERATIONS: 'maxIterations',
  ORGA_MAX_TOTAL_TOKENS: 'maxTotalTokens',
  ORGA_TIMEOUT_MS: 'timeoutMs',
  ORGA_TOOL_TIMEOUT_MS: 'toolTimeoutMs',
  ORGA_MAX_CONCURRENT_TOOLS: 'maxConcurrentTools',
  ORGA_CONTEXT_TOKEN_BUDGET: 'contextTokenBudget',
} as const;

/**
 * Applies numeric `ORGA_*` overrides on top of `base`. Unset and empty
 * variables are ignored.
 *
 * @throws {ConfigError} when a variable is not a number or the result is invalid
 */
export function loadLoopConfigFromEnv(
  env: Readonly<Record<string, string | undefined>> = process.env,
  base: Readonly<Record<string, unknown>> = {},
): LoopConfig {
  const overrides: Record<string, number> = {};
  const issues: string[] = [];

  for (const [variable, key] of Object.entries(LOOP_CONFIG_ENV)) {
    const raw = env[variable]?.trim();
    if (raw === undefined || raw === '') continue;
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      issues.push(`${variable}: expected a number, got "${raw}"`);
      continue;
    }
    overrides[key] = value;
  }

  if (issues.length > 0) throw new ConfigError('Invalid loop configuration in environment', issues);
  return resolveLoopConfig({ ...base, ...overrides });
}

/**
 * Reads and validates a JSON configuration file.
 *
 * @throws {ConfigError} when the file cannot be read, parsed or validated
 */
export async function loadLoopConfigFile(path: string): Promise<LoopConfig> {
  let text: string;
  try {
    text = await readFile(path, 'utf8');
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${path}`, [toError(error).message]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, [toError(error).message]);
  }
  return resolveLoopConfig(parsed);
}

// ============ Private Helpers ============

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const key of Object.keys(value)) deepFreeze(Reflect.get(value, key));
  }
  return value;
}
