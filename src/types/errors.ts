/**
 * @fileoverview Error taxonomy for the reasoning loop.
 *
 * Every error raised inside the runtime derives from {@link OrgaError} and
 * carries a stable `code` plus a `retryable` flag. The loop runner converts
 * run-level failures into a typed termination reason instead of rejecting.
 *
 * @module orga-runtime/types/errors
 */

import type { TerminationReason } from './loop.types.js';

/**
 * Base class for runtime errors.
 */
export class OrgaError extends Error {
  readonly code: string;
  readonly retryable: boolean;

  constructor(message: string, code: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OrgaError';
    this.code = code;
    this.retryable = retryable;
  }
}

export type InferenceErrorKind = 'Transient' | 'RateLimited' | 'InvalidResponse' | 'Unauthorized';

/**
 * Failure of a model backend call.
 *
 * Transient and RateLimited are retried by the loop runner; the other kinds
 * terminate the run with an `Error` reason.
 */
export class InferenceError extends OrgaError {
  readonly kind: InferenceErrorKind;
  readonly statusCode: number | undefined;
  readonly retryAfterMs: number | undefined;

  constructor(
    kind: InferenceErrorKind,
    message: string,
    options: { statusCode?: number; retryAfterMs?: number; cause?: unknown } = {},
  ) {
    super(message, `INFERENCE_${kind.toUpperCase()}`, kind === 'Transient' || kind === 'RateLimited', {
      cause: options.cause,
    });
    this.name = 'InferenceError';
    this.kind = kind;
    this.statusCode = options.statusCode;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/**
 * A proposed action could not be evaluated. Always treated as a denial.
 */
export class PolicyError extends OrgaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'POLICY_MALFORMED_ACTION', false, options);
    this.name = 'PolicyError';
  }
}

export type ExecutionErrorKind = 'ToolTimeout' | 'ToolNotFound' | 'BreakerOpen' | 'InvocationFailed';

/**
 * Failure of a single tool invocation.
 */
export class ExecutionError extends OrgaError {
  readonly kind: ExecutionErrorKind;
  readonly toolName: string;

  constructor(kind: ExecutionErrorKind, toolName: string, message: string, retryable: boolean, options?: { cause?: unknown }) {
    super(message, `EXECUTION_${kind.toUpperCase()}`, retryable, options);
    this.name = 'ExecutionError';
    this.kind = kind;
    this.toolName = toolName;
  }
}

export type BudgetLimit = 'iterations' | 'tokens' | 'time';

/**
 * A run limit from LoopConfig was reached. Ends the run with the matching
 * termination reason rather than propagating.
 */
export class BudgetExceededError extends OrgaError {
  readonly limit: BudgetLimit;

  constructor(limit: BudgetLimit, message: string) {
    super(message, `BUDGET_${limit.toUpperCase()}`, false);
    this.name = 'BudgetExceededError';
    this.limit = limit;
  }

  get terminationReason(): TerminationReason {
    switch (this.limit) {
      case 'iterations':
        return { type: 'MaxIterations' };
      case 'tokens':
        return { type: 'MaxTokens' };
      case 'time':
        return { type: 'Timeout' };
    }
  }
}

/**
 * A journal sink rejected an entry. Logged by the runner, never fatal.
 */
export class JournalError extends OrgaError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'JOURNAL_WRITE_FAILED', true, options);
    this.name = 'JournalError';
  }
}

/**
 * Invalid configuration input.
 */
export class ConfigError extends OrgaError {
  readonly issues: ReadonlyArray<string>;

  constructor(message: string, issues: ReadonlyArray<string> = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'CONFIG_INVALID', false);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Normalizes an unknown thrown value into an Error.
 */
export function toError(value: unknown): Error {
  if (value instanceof Error) return value;
  return new Error(String(value));
}
