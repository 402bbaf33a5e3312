/**
 * @fileoverview Advisory token estimates for budgeting.
 *
 * Estimates come from a pluggable per-message cost function and are scaled
 * by a calibration ratio learned from the prompt-token counts providers
 * report after each call.
 *
 * @module orga-runtime/context/token-estimator
 */

import type { Message } from '../types/loop.types.js';

export interface TokenEstimator {
  estimateMessage(message: Message): number;
  estimateMessages(messages: ReadonlyArray<Message>): number;

  /** Feeds back the prompt tokens a provider reported for `messages` */
  reconcile(messages: ReadonlyArray<Message>, reportedPromptTokens: number): void;
}

export type TokenCostFn = (message: Message) => number;

/** Fixed per-message overhead for role and framing tokens */
export const MESSAGE_OVERHEAD_TOKENS = 4;

/**
 * Roughly four characters per token, counting tool call names and
 * arguments, plus a per-message overhead.
 */
export const characterHeuristic: TokenCostFn = message => {
  let chars = message.content.length;
  for (const call of message.toolCalls ?? []) {
    chars += call.name.length + call.arguments.length;
  }
  return Math.max(Math.floor(chars / 4), 1) + MESSAGE_OVERHEAD_TOKENS;
};

export interface CalibrationOptions {
  /** Weight of the newest observation in the running ratio (0-1] */
  readonly smoothing: number;
  readonly minRatio: number;
  readonly maxRatio: number;
}

const DEFAULT_CALIBRATION: CalibrationOptions = {
  smoothing: 0.5,
  minRatio: 0.25,
  maxRatio: 4,
};

export class CalibratedTokenEstimator implements TokenEstimator {
  private readonly cost: TokenCostFn;
  private readonly options: CalibrationOptions;
  private ratio = 1;

  constructor(cost: TokenCostFn = characterHeuristic, options: Partial<CalibrationOptions> = {}) {
    this.cost = cost;
    this.options = { ...DEFAULT_CALIBRATION, ...options };
  }

  estimateMessage(message: Message): number {
    return Math.ceil(this.cost(message) * this.ratio);
  }

  estimateMessages(messages: ReadonlyArray<Message>): number {
    return messages.reduce((sum, message) => sum + this.estimateMessage(message), 0);
  }

  reconcile(messages: ReadonlyArray<Message>, reportedPromptTokens: number): void {
    const raw = messages.reduce((sum, message) => sum + this.cost(message), 0);
    if (raw <= 0 || reportedPromptTokens <= 0) return;

    const observed = reportedPromptTokens / raw;
    const { smoothing, minRatio, maxRatio } = this.options;
    const blended = this.ratio * (1 - smoothing) + observed * smoothing;
    this.ratio = Math.min(maxRatio, Math.max(minRatio, blended));
  }

  get calibrationRatio(): number {
    return this.ratio;
  }
}
