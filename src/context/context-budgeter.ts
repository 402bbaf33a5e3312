/**
 * @fileoverview Context Budgeter - keeps each inference request within the
 * context token budget.
 *
 * Strategies:
 * - SlidingWindow: drop the oldest non-anchor messages first
 * - ObservationMasking: replace older tool outputs with a placeholder
 * - AnchoredSummary: keep anchors plus the newest messages and fold the
 *   middle into one synthetic summary message
 *
 * Anchors are the leading system message and the knowledge-context slot.
 * Masking and summarizing fall back to the sliding window when they alone
 * cannot reach the budget. A window never starts with tool results whose
 * assistant call was dropped.
 *
 * @module orga-runtime/context/context-budgeter
 * @version 0.1.0
 */

import type { ContextStrategy, Message } from '../types/loop.types.js';
import type { Conversation } from './conversation.js';
import type { TokenEstimator } from './token-estimator.js';

export interface BudgetReport {
  readonly strategy: ContextStrategy['type'];
  readonly tokensBefore: number;
  readonly tokensAfter: number;

  /** Messages dropped or folded into a summary */
  readonly removed: number;

  /** Tool outputs replaced by a placeholder */
  readonly masked: number;

  /** Whether the sliding window had to finish the job */
  readonly fellBack: boolean;
  readonly changed: boolean;
}

interface Budgeted {
  messages: Message[];
  removed: number;
  masked: number;
  fellBack: boolean;
}

export function maskedToolPlaceholder(toolName: string | undefined): string {
  return `[Previous ${toolName ?? 'tool'} result omitted for context management]`;
}

export function contextSummaryText(omitted: number, toolCalls: number, toolResults: number): string {
  return (
    `[Context summary: ${omitted} messages omitted (${toolCalls} tool calls, ${toolResults} tool results). ` +
    'The conversation continued with the agent working on the task.]'
  );
}

export class ContextBudgeter {
  private readonly estimator: TokenEstimator;

  constructor(estimator: TokenEstimator) {
    this.estimator = estimator;
  }

  /**
   * Applies `strategy` to the conversation in place when it exceeds `limit`.
   */
  enforceBudget(conversation: Conversation, limit: number, strategy: ContextStrategy): BudgetReport {
    const report = this.apply(conversation.getMessages(), limit, strategy);
    if (report.changed) {
      conversation.replaceAll(report.messages);
    }
    return {
      strategy: report.strategy,
      tokensBefore: report.tokensBefore,
      tokensAfter: report.tokensAfter,
      removed: report.removed,
      masked: report.masked,
      fellBack: report.fellBack,
      changed: report.changed,
    };
  }

  /**
   * Pure form of {@link enforceBudget}.
   */
  apply(
    messages: ReadonlyArray<Message>,
    limit: number,
    strategy: ContextStrategy,
  ): BudgetReport & { messages: Message[] } {
    const tokensBefore = this.estimator.estimateMessages(messages);

    const result = this.select(messages, limit, tokensBefore, strategy);
    const changed = result.removed > 0 || result.masked > 0;
    return {
      strategy: strategy.type,
      tokensBefore,
      tokensAfter: changed ? this.estimator.estimateMessages(result.messages) : tokensBefore,
      removed: result.removed,
      masked: result.masked,
      fellBack: result.fellBack,
      changed,
      messages: result.messages,
    };
  }

  // ============ Strategies ============

  private select(
    messages: ReadonlyArray<Message>,
    limit: number,
    tokensBefore: number,
    strategy: ContextStrategy,
  ): Budgeted {
    switch (strategy.type) {
      case 'SlidingWindow':
        return tokensBefore <= limit ? unchanged(messages) : this.slidingWindow(messages, limit);
      case 'ObservationMasking':
        return this.observationMasking(messages, limit, tokensBefore, strategy.keepRecent, strategy.triggerRatio);
      case 'AnchoredSummary':
        return tokensBefore <= limit ? unchanged(messages) : this.anchoredSummary(messages, limit, strategy.keepRecent);
    }
  }

  private slidingWindow(messages: ReadonlyArray<Message>, limit: number): Budgeted {
    const { anchors, rest } = splitAnchors(messages);
    const available = limit - this.estimator.estimateMessages(anchors);

    let start = rest.length;
    let used = 0;
    while (start > 0) {
      const cost = this.estimator.estimateMessage(rest[start - 1]);
      // The newest message is always kept, even alone over budget.
      if (start < rest.length && used + cost > available) break;
      start -= 1;
      used += cost;
    }
    const window = rest.slice(windowStart(rest, start));

    return {
      messages: [...anchors, ...window],
      removed: rest.length - window.length,
      masked: 0,
      fellBack: false,
    };
  }

  private observationMasking(
    messages: ReadonlyArray<Message>,
    limit: number,
    tokensBefore: number,
    keepRecent: number,
    triggerRatio: number,
  ): Budgeted {
    if (tokensBefore <= limit * triggerRatio) return unchanged(messages);

    const cutoff = messages.length - keepRecent;
    let masked = 0;
    const next = messages.map((message, index): Message => {
      if (index >= cutoff || message.role !== 'tool') return message;
      const placeholder = maskedToolPlaceholder(message.toolName);
      if (message.content.length <= placeholder.length) return message;
      masked += 1;
      return { ...message, content: placeholder };
    });

    if (this.estimator.estimateMessages(next) <= limit) {
      return { messages: next, removed: 0, masked, fellBack: false };
    }
    const windowed = this.slidingWindow(next, limit);
    return { ...windowed, masked, fellBack: true };
  }

  private anchoredSummary(messages: ReadonlyArray<Message>, limit: number, keepRecent: number): Budgeted {
    const { anchors, rest } = splitAnchors(messages);
    const head = rest[0]?.role === 'user' ? [rest[0]] : [];

    let tailStart = Math.max(head.length, rest.length - keepRecent);
    while (tailStart < rest.length && rest[tailStart].role === 'tool') tailStart += 1;

    const middle = rest.slice(head.length, tailStart);
    if (middle.length === 0) {
      return { ...this.slidingWindow(messages, limit), fellBack: true };
    }

    const toolCalls = middle.reduce((sum, m) => sum + (m.role === 'assistant' ? (m.toolCalls?.length ?? 0) : 0), 0);
    const toolResults = middle.filter(m => m.role === 'tool').length;
    const summary: Message = { role: 'user', content: contextSummaryText(middle.length, toolCalls, toolResults) };
    const next = [...anchors, ...head, summary, ...rest.slice(tailStart)];

    if (this.estimator.estimateMessages(next) <= limit) {
      return { messages: next, removed: middle.length, masked: 0, fellBack: false };
    }
    const windowed = this.slidingWindow(next, limit);
    return { ...windowed, removed: messages.length - windowed.messages.length, fellBack: true };
  }
}

// ============ Helpers ============

function unchanged(messages: ReadonlyArray<Message>): Budgeted {
  return { messages: [...messages], removed: 0, masked: 0, fellBack: false };
}

function splitAnchors(messages: ReadonlyArray<Message>): { anchors: Message[]; rest: Message[] } {
  let split = 0;
  while (split < messages.length && messages[split].role === 'system') split += 1;
  return { anchors: messages.slice(0, split), rest: messages.slice(split) };
}

/**
 * Moves a window start off tool results whose assistant call was dropped.
 * When only tool results fit, the window reaches back to their call instead.
 */
function windowStart(rest: ReadonlyArray<Message>, start: number): number {
  let forward = start;
  while (forward < rest.length && rest[forward].role === 'tool') forward += 1;
  if (forward < rest.length || start >= rest.length) return forward;

  let back = start;
  while (back > 0 && rest[back].role === 'tool') back -= 1;
  return back;
}
