/**
 * @fileoverview Unit tests for the context budgeter and token estimator
 */

import { describe, it, expect } from 'vitest';
import { ContextBudgeter, contextSummaryText, maskedToolPlaceholder } from './context-budgeter.js';
import { CalibratedTokenEstimator, characterHeuristic } from './token-estimator.js';
import { Conversation } from './conversation.js';
import type { Message } from '../types/index.js';

const flat = new CalibratedTokenEstimator(() => 10);
const byLength = new CalibratedTokenEstimator(m => m.content.length);

const sys: Message = { role: 'system', content: 'S' };
const u1: Message = { role: 'user', content: 'question' };
const a1: Message = { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'search', arguments: '{}' }] };
const t1: Message = { role: 'tool', content: 'x'.repeat(200), toolCallId: 'c1', toolName: 'search' };
const a2: Message = { role: 'assistant', content: 'ok' };
const u2: Message = { role: 'user', content: 'next' };

describe('ContextBudgeter', () => {
  describe('SlidingWindow', () => {
    it('should leave a conversation under budget untouched', () => {
      const report = new ContextBudgeter(flat).apply([sys, u1, a1, t1, a2, u2], 60, { type: 'SlidingWindow' });

      expect(report.changed).toBe(false);
      expect(report.tokensAfter).toBe(60);
    });

    it('should keep the system message and the newest messages without orphan tool results', () => {
      const report = new ContextBudgeter(flat).apply([sys, u1, a1, t1, a2, u2], 40, { type: 'SlidingWindow' });

      expect(report.messages).toEqual([sys, a2, u2]);
      expect(report.removed).toBe(3);
      expect(report.tokensAfter).toBe(30);
    });

    it('should treat the knowledge slot as an anchor', () => {
      const conversation = Conversation.from([sys, u1, a2, u2]);
      conversation.injectKnowledgeContext('facts');

      new ContextBudgeter(flat).enforceBudget(conversation, 30, { type: 'SlidingWindow' });

      const messages = conversation.getMessages();
      expect(messages).toHaveLength(3);
      expect(messages[1].content).toContain('facts');
      expect(messages[2]).toEqual(u2);
    });
  });

  describe('ObservationMasking', () => {
    const strategy = { type: 'ObservationMasking', keepRecent: 2, triggerRatio: 1 } as const;

    it('should replace older tool output with a placeholder', () => {
      const report = new ContextBudgeter(byLength).apply([sys, u1, a1, t1, a2, u2], 100, strategy);

      const placeholder = maskedToolPlaceholder('search');
      expect(report.masked).toBe(1);
      expect(report.removed).toBe(0);
      expect(report.messages[3]).toEqual({ ...t1, content: placeholder });
      expect(report.tokensAfter).toBe(15 + placeholder.length);
      expect(report.fellBack).toBe(false);
    });

    it('should fall back to the sliding window when masking is not enough', () => {
      const report = new ContextBudgeter(byLength).apply([sys, u1, a1, t1, a2, u2], 20, strategy);

      expect(report.messages).toEqual([sys, a2, u2]);
      expect(report.masked).toBe(1);
      expect(report.fellBack).toBe(true);
    });

    it('should not mask tool output inside the recent window', () => {
      const report = new ContextBudgeter(byLength).apply([sys, u1, a1, t1], 100, strategy);

      expect(report.masked).toBe(0);
      expect(report.fellBack).toBe(true);
      // Only the oversized result fits, so its call is kept with it.
      expect(report.messages).toEqual([sys, a1, t1]);
      expect(report.removed).toBe(1);
    });
  });

  describe('AnchoredSummary', () => {
    const a3: Message = { role: 'assistant', content: 'partial', toolCalls: [{ id: 'c2', name: 'search', arguments: '{}' }] };
    const t2: Message = { role: 'tool', content: 'more', toolCallId: 'c2', toolName: 'search' };
    const a4: Message = { role: 'assistant', content: 'nearly' };
    const history = [sys, u1, a1, t1, a3, t2, a4, u2];

    it('should keep the first user message and fold the middle into one summary', () => {
      const report = new ContextBudgeter(flat).apply(history, 60, { type: 'AnchoredSummary', keepRecent: 2 });

      expect(report.messages).toEqual([
        sys,
        u1,
        { role: 'user', content: contextSummaryText(4, 2, 2) },
        a4,
        u2,
      ]);
      expect(report.removed).toBe(4);
      expect(report.tokensAfter).toBe(50);
    });

    it('should not start the verbatim tail with a tool result', () => {
      const report = new ContextBudgeter(flat).apply(history, 60, { type: 'AnchoredSummary', keepRecent: 3 });

      expect(report.messages.slice(3)).toEqual([a4, u2]);
    });
  });
});

describe('CalibratedTokenEstimator', () => {
  it('should estimate characters over four plus message overhead', () => {
    expect(characterHeuristic({ role: 'user', content: 'abcdefgh' })).toBe(6);
    expect(characterHeuristic({ role: 'user', content: '' })).toBe(5);
    expect(
      characterHeuristic({ role: 'assistant', content: '', toolCalls: [{ id: 'x', name: 'lookup', arguments: '{"q":"x"}' }] }),
    ).toBe(7);
  });

  it('should move its ratio toward reported usage', () => {
    const estimator = new CalibratedTokenEstimator();
    const messages: Message[] = [{ role: 'user', content: 'abcdefgh' }];

    estimator.reconcile(messages, 12);

    expect(estimator.calibrationRatio).toBe(1.5);
    expect(estimator.estimateMessage(messages[0])).toBe(9);
  });

  it('should clamp the ratio', () => {
    const estimator = new CalibratedTokenEstimator();

    estimator.reconcile([{ role: 'user', content: 'abcdefgh' }], 600);

    expect(estimator.calibrationRatio).toBe(4);
  });
});
