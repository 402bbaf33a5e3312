/**
 * @fileoverview Policy gate contract and the rule-based default.
 *
 * A gate returns one LoopDecision per proposed action. Evaluation is
 * synchronous and depends only on its arguments, so a recorded run can be
 * re-evaluated from the journal.
 *
 * @module orga-runtime/policy/gate
 */

import { PolicyError, toError } from '../types/errors.js';
import type { AgentId } from '../types/core.types.js';
import type { LoopDecision, LoopState, ProposedAction } from '../types/loop.types.js';

export interface PolicyGate {
  evaluate(agentId: AgentId, action: ProposedAction, state: LoopState): LoopDecision;
}

export const ALLOW: LoopDecision = { type: 'Allow' };

/**
 * Allows every action.
 */
export const permissivePolicyGate: PolicyGate = {
  evaluate: () => ALLOW,
};

export interface RuleContext {
  readonly agentId: AgentId;

  /** The action as modified by earlier rules */
  readonly action: ProposedAction;
  readonly state: LoopState;
}

/**
 * One ordered check. Throwing `PolicyError` denies the action.
 */
export interface PolicyRule {
  readonly name: string;
  evaluate(context: RuleContext): LoopDecision;
}

/**
 * Runs rules in order. The first Deny wins; Modify results are chained so
 * later rules see the replacement, and their reasons are joined.
 *
 * @example
 * ```typescript
 * const gate = new RuleBasedPolicyGate([
 *   allowOnlyDeclaredTools(),
 *   validateToolArguments(),
 *   redactArguments(['apiKey']),
 * ]);
 * ```
 */
export class RuleBasedPolicyGate implements PolicyGate {
  private readonly rules: ReadonlyArray<PolicyRule>;

  constructor(rules: ReadonlyArray<PolicyRule>) {
    this.rules = [...rules];
  }

  get ruleNames(): string[] {
    return this.rules.map(rule => rule.name);
  }

  evaluate(agentId: AgentId, action: ProposedAction, state: LoopState): LoopDecision {
    let current = action;
    const reasons: string[] = [];

    for (const rule of this.rules) {
      let decision: LoopDecision;
      try {
        decision = rule.evaluate({ agentId, action: current, state });
      } catch (error) {
        return { type: 'Deny', reason: denialFor(rule, error) };
      }

      if (decision.type === 'Deny') return decision;
      if (decision.type === 'Modify') {
        current = withId(decision.replacement, action.id);
        reasons.push(decision.reason);
      }
    }

    return reasons.length > 0 ? { type: 'Modify', replacement: current, reason: reasons.join('; ') } : ALLOW;
  }
}

/**
 * Gives a replacement the id of the action it replaces.
 */
export function withId(action: ProposedAction, id: string): ProposedAction {
  return action.id === id ? action : { ...action, id };
}

function denialFor(rule: PolicyRule, error: unknown): string {
  if (error instanceof PolicyError) return error.message;
  return `Policy rule "${rule.name}" failed: ${toError(error).message}`;
}
