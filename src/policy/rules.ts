/**
 * @fileoverview Built-in policy rules for {@link RuleBasedPolicyGate}.
 *
 * @module orga-runtime/policy/rules
 */

import { z } from 'zod';
import { PolicyError } from '../types/errors.js';
import { parseToolArguments } from '../context/conversation.js';
import type { LoopDecision, ToolCallAction } from '../types/loop.types.js';
import { ALLOW, type PolicyRule, type RuleContext } from './gate.js';

export const REDACTED = '[REDACTED]';

const ParameterSchemaShape = z
  .object({
    required: z.array(z.string()).optional(),
    properties: z
      .record(z.object({ type: z.union([z.string(), z.array(z.string())]).optional() }).passthrough())
      .optional(),
  })
  .passthrough();

function toolCall(context: RuleContext): ToolCallAction | null {
  return context.action.kind === 'ToolCall' ? context.action : null;
}

/**
 * Denies calls to the named tools.
 */
export function denyTools(names: Iterable<string>): PolicyRule {
  const denied = new Set(names);
  return {
    name: 'denyTools',
    evaluate(context): LoopDecision {
      const call = toolCall(context);
      if (call === null || !denied.has(call.name)) return ALLOW;
      return { type: 'Deny', reason: `Tool "${call.name}" is not permitted for this agent` };
    },
  };
}

/**
 * Denies calls to tools that are not callable in this run.
 */
export function allowOnlyDeclaredTools(): PolicyRule {
  return {
    name: 'allowOnlyDeclaredTools',
    evaluate(context): LoopDecision {
      const call = toolCall(context);
      if (call === null) return ALLOW;
      if (context.state.tools.some(tool => tool.name === call.name)) return ALLOW;
      return { type: 'Deny', reason: `Tool "${call.name}" is not declared` };
    },
  };
}

/**
 * Checks arguments against the declared tool's `required` list and the
 * `type` of each declared property. Arguments that are not a JSON object
 * raise PolicyError.
 */
export function validateToolArguments(): PolicyRule {
  return {
    name: 'validateToolArguments',
    evaluate(context): LoopDecision {
      const call = toolCall(context);
      if (call === null) return ALLOW;

      const args = parseToolArguments(call.arguments);
      if (args === null) {
        throw new PolicyError(`Arguments for tool "${call.name}" are not a JSON object`);
      }

      const declared = context.state.tools.find(tool => tool.name === call.name);
      if (declared === undefined) return ALLOW;
      const schema = ParameterSchemaShape.safeParse(declared.parameters);
      if (!schema.success) return ALLOW;

      for (const key of schema.data.required ?? []) {
        if (!(key in args)) {
          return { type: 'Deny', reason: `Missing required argument "${key}" for tool "${call.name}"` };
        }
      }

      for (const [key, property] of Object.entries(schema.data.properties ?? {})) {
        if (!(key in args) || property.type === undefined) continue;
        const allowed = Array.isArray(property.type) ? property.type : [property.type];
        if (!allowed.some(type => matchesJsonType(args[key], type))) {
          return { type: 'Deny', reason: `Argument "${key}" of tool "${call.name}" must be ${allowed.join(' or ')}` };
        }
      }
      return ALLOW;
    },
  };
}

/**
 * Replaces the values of the given top-level argument keys.
 */
export function redactArguments(keys: Iterable<string>, placeholder: string = REDACTED): PolicyRule {
  const redacted = new Set(keys);
  return {
    name: 'redactArguments',
    evaluate(context): LoopDecision {
      const call = toolCall(context);
      if (call === null) return ALLOW;
      const args = parseToolArguments(call.arguments);
      if (args === null) return ALLOW;

      const hits = Object.keys(args).filter(key => redacted.has(key) && args[key] !== placeholder);
      if (hits.length === 0) return ALLOW;

      const next: Record<string, unknown> = { ...args };
      for (const key of hits) next[key] = placeholder;
      return {
        type: 'Modify',
        replacement: { ...call, arguments: JSON.stringify(next) },
        reason: `Redacted arguments: ${hits.join(', ')}`,
      };
    },
  };
}

/**
 * Denies final answers matching `pattern`.
 */
export function blockFinalAnswerPattern(pattern: RegExp, reason?: string): PolicyRule {
  // Stateful flags would make repeated evaluation differ.
  const matcher = new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
  return {
    name: 'blockFinalAnswerPattern',
    evaluate(context): LoopDecision {
      const { action } = context;
      if (action.kind !== 'FinalAnswer' || !matcher.test(action.text)) return ALLOW;
      return { type: 'Deny', reason: reason ?? `Final answer matches blocked pattern ${matcher}` };
    },
  };
}

function matchesJsonType(value: unknown, type: string): boolean {
  switch (type) {
    case 'string':
      return typeof value === 'string';
    case 'number':
      return typeof value === 'number';
    case 'integer':
      return typeof value === 'number' && Number.isInteger(value);
    case 'boolean':
      return typeof value === 'boolean';
    case 'array':
      return Array.isArray(value);
    case 'object':
      return typeof value === 'object' && value !== null && !Array.isArray(value);
    case 'null':
      return value === null;
    default:
      return true;
  }
}
