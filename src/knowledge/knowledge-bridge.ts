/**
 * @fileoverview Knowledge bridge - connects the loop to a fact store.
 *
 * The runner calls every hook on every run. Without a configured store the
 * {@link noopKnowledgeBridge} stands in, so the loop body never checks
 * whether knowledge is enabled.
 *
 * @module orga-runtime/knowledge/knowledge-bridge
 */

import { z } from 'zod';
import { systemClock, type AgentId, type Clock } from '../types/core.types.js';
import { toError } from '../types/errors.js';
import type { LoopResult, Message, ToolDefinition } from '../types/loop.types.js';
import { parseToolArguments, type Conversation } from '../context/conversation.js';
import { toolFailure, toolSuccess, type ActionExecutor, type ToolOutcome } from '../execution/executor.js';
import { KnowledgeInterceptingExecutor, type KnowledgeToolHandler } from './knowledge-executor.js';
import type { KnowledgeItem, KnowledgeStore } from './knowledge-store.js';

export interface KnowledgeBridge {
  /**
   * Refreshes the knowledge-context message before a Reasoning call.
   * Returns the number of items injected.
   */
  beforeReasoning(agentId: AgentId, conversation: Conversation): Promise<number>;

  /** Executor the run dispatches through */
  wrapExecutor(executor: ActionExecutor): ActionExecutor;

  /** Tools the bridge answers, advertised to the model */
  toolDefinitions(): ReadonlyArray<ToolDefinition>;

  afterRun(agentId: AgentId, result: LoopResult): Promise<void>;
}

export const noopKnowledgeBridge: KnowledgeBridge = {
  beforeReasoning: async () => 0,
  wrapExecutor: executor => executor,
  toolDefinitions: () => [],
  afterRun: async () => undefined,
};

export const RECALL_KNOWLEDGE = 'recall_knowledge';
export const STORE_KNOWLEDGE = 'store_knowledge';
export const CONVERSATION_SUMMARY_KEY = 'last_conversation_summary';

export const KNOWLEDGE_TOOL_DEFINITIONS: ReadonlyArray<ToolDefinition> = [
  {
    name: RECALL_KNOWLEDGE,
    description:
      "Search the agent's knowledge base for relevant information. Use this to recall facts, procedures or patterns that may help with the current task.",
    parameters: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'The search query to find relevant knowledge' },
        limit: { type: 'integer', description: 'Maximum number of results to return (default: 5)', default: 5 },
      },
      required: ['query'],
    },
  },
  {
    name: STORE_KNOWLEDGE,
    description:
      "Store a new fact in the agent's knowledge base for future reference. Use this to remember important information learned during the conversation.",
    parameters: {
      type: 'object',
      properties: {
        subject: { type: 'string', description: "The subject of the fact (e.g. 'invoice-7')" },
        predicate: { type: 'string', description: "The relationship (e.g. 'has_status')" },
        object: { type: 'string', description: "The object of the fact (e.g. 'paid')" },
        confidence: { type: 'number', description: 'Confidence level 0.0-1.0 (default: 0.8)', default: 0.8 },
      },
      required: ['subject', 'predicate', 'object'],
    },
  },
];

const RecallArgsSchema = z.object({
  query: z.string().min(1),
  limit: z.number().int().positive().default(5),
});

const StoreArgsSchema = z.object({
  subject: z.string().min(1),
  predicate: z.string().min(1),
  object: z.string().min(1),
  confidence: z.number().min(0).max(1).default(0.8),
});

export interface KnowledgeBridgeOptions {
  /** Items injected per Reasoning call (default 5) */
  maxContextItems?: number;

  /** Minimum relevance for injection (default 0.3) */
  relevanceThreshold?: number;

  /** Store a summary of the answers after a completed run (default true) */
  autoPersist?: boolean;
  clock?: Clock;
}

export const KNOWLEDGE_CONTEXT_HEADER =
  'The following relevant knowledge and context was retrieved for this conversation:';

const SUMMARY_LIMIT = 2000;

/**
 * Bridge over a {@link KnowledgeStore}.
 *
 * @example
 * ```typescript
 * const bridge = new StoreKnowledgeBridge(new InMemoryKnowledgeStore(), { maxContextItems: 3 });
 * const runner = new ReasoningLoopRunner({ provider, invoker, knowledgeBridge: bridge });
 * ```
 */
export class StoreKnowledgeBridge implements KnowledgeBridge, KnowledgeToolHandler {
  private readonly store: KnowledgeStore;
  private readonly maxContextItems: number;
  private readonly relevanceThreshold: number;
  private readonly autoPersist: boolean;
  private readonly clock: Clock;

  constructor(store: KnowledgeStore, options: KnowledgeBridgeOptions = {}) {
    this.store = store;
    this.maxContextItems = options.maxContextItems ?? 5;
    this.relevanceThreshold = options.relevanceThreshold ?? 0.3;
    this.autoPersist = options.autoPersist ?? true;
    this.clock = options.clock ?? systemClock;
  }

  async beforeReasoning(agentId: AgentId, conversation: Conversation): Promise<number> {
    const terms = extractSearchTerms(conversation.getMessages());
    if (terms.length === 0) return 0;

    const items = (await this.store.query(agentId, terms.join(' '), this.maxContextItems))
      .filter(item => item.relevance >= this.relevanceThreshold)
      .slice(0, this.maxContextItems);
    if (items.length === 0) return 0;

    conversation.injectKnowledgeContext(`${KNOWLEDGE_CONTEXT_HEADER}\n${items.map(contextLine).join('\n')}`);
    return items.length;
  }

  wrapExecutor(executor: ActionExecutor): ActionExecutor {
    return new KnowledgeInterceptingExecutor(executor, this, this.clock);
  }

  toolDefinitions(): ReadonlyArray<ToolDefinition> {
    return KNOWLEDGE_TOOL_DEFINITIONS;
  }

  async afterRun(agentId: AgentId, result: LoopResult): Promise<void> {
    if (!this.autoPersist || result.terminationReason.type !== 'Completed') return;
    const summary = summarizeAnswers(result.conversation);
    if (summary === null) return;
    await this.store.remember(agentId, CONVERSATION_SUMMARY_KEY, summary);
  }

  handles(toolName: string): boolean {
    return toolName === RECALL_KNOWLEDGE || toolName === STORE_KNOWLEDGE;
  }

  async handle(agentId: AgentId, toolName: string, args: string): Promise<ToolOutcome> {
    switch (toolName) {
      case RECALL_KNOWLEDGE:
        return this.recall(agentId, args);
      case STORE_KNOWLEDGE:
        return this.storeFact(agentId, args);
      default:
        return toolFailure(`Unknown knowledge tool: ${toolName}`, { notFound: true });
    }
  }

  // ============ Private Methods ============

  private async recall(agentId: AgentId, args: string): Promise<ToolOutcome> {
    const parsed = RecallArgsSchema.safeParse(parseToolArguments(args));
    if (!parsed.success) return invalidArguments(parsed.error);

    try {
      const items = await this.store.query(agentId, parsed.data.query, parsed.data.limit);
      if (items.length === 0) return toolSuccess('No relevant knowledge found.');
      return toolSuccess(items.map(recallLine).join('\n'));
    } catch (error) {
      return toolFailure(`Knowledge search failed: ${toError(error).message}`);
    }
  }

  private async storeFact(agentId: AgentId, args: string): Promise<ToolOutcome> {
    const parsed = StoreArgsSchema.safeParse(parseToolArguments(args));
    if (!parsed.success) return invalidArguments(parsed.error);

    const { subject, predicate, object, confidence } = parsed.data;
    try {
      const id = await this.store.store(agentId, subject, predicate, object, confidence);
      return toolSuccess(`Stored fact: ${subject} ${predicate} ${object} (id: ${id})`);
    } catch (error) {
      return toolFailure(`Failed to store knowledge: ${toError(error).message}`);
    }
  }
}

// ============ Helpers ============

/**
 * Search terms from the last five messages, user and tool messages only:
 * up to ten words longer than three characters per message, trimmed of
 * surrounding punctuation, deduplicated, stopping once fifteen are found.
 */
export function extractSearchTerms(messages: ReadonlyArray<Message>): string[] {
  const terms: string[] = [];
  for (const message of messages.slice(-5).reverse()) {
    if (message.role === 'user' || message.role === 'tool') {
      const words = message.content
        .split(/\s+/)
        .filter(word => word.length > 3)
        .slice(0, 10);
      for (const word of words) {
        const cleaned = word.replace(/^[^\p{L}\p{N}]+|[^\p{L}\p{N}]+$/gu, '');
        if (cleaned !== '' && !terms.includes(cleaned)) terms.push(cleaned);
      }
    }
    if (terms.length >= 15) break;
  }
  return terms;
}

function contextLine(item: KnowledgeItem): string {
  return item.kind === 'memory'
    ? `- [memory, relevance=${item.relevance.toFixed(2)}] ${item.content}`
    : `- [knowledge/${item.knowledgeType}, confidence=${item.confidence.toFixed(2)}] ${item.content}`;
}

function recallLine(item: KnowledgeItem): string {
  return item.kind === 'memory'
    ? `- [memory, relevance=${item.relevance.toFixed(2)}] ${item.content}`
    : `- [${item.knowledgeType}, confidence=${item.confidence.toFixed(2)}] ${item.content}`;
}

/**
 * Assistant answers joined by `---`, cut at 2000 characters.
 */
export function summarizeAnswers(conversation: ReadonlyArray<Message>): string | null {
  const answers = conversation.filter(message => message.role === 'assistant' && message.content !== '');
  if (answers.length === 0) return null;
  if (answers.length === 1) return answers[0].content;
  const combined = answers.map(message => message.content).join('\n---\n');
  return combined.length > SUMMARY_LIMIT ? `${combined.slice(0, SUMMARY_LIMIT)}...` : combined;
}

function invalidArguments(error: z.ZodError): ToolOutcome {
  const issues = error.issues.map(issue =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
  return toolFailure(`Invalid arguments: ${issues.join(', ')}`, { retriable: false });
}
