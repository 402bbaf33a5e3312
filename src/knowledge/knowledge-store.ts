/**
 * @fileoverview Knowledge store contract and an in-memory implementation.
 *
 * A store holds two kinds of items per agent: facts (subject, predicate,
 * object with a confidence) and keyed working-memory entries. Queries rank
 * both with a pluggable {@link RelevanceScorer}.
 *
 * @module orga-runtime/knowledge/knowledge-store
 */

import { v4 as uuidv4 } from 'uuid';
import { createTimestamp, type AgentId, type Timestamp } from '../types/core.types.js';

export type KnowledgeItem =
  | {
      readonly kind: 'memory';
      readonly id: string;
      readonly content: string;
      readonly relevance: number;
    }
  | {
      readonly kind: 'knowledge';
      readonly id: string;
      readonly content: string;
      readonly relevance: number;

      /** e.g. `Fact` */
      readonly knowledgeType: string;
      readonly confidence: number;
    };

/**
 * Query interface the knowledge bridge consumes.
 */
export interface KnowledgeStore {
  /** At most `k` items, most relevant first */
  query(agentId: AgentId, text: string, k: number): Promise<KnowledgeItem[]>;

  /** Returns the id of the stored fact */
  store(agentId: AgentId, subject: string, predicate: string, object: string, confidence: number): Promise<string>;

  /** Adds or replaces a working-memory entry */
  remember(agentId: AgentId, key: string, content: string): Promise<void>;
}

/**
 * Scores how well `content` answers `query`, from 0 to 1.
 */
export type RelevanceScorer = (query: string, content: string) => number;

function terms(text: string): Set<string> {
  return new Set(text.toLowerCase().match(/[\p{L}\p{N}]+/gu) ?? []);
}

/**
 * Share of the query's distinct terms that appear in the content.
 */
export const termOverlapScorer: RelevanceScorer = (query, content) => {
  const wanted = terms(query);
  if (wanted.size === 0) return 0;
  const present = terms(content);
  let hits = 0;
  for (const term of wanted) {
    if (present.has(term)) hits += 1;
  }
  return hits / wanted.size;
};

export interface StoredFact {
  readonly id: string;
  readonly subject: string;
  readonly predicate: string;
  readonly object: string;
  readonly confidence: number;
  readonly createdAt: Timestamp;
}

interface AgentKnowledge {
  readonly facts: StoredFact[];
  readonly memory: Map<string, { id: string; content: string }>;
}

/**
 * Process-local store, one partition per agent.
 *
 * @example
 * ```typescript
 * const store = new InMemoryKnowledgeStore();
 * await store.store(agentId, 'invoice-7', 'status', 'paid', 0.9);
 * await store.query(agentId, 'invoice-7 status', 3);
 * ```
 */
export class InMemoryKnowledgeStore implements KnowledgeStore {
  private readonly agents = new Map<AgentId, AgentKnowledge>();
  private readonly scorer: RelevanceScorer;

  constructor(options: { scorer?: RelevanceScorer } = {}) {
    this.scorer = options.scorer ?? termOverlapScorer;
  }

  async query(agentId: AgentId, text: string, k: number): Promise<KnowledgeItem[]> {
    const partition = this.agents.get(agentId);
    if (partition === undefined || k <= 0) return [];

    const scored: KnowledgeItem[] = [];
    for (const [, entry] of partition.memory) {
      scored.push({ kind: 'memory', id: entry.id, content: entry.content, relevance: this.scorer(text, entry.content) });
    }
    for (const fact of partition.facts) {
      const content = `${fact.subject} ${fact.predicate} ${fact.object}`;
      scored.push({
        kind: 'knowledge',
        id: fact.id,
        content,
        relevance: this.scorer(text, content),
        knowledgeType: 'Fact',
        confidence: fact.confidence,
      });
    }

    return scored
      .filter(item => item.relevance > 0)
      .sort((a, b) => b.relevance - a.relevance)
      .slice(0, k);
  }

  async store(agentId: AgentId, subject: string, predicate: string, object: string, confidence: number): Promise<string> {
    const id = uuidv4();
    this.partition(agentId).facts.push({ id, subject, predicate, object, confidence, createdAt: createTimestamp() });
    return id;
  }

  async remember(agentId: AgentId, key: string, content: string): Promise<void> {
    const memory = this.partition(agentId).memory;
    memory.set(key, { id: memory.get(key)?.id ?? uuidv4(), content });
  }

  facts(agentId: AgentId): ReadonlyArray<StoredFact> {
    return [...(this.agents.get(agentId)?.facts ?? [])];
  }

  recall(agentId: AgentId, key: string): string | null {
    return this.agents.get(agentId)?.memory.get(key)?.content ?? null;
  }

  clear(agentId?: AgentId): void {
    if (agentId === undefined) {
      this.agents.clear();
      return;
    }
    this.agents.delete(agentId);
  }

  // ============ Private Methods ============

  private partition(agentId: AgentId): AgentKnowledge {
    let partition = this.agents.get(agentId);
    if (partition === undefined) {
      partition = { facts: [], memory: new Map() };
      this.agents.set(agentId, partition);
    }
    return partition;
  }
}
