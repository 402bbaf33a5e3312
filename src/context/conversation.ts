/**
 * @fileoverview Conversation store for a single loop run.
 *
 * An ordered, role-tagged message log. Messages are appended only; the two
 * exceptions are the knowledge-context slot (replaced in place) and
 * budgeting, which swaps in a whole new sequence between iterations.
 *
 * @module orga-runtime/context/conversation
 * @version 0.1.0
 */

import type { Message, ToolCallRecord } from '../types/loop.types.js';
import { CalibratedTokenEstimator, type TokenEstimator } from './token-estimator.js';

/**
 * Marker prefix identifying the replaceable knowledge-context message.
 */
export const KNOWLEDGE_CONTEXT_MARKER = '[KNOWLEDGE_CONTEXT]';

export type ProviderFormat = 'openai' | 'anthropic';

// ============ Wire Shapes ============

export interface OpenAIWireToolCall {
  id: string;
  type: 'function';
  function: { name: string; arguments: string };
}

export type OpenAIWireMessage =
  | { role: 'system' | 'user'; content: string }
  | { role: 'assistant'; content: string | null; tool_calls?: OpenAIWireToolCall[] }
  | { role: 'tool'; content: string; tool_call_id: string };

export type AnthropicContentBlock =
  | { type: 'text'; text: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, unknown> }
  | { type: 'tool_result'; tool_use_id: string; content: string; is_error?: boolean };

export interface AnthropicWireMessage {
  role: 'user' | 'assistant';
  content: AnthropicContentBlock[];
}

export interface AnthropicWireRequest {
  system: string | undefined;
  messages: AnthropicWireMessage[];
}

export interface RenderedConversation {
  openai: OpenAIWireMessage[];
  anthropic: AnthropicWireRequest;
}

/**
 * Parses model-produced argument text into an object, or returns null when
 * the text is not a JSON object.
 */
export function parseToolArguments(raw: string): Record<string, unknown> | null {
  const text = raw.trim() === '' ? '{}' : raw;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isPlainObject(parsed) ? parsed : null;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConversationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConversationError';
  }
}

/**
 * Ordered message log owned by one loop run.
 *
 * @example
 * ```typescript
 * const conversation = Conversation.from([
 *   { role: 'system', content: 'You are a careful assistant.' },
 *   { role: 'user', content: 'What is 6*7?' },
 * ]);
 * conversation.renderForProvider('openai');
 * ```
 */
export class Conversation {
  private messages: Message[] = [];

  static from(messages: ReadonlyArray<Message>): Conversation {
    const conversation = new Conversation();
    for (const message of messages) conversation.push(message);
    return conversation;
  }

  /**
   * Appends a message. A system message is only accepted as the first
   * message; the knowledge slot goes through {@link injectKnowledgeContext}.
   */
  push(message: Message): void {
    if (message.role === 'system' && this.messages.length > 0) {
      if (isKnowledgeContext(message) && this.knowledgeContext() === null) {
        this.injectKnowledgeContext(message.content.slice(KNOWLEDGE_CONTEXT_MARKER.length + 1));
        return;
      }
      throw new ConversationError('A system message may only lead the conversation');
    }
    if (message.role === 'tool' && (message.toolCallId === undefined || message.toolCallId === '')) {
      throw new ConversationError('Tool messages must reference a tool call id');
    }
    this.messages.push(message);
  }

  getMessages(): ReadonlyArray<Message> {
    return [...this.messages];
  }

  get length(): number {
    return this.messages.length;
  }

  /**
   * Estimated prompt size, by default with the uncalibrated characters/4
   * heuristic.
   */
  estimateTokens(estimator: TokenEstimator = new CalibratedTokenEstimator()): number {
    return estimator.estimateMessages(this.messages);
  }

  systemMessage(): Message | null {
    const first = this.messages[0];
    return first !== undefined && first.role === 'system' && !isKnowledgeContext(first) ? first : null;
  }

  knowledgeContext(): Message | null {
    return this.messages.find(isKnowledgeContext) ?? null;
  }

  /**
   * Inserts or replaces the single knowledge-context message, placed
   * directly after the leading system message.
   */
  injectKnowledgeContext(text: string): void {
    const message: Message = { role: 'system', content: `${KNOWLEDGE_CONTEXT_MARKER}\n${text}` };
    const existing = this.messages.findIndex(isKnowledgeContext);
    if (existing !== -1) {
      this.messages[existing] = message;
      return;
    }
    const insertAt = this.systemMessage() !== null ? 1 : 0;
    this.messages.splice(insertAt, 0, message);
  }

  clearKnowledgeContext(): boolean {
    const existing = this.messages.findIndex(isKnowledgeContext);
    if (existing === -1) return false;
    this.messages.splice(existing, 1);
    return true;
  }

  /**
   * Swaps in a budgeted sequence. Only the context budgeter calls this.
   */
  replaceAll(messages: ReadonlyArray<Message>): void {
    this.messages = [...messages];
  }

  lastAssistantText(): string {
    for (let i = this.messages.length - 1; i >= 0; i--) {
      const message = this.messages[i];
      if (message.role === 'assistant' && message.content !== '') return message.content;
    }
    return '';
  }

  renderForProvider(format: 'openai'): OpenAIWireMessage[];
  renderForProvider(format: 'anthropic'): AnthropicWireRequest;
  renderForProvider(format: ProviderFormat): OpenAIWireMessage[] | AnthropicWireRequest {
    return format === 'openai' ? this.renderOpenAI() : this.renderAnthropic();
  }

  // ============ Private Methods ============

  private renderOpenAI(): OpenAIWireMessage[] {
    return this.messages.map((message): OpenAIWireMessage => {
      switch (message.role) {
        case 'system':
        case 'user':
          return { role: message.role, content: message.content };
        case 'assistant': {
          const calls = message.toolCalls ?? [];
          if (calls.length === 0) return { role: 'assistant', content: message.content };
          return {
            role: 'assistant',
            content: message.content === '' ? null : message.content,
            tool_calls: calls.map(toOpenAIToolCall),
          };
        }
        case 'tool':
          return { role: 'tool', content: message.content, tool_call_id: message.toolCallId ?? '' };
      }
    });
  }

  private renderAnthropic(): AnthropicWireRequest {
    const systemParts: string[] = [];
    const messages: AnthropicWireMessage[] = [];

    const append = (role: 'user' | 'assistant', blocks: AnthropicContentBlock[]): void => {
      if (blocks.length === 0) return;
      const last = messages[messages.length - 1];
      if (last !== undefined && last.role === role) {
        last.content.push(...blocks);
      } else {
        messages.push({ role, content: blocks });
      }
    };

    for (const message of this.messages) {
      switch (message.role) {
        case 'system':
          systemParts.push(message.content);
          break;
        case 'user':
          append('user', [{ type: 'text', text: message.content }]);
          break;
        case 'assistant': {
          const blocks: AnthropicContentBlock[] = [];
          if (message.content !== '') blocks.push({ type: 'text', text: message.content });
          for (const call of message.toolCalls ?? []) {
            blocks.push({ type: 'tool_use', id: call.id, name: call.name, input: parseToolArguments(call.arguments) ?? {} });
          }
          append('assistant', blocks);
          break;
        }
        case 'tool':
          append('user', [{ type: 'tool_result', tool_use_id: message.toolCallId ?? '', content: message.content }]);
          break;
      }
    }

    return {
      system: systemParts.length > 0 ? systemParts.join('\n\n') : undefined,
      messages,
    };
  }
}

function isKnowledgeContext(message: Message): boolean {
  return message.role === 'system' && message.content.startsWith(KNOWLEDGE_CONTEXT_MARKER);
}

function toOpenAIToolCall(call: ToolCallRecord): OpenAIWireToolCall {
  return { id: call.id, type: 'function', function: { name: call.name, arguments: call.arguments } };
}
