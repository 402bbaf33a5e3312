/**
 * @fileoverview Base provider interface for multi-LLM support.
 *
 * The loop only depends on {@link InferenceProvider}. Backends differ in
 * how they advertise tools:
 * - Claude (messages API, native `tool_use` blocks)
 * - OpenAI and compatible APIs (chat completions, native function calling)
 * - Plain text completion functions (a JSON tool-call convention parsed
 *   from the reply)
 *
 * @module orga-runtime/providers
 */

import { generateId } from '../types/core.types.js';
import type { ProposedAction, ToolDefinition } from '../types/loop.types.js';
import type { Conversation } from '../context/conversation.js';

/**
 * Supported LLM providers.
 */
export enum LLMProvider {
  /** Anthropic Claude - messages API */
  CLAUDE = 'claude',

  /** OpenAI GPT models and compatible endpoints - chat completions */
  OPENAI = 'openai',

  /** Any text completion function - tool calls parsed from the reply */
  TEXT = 'text',
}

/**
 * Per-call options supplied by the loop runner.
 */
export interface InferenceOptions {
  /** Overrides the provider's default model */
  model: string | undefined;
  temperature: number;
  maxTokens: number;

  /** Passed to the backend unchanged */
  tools: ReadonlyArray<ToolDefinition>;
  signal?: AbortSignal;
}

export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'other';

export interface ProviderUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface InferenceResponse {
  /** Assistant text, possibly empty when the model only calls tools */
  content: string;
  actions: ProposedAction[];
  usage: ProviderUsage;
  model: string;
  finishReason: FinishReason;
}

/**
 * Model backend contract used by the Reasoning phase.
 *
 * Implementations reject with `InferenceError` only.
 */
export interface InferenceProvider {
  readonly name: string;
  complete(conversation: Conversation, options: InferenceOptions): Promise<InferenceResponse>;
}

/**
 * Provider configuration.
 */
export interface ProviderConfig {
  provider: LLMProvider;

  /** API key sent with every request */
  apiKey?: string;

  /** Base URL, without a trailing path */
  endpoint?: string;

  /** Model used when the run does not name one */
  defaultModel?: string;

  /** Per-request HTTP timeout, combined with the run's abort signal */
  requestTimeoutMs?: number;

  /** Extra headers merged into every request */
  headers?: Record<string, string>;
}

/**
 * Abstract base class for HTTP-backed provider adapters.
 */
export abstract class BaseProvider implements InferenceProvider {
  readonly provider: LLMProvider;
  protected readonly config: ProviderConfig;

  constructor(config: ProviderConfig) {
    this.provider = config.provider;
    this.config = config;
  }

  get name(): string {
    return this.provider;
  }

  abstract complete(conversation: Conversation, options: InferenceOptions): Promise<InferenceResponse>;

  protected resolveModel(options: InferenceOptions, fallback: string): string {
    return options.model ?? this.config.defaultModel ?? fallback;
  }

  protected baseUrl(fallback: string): string {
    return (this.config.endpoint ?? fallback).replace(/\/$/, '');
  }
}

/**
 * A tool call as parsed from a backend reply, before ids are guaranteed.
 */
export interface ParsedToolCall {
  id?: string | undefined;
  name: string;
  arguments: string;
}

/**
 * Turns a reply into proposed actions. Any tool call makes the reply a
 * tool-calling turn; otherwise the text is the final answer.
 */
export function toProposedActions(content: string, toolCalls: ReadonlyArray<ParsedToolCall>): ProposedAction[] {
  if (toolCalls.length === 0) {
    return [{ kind: 'FinalAnswer', id: `answer_${generateId()}`, text: content }];
  }
  return toolCalls.map((call): ProposedAction => ({
    kind: 'ToolCall',
    id: call.id !== undefined && call.id !== '' ? call.id : `call_${generateId()}`,
    name: call.name,
    arguments: call.arguments,
  }));
}
