/**
 * @fileoverview Text-protocol provider for models without native tool calls.
 *
 * The conversation is flattened into one prompt with `### Role` sections and
 * the tool list is described in the system section. A reply whose body
 * (optionally fenced) is a JSON object with a `tool_calls` array becomes
 * tool-call actions; any other reply is the final answer.
 *
 * @module orga-runtime/providers/text-protocol
 */

import { z } from 'zod';
import { LLMProvider, toProposedActions, type InferenceOptions, type InferenceProvider, type InferenceResponse, type ParsedToolCall } from './base.js';
import { mapNetworkError } from './error-mapping.js';
import { parseToolArguments, type Conversation } from '../context/conversation.js';
import type { ToolDefinition } from '../types/loop.types.js';

export interface TextCompletionRequest {
  prompt: string;
  model: string | undefined;
  temperature: number;
  maxTokens: number;
  signal?: AbortSignal;
}

export interface TextCompletion {
  text: string;
  model?: string;
  promptTokens?: number;
  completionTokens?: number;
}

export type TextCompletionFn = (request: TextCompletionRequest) => Promise<TextCompletion>;

const ToolCallEnvelopeSchema = z.object({
  tool_calls: z.array(
    z.object({
      name: z.string().min(1),
      arguments: z.union([z.record(z.unknown()), z.string()]).optional(),
    }),
  ),
});

/**
 * Removes one surrounding markdown fence (with optional language tag).
 */
export function stripMarkdownFences(text: string): string {
  const trimmed = text.trim();
  if (!trimmed.startsWith('```')) return trimmed;

  const rest = trimmed.slice(3);
  const newline = rest.indexOf('\n');
  const inner = newline === -1 ? rest : rest.slice(newline + 1);
  return (inner.endsWith('```') ? inner.slice(0, -3) : inner).trim();
}

/**
 * Extracts tool calls from a reply; an empty list means a plain answer.
 */
export function extractToolCalls(text: string): ParsedToolCall[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripMarkdownFences(text));
  } catch {
    return [];
  }

  const envelope = ToolCallEnvelopeSchema.safeParse(parsed);
  if (!envelope.success) return [];

  return envelope.data.tool_calls.map(call => ({
    name: call.name,
    arguments:
      call.arguments === undefined
        ? '{}'
        : typeof call.arguments === 'string'
          ? call.arguments
          : JSON.stringify(call.arguments),
  }));
}

export function buildTextPrompt(conversation: Conversation, tools: ReadonlyArray<ToolDefinition>): string {
  const parts: string[] = [];

  for (const message of conversation.getMessages()) {
    if (message.role === 'system') parts.push(`### System\n${message.content}`);
  }

  if (tools.length > 0) {
    const lines = [
      '### Available Tools',
      'To call tools, respond with only a JSON object in this exact format:',
      '```json\n{"tool_calls": [{"name": "<tool_name>", "arguments": {}}]}\n```',
      '',
      'Tools:',
      ...tools.map(tool => `- ${tool.name}: ${tool.description}\n  Parameters: ${JSON.stringify(tool.parameters)}`),
      '',
      'If you do not need a tool, respond with plain text.',
    ];
    parts.push(lines.join('\n'));
  }

  for (const message of conversation.getMessages()) {
    switch (message.role) {
      case 'system':
        break;
      case 'user':
        parts.push(`### User\n${message.content}`);
        break;
      case 'assistant':
        if (message.toolCalls !== undefined && message.toolCalls.length > 0) {
          const calls = message.toolCalls.map(call => ({
            name: call.name,
            arguments: parseToolArguments(call.arguments) ?? {},
          }));
          parts.push(`### Assistant\n\`\`\`json\n${JSON.stringify({ tool_calls: calls })}\n\`\`\``);
        } else {
          parts.push(`### Assistant\n${message.content}`);
        }
        break;
      case 'tool':
        parts.push(`### Tool Result (${message.toolName ?? 'unknown'})\n${message.content}`);
        break;
    }
  }

  parts.push('### Assistant\n');
  return parts.join('\n\n');
}

/**
 * Wraps a plain completion function as an {@link InferenceProvider}.
 *
 * @example
 * ```typescript
 * const provider = new TextProtocolProvider(async ({ prompt }) => ({
 *   text: await localModel.generate(prompt),
 * }));
 * ```
 */
export class TextProtocolProvider implements InferenceProvider {
  readonly provider = LLMProvider.TEXT;
  private readonly completeText: TextCompletionFn;
  private readonly defaultModel: string;

  constructor(completeText: TextCompletionFn, options: { defaultModel?: string } = {}) {
    this.completeText = completeText;
    this.defaultModel = options.defaultModel ?? 'text';
  }

  get name(): string {
    return this.provider;
  }

  async complete(conversation: Conversation, options: InferenceOptions): Promise<InferenceResponse> {
    const prompt = buildTextPrompt(conversation, options.tools);

    let completion: TextCompletion;
    try {
      completion = await this.completeText({
        prompt,
        model: options.model,
        temperature: options.temperature,
        maxTokens: options.maxTokens,
        signal: options.signal,
      });
    } catch (error) {
      throw mapNetworkError(error, this.provider);
    }

    const toolCalls = extractToolCalls(completion.text);
    const content = toolCalls.length > 0 ? '' : completion.text;

    return {
      content,
      actions: toProposedActions(content, toolCalls),
      usage: {
        promptTokens: completion.promptTokens ?? 0,
        completionTokens: completion.completionTokens ?? 0,
      },
      model: completion.model ?? options.model ?? this.defaultModel,
      finishReason: toolCalls.length > 0 ? 'tool_calls' : 'stop',
    };
  }
}
