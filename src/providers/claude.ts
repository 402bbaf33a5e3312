/**
 * @fileoverview Claude Provider
 *
 * Anthropic messages API (POST /v1/messages) with native tool use.
 * The system prompt travels as a top-level field and tool results as
 * `tool_result` blocks inside user turns.
 *
 * @see https://docs.anthropic.com/en/api/messages
 */

import { z } from 'zod';
import {
  BaseProvider,
  LLMProvider,
  toProposedActions,
  type FinishReason,
  type InferenceOptions,
  type InferenceResponse,
  type ParsedToolCall,
  type ProviderConfig,
} from './base.js';
import { httpPost, type HttpResponse } from './http.js';
import { invalidResponse, mapHttpError, mapNetworkError } from './error-mapping.js';
import type { Conversation } from '../context/conversation.js';
import type { ToolDefinition } from '../types/loop.types.js';

const DEFAULT_ENDPOINT = 'https://api.anthropic.com';
const DEFAULT_MODEL = 'claude-3-5-sonnet-latest';
export const ANTHROPIC_VERSION = '2023-06-01';

/**
 * Tool format expected by the messages API.
 */
export interface ClaudeTool {
  name: string;
  description: string;
  input_schema: Readonly<Record<string, unknown>>;
}

// Block types other than text and tool_use are ignored.
const ContentBlockSchema = z.object({
  type: z.string(),
  text: z.string().optional(),
  id: z.string().optional(),
  name: z.string().optional(),
  input: z.record(z.unknown()).optional(),
});

const ClaudeResponseSchema = z.object({
  model: z.string(),
  content: z.array(ContentBlockSchema),
  stop_reason: z.string().nullish(),
  usage: z.object({ input_tokens: z.number(), output_tokens: z.number() }),
});

export type ClaudeResponse = z.infer<typeof ClaudeResponseSchema>;

/**
 * Claude messages API provider.
 */
export class ClaudeProvider extends BaseProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super({ ...config, provider: LLMProvider.CLAUDE });
  }


  formatTool(tool: ToolDefinition): ClaudeTool {
    return { name: tool.name, description: tool.description, input_schema: tool.parameters };
  }

  async complete(conversation: Conversation, options: InferenceOptions): Promise<InferenceResponse> {
    const { system, messages } = conversation.renderForProvider('anthropic');
    const body: Record<string, unknown> = {
      model: this.resolveModel(options, DEFAULT_MODEL),
      max_tokens: options.maxTokens,
      temperature: options.temperature,
      messages,
    };
    if (system !== undefined) body['system'] = system;
    if (options.tools.length > 0) {
      body['tools'] = options.tools.map(tool => this.formatTool(tool));
    }

    let res: HttpResponse;
    try {
      res = await httpPost(
        `${this.baseUrl(DEFAULT_ENDPOINT)}/v1/messages`,
        body,
        {
          'x-api-key': this.config.apiKey ?? '',
          'anthropic-version': ANTHROPIC_VERSION,
          ...this.config.headers,
        },
        { timeout: this.config.requestTimeoutMs, signal: options.signal },
      );
    } catch (error) {
      throw mapNetworkError(error, this.provider);
    }

    if (res.status < 200 || res.status >= 300) {
      throw mapHttpError(res.status, res.body, this.provider, res.headers);
    }
    return this.translateResponse(res.body);
  }

  // ============ Private Methods ============

  private translateResponse(raw: unknown): InferenceResponse {
    if (raw === undefined) throw invalidResponse(this.provider, 'response body is not JSON');

    const parsed = ClaudeResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw invalidResponse(this.provider, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const texts: string[] = [];
    const toolCalls: ParsedToolCall[] = [];
    for (const block of parsed.data.content) {
      if (block.type === 'text' && block.text !== undefined) {
        texts.push(block.text);
      } else if (block.type === 'tool_use' && block.name !== undefined) {
        toolCalls.push({ id: block.id, name: block.name, arguments: JSON.stringify(block.input ?? {}) });
      }
    }
    const content = texts.join('');

    return {
      content,
      actions: toProposedActions(content, toolCalls),
      usage: {
        promptTokens: parsed.data.usage.input_tokens,
        completionTokens: parsed.data.usage.output_tokens,
      },
      model: parsed.data.model,
      finishReason: toFinishReason(parsed.data.stop_reason),
    };
  }
}

function toFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'end_turn':
    case 'stop_sequence':
      return 'stop';
    case 'tool_use':
      return 'tool_calls';
    case 'max_tokens':
      return 'length';
    default:
      return 'other';
  }
}
