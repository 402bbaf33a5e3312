/**
 * @fileoverview OpenAI Provider
 *
 * Chat completions with native function calling. Also works against Azure
 * OpenAI and other OpenAI-compatible endpoints through `endpoint`.
 *
 * @see https://platform.openai.com/docs/guides/function-calling
 */

import { z } from 'zod';
import {
  BaseProvider,
  LLMProvider,
  toProposedActions,
  type FinishReason,
  type InferenceOptions,
  type InferenceResponse,
  type ProviderConfig,
} from './base.js';
import { httpPost, type HttpResponse } from './http.js';
import { invalidResponse, mapHttpError, mapNetworkError } from './error-mapping.js';
import type { Conversation } from '../context/conversation.js';
import type { ToolDefinition } from '../types/loop.types.js';

const DEFAULT_ENDPOINT = 'https://api.openai.com/v1';
const DEFAULT_MODEL = 'gpt-4o-mini';

/**
 * OpenAI Tool format.
 */
export interface OpenAITool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Readonly<Record<string, unknown>>;
  };
}

const OpenAIResponseSchema = z.object({
  model: z.string(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                function: z.object({ name: z.string(), arguments: z.string() }),
              }),
            )
            .nullish(),
        }),
        finish_reason: z.string().nullish(),
      }),
    )
    .min(1),
  usage: z.object({ prompt_tokens: z.number(), completion_tokens: z.number() }).nullish(),
});

export type OpenAIResponse = z.infer<typeof OpenAIResponseSchema>;

/**
 * OpenAI Function Calling Provider.
 *
 * @example
 * ```typescript
 * const provider = new OpenAIProvider({ apiKey: process.env.OPENAI_API_KEY });
 * const response = await provider.complete(conversation, {
 *   model: undefined, temperature: 0.3, maxTokens: 1024, tools: [],
 * });
 * ```
 */
export class OpenAIProvider extends BaseProvider {
  constructor(config?: Partial<ProviderConfig>) {
    super({ ...config, provider: LLMProvider.OPENAI });
  }


  formatTool(tool: ToolDefinition): OpenAITool {
    return {
      type: 'function',
      function: { name: tool.name, description: tool.description, parameters: tool.parameters },
    };
  }

  async complete(conversation: Conversation, options: InferenceOptions): Promise<InferenceResponse> {
    const body: Record<string, unknown> = {
      model: this.resolveModel(options, DEFAULT_MODEL),
      messages: conversation.renderForProvider('openai'),
      temperature: options.temperature,
      max_tokens: options.maxTokens,
    };
    if (options.tools.length > 0) {
      body['tools'] = options.tools.map(tool => this.formatTool(tool));
    }

    let res: HttpResponse;
    try {
      res = await httpPost(
        `${this.baseUrl(DEFAULT_ENDPOINT)}/chat/completions`,
        body,
        { Authorization: `Bearer ${this.config.apiKey ?? ''}`, ...this.config.headers },
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

    const parsed = OpenAIResponseSchema.safeParse(raw);
    if (!parsed.success) {
      throw invalidResponse(this.provider, `unexpected response shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    const choice = parsed.data.choices[0];
    const content = choice.message.content ?? '';
    const toolCalls = (choice.message.tool_calls ?? []).map(call => ({
      id: call.id,
      name: call.function.name,
      arguments: call.function.arguments,
    }));

    return {
      content,
      actions: toProposedActions(content, toolCalls),
      usage: {
        promptTokens: parsed.data.usage?.prompt_tokens ?? 0,
        completionTokens: parsed.data.usage?.completion_tokens ?? 0,
      },
      model: parsed.data.model,
      finishReason: toFinishReason(choice.finish_reason),
    };
  }
}

function toFinishReason(reason: string | null | undefined): FinishReason {
  switch (reason) {
    case 'stop':
      return 'stop';
    case 'tool_calls':
    case 'function_call':
      return 'tool_calls';
    case 'length':
      return 'length';
    default:
      return 'other';
  }
}
