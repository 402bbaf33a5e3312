/**
 * @fileoverview Unit tests for inference providers (fetch is stubbed)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { OpenAIProvider } from './openai.js';
import { ClaudeProvider, ANTHROPIC_VERSION } from './claude.js';
import { TextProtocolProvider, buildTextPrompt, extractToolCalls, stripMarkdownFences } from './text-protocol.js';
import { createProvider, LLMProvider, type InferenceOptions } from './index.js';
import { Conversation } from '../context/conversation.js';
import { ConfigError, InferenceError } from '../types/errors.js';
import type { ToolDefinition } from '../types/loop.types.js';

const lookup: ToolDefinition = {
  name: 'lookup',
  description: 'Look up a term',
  parameters: { type: 'object', properties: { term: { type: 'string' } }, required: ['term'] },
};

const options: InferenceOptions = { model: undefined, temperature: 0.2, maxTokens: 256, tools: [lookup] };

function respond(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(typeof body === 'string' ? body : JSON.stringify(body), { status, headers });
}

function conversation(): Conversation {
  return Conversation.from([
    { role: 'system', content: 'sys' },
    { role: 'user', content: 'q' },
  ]);
}

const fetchMock = vi.fn(async (..._args: Parameters<typeof fetch>): Promise<Response> => respond(500, {}));

function sentRequest(): { url: string; body: Record<string, unknown>; headers: unknown } {
  const [url, init] = fetchMock.mock.calls[0];
  return { url: String(url), body: JSON.parse(String(init?.body)), headers: init?.headers };
}

beforeEach(() => {
  fetchMock.mockReset();
  vi.stubGlobal('fetch', fetchMock);
});

afterEach(() => {
  vi.unstubAllGlobals();
});

describe('OpenAIProvider', () => {
  it('should send chat completions with native tools and parse tool calls', async () => {
    fetchMock.mockResolvedValueOnce(
      respond(200, {
        model: 'gpt-test',
        choices: [
          {
            message: {
              content: null,
              tool_calls: [{ id: 'call_9', type: 'function', function: { name: 'lookup', arguments: '{"term":"x"}' } }],
            },
            finish_reason: 'tool_calls',
          },
        ],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      }),
    );
    const provider = new OpenAIProvider({ apiKey: 'test-secret', endpoint: 'https://llm.test/v1/' });

    const response = await provider.complete(conversation(), options);

    const sent = sentRequest();
    expect(sent.url).toBe('https://llm.test/v1/chat/completions');
    expect(sent.headers).toMatchObject({ Authorization: 'Bearer test-secret' });
    expect(sent.body['tools']).toEqual([
      { type: 'function', function: { name: 'lookup', description: 'Look up a term', parameters: lookup.parameters } },
    ]);
    expect(sent.body['messages']).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q' },
    ]);
    expect(response.actions).toEqual([{ kind: 'ToolCall', id: 'call_9', name: 'lookup', arguments: '{"term":"x"}' }]);
    expect(response.usage).toEqual({ promptTokens: 12, completionTokens: 3 });
    expect(response.finishReason).toBe('tool_calls');
  });

  it('should turn a text reply into one final answer', async () => {
    fetchMock.mockResolvedValueOnce(
      respond(200, { model: 'gpt-test', choices: [{ message: { content: '42' }, finish_reason: 'stop' }] }),
    );

    const response = await new OpenAIProvider({ apiKey: 'test-secret' }).complete(conversation(), {
      ...options,
      tools: [],
    });

    expect(sentRequest().body['tools']).toBeUndefined();
    expect(response.actions).toHaveLength(1);
    expect(response.actions[0]).toMatchObject({ kind: 'FinalAnswer', text: '42' });
    expect(response.usage).toEqual({ promptTokens: 0, completionTokens: 0 });
  });
});

describe('ClaudeProvider', () => {
  it('should send the system prompt at top level and parse tool_use blocks', async () => {
    fetchMock.mockResolvedValueOnce(
      respond(200, {
        model: 'claude-test',
        content: [
          { type: 'text', text: 'Checking.' },
          { type: 'tool_use', id: 'toolu_1', name: 'lookup', input: { term: 'x' } },
        ],
        stop_reason: 'tool_use',
        usage: { input_tokens: 20, output_tokens: 5 },
      }),
    );
    const provider = createProvider({ provider: LLMProvider.CLAUDE, apiKey: 'test-secret', endpoint: 'https://claude.test' });

    const response = await provider.complete(conversation(), options);

    const sent = sentRequest();
    expect(sent.url).toBe('https://claude.test/v1/messages');
    expect(sent.headers).toMatchObject({ 'x-api-key': 'test-secret', 'anthropic-version': ANTHROPIC_VERSION });
    expect(sent.body['system']).toBe('sys');
    expect(sent.body['messages']).toEqual([{ role: 'user', content: [{ type: 'text', text: 'q' }] }]);
    expect(sent.body['tools']).toEqual([{ name: 'lookup', description: 'Look up a term', input_schema: lookup.parameters }]);
    expect(response.content).toBe('Checking.');
    expect(response.actions).toEqual([{ kind: 'ToolCall', id: 'toolu_1', name: 'lookup', arguments: '{"term":"x"}' }]);
    expect(response.usage).toEqual({ promptTokens: 20, completionTokens: 5 });
  });
});

describe('createProvider', () => {
  it('should build the HTTP providers and refuse the text protocol', () => {
    expect(createProvider({ provider: LLMProvider.OPENAI, apiKey: 'test-secret' })).toBeInstanceOf(OpenAIProvider);
    expect(() => createProvider({ provider: LLMProvider.TEXT })).toThrow(ConfigError);
  });
});

describe('error mapping', () => {
  const provider = new ClaudeProvider({ apiKey: 'test-secret' });

  async function failure(): Promise<InferenceError> {
    const error = await provider.complete(conversation(), options).catch((e: unknown) => e);
    if (!(error instanceof InferenceError)) throw new Error('expected an InferenceError');
    return error;
  }

  it('should map 401 to Unauthorized', async () => {
    fetchMock.mockResolvedValueOnce(respond(401, { error: { message: 'bad key' } }));

    const error = await failure();
    expect(error.kind).toBe('Unauthorized');
    expect(error.message).toBe('claude: bad key');
    expect(error.retryable).toBe(false);
  });

  it('should map 429 to RateLimited with Retry-After', async () => {
    fetchMock.mockResolvedValueOnce(respond(429, { error: { message: 'slow down' } }, { 'retry-after': '2' }));

    const error = await failure();
    expect(error.kind).toBe('RateLimited');
    expect(error.retryAfterMs).toBe(2000);
    expect(error.retryable).toBe(true);
  });

  it('should map 503 and network failures to Transient', async () => {
    fetchMock.mockResolvedValueOnce(respond(503, 'unavailable'));
    expect((await failure()).kind).toBe('Transient');

    fetchMock.mockRejectedValueOnce(new TypeError('fetch failed'));
    const network = await failure();
    expect(network.kind).toBe('Transient');
    expect(network.message).toBe('claude: fetch failed');
  });

  it('should map unparseable bodies to InvalidResponse', async () => {
    fetchMock.mockResolvedValueOnce(respond(200, 'not json'));
    expect((await failure()).kind).toBe('InvalidResponse');

    fetchMock.mockResolvedValueOnce(respond(200, { model: 'm', content: 'nope' }));
    expect((await failure()).kind).toBe('InvalidResponse');
  });
});

describe('TextProtocolProvider', () => {
  it('should parse a fenced tool_calls envelope', async () => {
    const complete = vi.fn(async () => ({
      text: '```json\n{"tool_calls": [{"name": "lookup", "arguments": {"term": "x"}}]}\n```',
      promptTokens: 30,
      completionTokens: 10,
    }));
    const provider = new TextProtocolProvider(complete);

    const response = await provider.complete(conversation(), options);

    expect(response.content).toBe('');
    expect(response.finishReason).toBe('tool_calls');
    expect(response.actions).toHaveLength(1);
    expect(response.actions[0]).toMatchObject({ kind: 'ToolCall', name: 'lookup', arguments: '{"term":"x"}' });
    expect(response.usage).toEqual({ promptTokens: 30, completionTokens: 10 });
  });

  it('should treat any other reply as the final answer', async () => {
    const provider = new TextProtocolProvider(async () => ({ text: 'The answer is 42.' }), { defaultModel: 'local' });

    const response = await provider.complete(conversation(), options);

    expect(response.actions[0]).toMatchObject({ kind: 'FinalAnswer', text: 'The answer is 42.' });
    expect(response.model).toBe('local');
  });

  it('should wrap completion failures as Transient', async () => {
    const provider = new TextProtocolProvider(async () => {
      throw new Error('model offline');
    });

    await expect(provider.complete(conversation(), options)).rejects.toMatchObject({ kind: 'Transient' });
  });

  it('should render the conversation as role sections with the tool list', () => {
    const convo = Conversation.from([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'q' },
      { role: 'assistant', content: '', toolCalls: [{ id: 'c1', name: 'lookup', arguments: '{"term":"x"}' }] },
      { role: 'tool', content: 'found', toolCallId: 'c1', toolName: 'lookup' },
    ]);

    const prompt = buildTextPrompt(convo, [lookup]);

    expect(prompt.startsWith('### System\nsys\n\n### Available Tools')).toBe(true);
    expect(prompt).toContain('- lookup: Look up a term');
    expect(prompt).toContain('### Assistant\n```json\n{"tool_calls":[{"name":"lookup","arguments":{"term":"x"}}]}\n```');
    expect(prompt).toContain('### Tool Result (lookup)\nfound');
    expect(prompt.endsWith('### Assistant\n')).toBe(true);
  });

  it('should ignore JSON without a tool_calls array', () => {
    expect(extractToolCalls('{"answer": 42}')).toEqual([]);
    expect(extractToolCalls('{"tool_calls": [{"name": "a"}]}')).toEqual([{ name: 'a', arguments: '{}' }]);
    expect(stripMarkdownFences('```\n{}\n```')).toBe('{}');
  });
});
