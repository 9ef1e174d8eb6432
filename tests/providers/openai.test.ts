import { describe, it, expect, vi } from 'vitest';
import OpenAI from 'openai';
import type { ChatCompletionChunk, ChatCompletionCreateParamsStreaming } from 'openai/resources/chat/completions';
import {
  OpenAIChatProvider,
  describeApiError,
  normalizeBaseUrl,
  toChatCompletionMessages,
  toStreamDelta,
  type CompletionsClient,
} from '../../src/providers/openai.js';
import { TurnError } from '../../src/errors.js';
import { SessionTracker } from '../../src/session/tracker.js';
import type { StreamDelta } from '../../src/providers/base.js';
import type { ChatTool } from '../../src/tools/types.js';

function chunk(delta: ChatCompletionChunk.Choice.Delta): ChatCompletionChunk {
  return {
    id: 'chunk-1',
    object: 'chat.completion.chunk',
    created: 0,
    model: 'test-model',
    choices: [{ index: 0, delta, finish_reason: null }],
  };
}

async function* streamOf(chunks: ChatCompletionChunk[]): AsyncGenerator<ChatCompletionChunk> {
  for (const item of chunks) yield item;
}

function fakeClient(chunks: ChatCompletionChunk[] | Error) {
  const create = vi.fn(async (_body: ChatCompletionCreateParamsStreaming): Promise<AsyncIterable<ChatCompletionChunk>> => {
    if (chunks instanceof Error) throw chunks;
    return streamOf(chunks);
  });
  const client: CompletionsClient = { chat: { completions: { create } } };
  return { client, create };
}

async function collect(stream: AsyncIterable<StreamDelta>): Promise<StreamDelta[]> {
  const deltas: StreamDelta[] = [];
  for await (const delta of stream) deltas.push(delta);
  return deltas;
}

const config = { apiKey: 'test-secret', model: 'deepseek-chat', baseUrl: 'https://api.example.test/v1' };

const readTool: ChatTool = {
  type: 'function',
  function: {
    name: 'read_file',
    description: 'Read a file',
    parameters: {
      type: 'object',
      properties: { file_path: { type: 'string' } },
      required: ['file_path'],
      additionalProperties: false,
    },
  },
};

describe('normalizeBaseUrl', () => {
  it('strips the completions path and trailing slashes', () => {
    expect(normalizeBaseUrl('https://api.example.test/v1/chat/completions')).toBe('https://api.example.test/v1');
    expect(normalizeBaseUrl('https://api.example.test/v1/chat/completions/')).toBe('https://api.example.test/v1');
    expect(normalizeBaseUrl(' https://api.example.test/v1// ')).toBe('https://api.example.test/v1');
    expect(normalizeBaseUrl('https://api.example.test/v1')).toBe('https://api.example.test/v1');
  });
});

describe('toChatCompletionMessages', () => {
  it('maps every role to SDK params', () => {
    expect(
      toChatCompletionMessages([
        { role: 'system', content: 'sys' },
        { role: 'user', content: 'hi' },
        {
          role: 'assistant',
          content: null,
          toolCalls: [{ id: 'call_1', functionName: 'read_file', argumentsJson: '{"file_path":"a"}' }],
        },
        { role: 'tool', toolCallId: 'call_1', content: 'A' },
        { role: 'assistant', content: null },
      ]),
    ).toEqual([
      { role: 'system', content: 'sys' },
      { role: 'user', content: 'hi' },
      {
        role: 'assistant',
        content: null,
        tool_calls: [{ id: 'call_1', type: 'function', function: { name: 'read_file', arguments: '{"file_path":"a"}' } }],
      },
      { role: 'tool', tool_call_id: 'call_1', content: 'A' },
      { role: 'assistant', content: '' },
    ]);
  });
});

describe('toStreamDelta', () => {
  it('maps content and tool call fragments', () => {
    expect(toStreamDelta(chunk({ content: 'Hel' }))).toEqual({ content: 'Hel' });
    expect(
      toStreamDelta(
        chunk({ tool_calls: [{ index: 0, id: 'call_1', type: 'function', function: { name: 'read_file', arguments: '' } }] }),
      ),
    ).toEqual({ toolCalls: [{ index: 0, id: 'call_1', name: 'read_file' }] });
    expect(toStreamDelta(chunk({ tool_calls: [{ index: 0, function: { arguments: '{"a"' } }] }))).toEqual({
      toolCalls: [{ index: 0, arguments: '{"a"' }],
    });
  });

  it('reads the reasoning_content extension', () => {
    const delta = { content: null, reasoning_content: 'thinking...' };
    expect(toStreamDelta(chunk(delta))).toEqual({ reasoning: 'thinking...' });
  });

  it('returns null for empty deltas and choiceless chunks', () => {
    expect(toStreamDelta(chunk({ role: 'assistant', content: '' }))).toBeNull();
    expect(toStreamDelta({ ...chunk({}), choices: [] })).toBeNull();
  });
});

describe('describeApiError', () => {
  it('adds a diagnostic for 404s', () => {
    const error = new OpenAI.NotFoundError(404, { message: 'Not Found' }, undefined, undefined);
    expect(describeApiError(error, 'https://api.example.test/v1', 'm')).toBe(
      '404 Not Found. Diagnostic: Base URL=https://api.example.test/v1, Model=m, ' +
        'Endpoint should be https://api.example.test/v1/chat/completions',
    );
  });

  it('falls back to the error message', () => {
    expect(describeApiError(new Error('socket closed'), 'u', 'm')).toBe('socket closed');
  });
});

describe('OpenAIChatProvider', () => {
  it('streams deltas and sends tools with auto choice', async () => {
    const { client, create } = fakeClient([chunk({ role: 'assistant' }), chunk({ content: 'Hi' }), chunk({ content: '!' })]);
    const tracker = new SessionTracker();
    const provider = new OpenAIChatProvider({ ...config, maxTokens: 1024, temperature: 0.2 }, tracker, client);

    const deltas = await collect(provider.streamChat([{ role: 'user', content: 'hello' }], [readTool]));

    expect(deltas).toEqual([{ content: 'Hi' }, { content: '!' }]);
    expect(create).toHaveBeenCalledWith({
      model: 'deepseek-chat',
      messages: [{ role: 'user', content: 'hello' }],
      stream: true,
      tools: [readTool],
      tool_choice: 'auto',
      max_tokens: 1024,
      temperature: 0.2,
    });
    expect(tracker.getApiCalls()).toBe(1);
    expect(provider.model).toBe('deepseek-chat');
  });

  it('omits tools when none are given', async () => {
    const { client, create } = fakeClient([]);
    const provider = new OpenAIChatProvider(config, undefined, client);
    await collect(provider.streamChat([{ role: 'user', content: 'hello' }], []));
    expect(create).toHaveBeenCalledWith({
      model: 'deepseek-chat',
      messages: [{ role: 'user', content: 'hello' }],
      stream: true,
    });
  });

  it('wraps failures in TurnError and still records the call', async () => {
    const { client } = fakeClient(new Error('connect ECONNREFUSED'));
    const tracker = new SessionTracker();
    const provider = new OpenAIChatProvider(config, tracker, client);

    const attempt = collect(provider.streamChat([{ role: 'user', content: 'hello' }], []));
    await expect(attempt).rejects.toThrow(TurnError);
    await expect(collect(provider.streamChat([], []))).rejects.toThrow('Model API error: connect ECONNREFUSED');
    expect(tracker.getApiCalls()).toBe(2);
  });
});
