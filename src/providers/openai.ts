import OpenAI from 'openai';
import type {
  ChatCompletionChunk,
  ChatCompletionCreateParamsStreaming,
  ChatCompletionMessageParam,
} from 'openai/resources/chat/completions';
import type { Message } from '../types.js';
import type { ChatTool } from '../tools/types.js';
import type { ChatProvider, StreamDelta, ToolCallDelta } from './base.js';
import type { SessionTracker } from '../session/tracker.js';
import { TurnError, errorMessage } from '../errors.js';
import { debugLog } from '../utils/debug.js';

export interface OpenAIProviderConfig {
  apiKey: string;
  model: string;
  baseUrl: string;
  maxTokens?: number;
  temperature?: number;
  timeoutMs?: number;
}

/**
 * The SDK appends /chat/completions itself; strip it (and trailing slashes)
 * if the configured URL already carries it.
 */
export function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl
    .trim()
    .replace(/\/chat\/completions\/?$/, '')
    .replace(/\/+$/, '');
}

export function toChatCompletionMessages(messages: readonly Readonly<Message>[]): ChatCompletionMessageParam[] {
  return messages.map((message): ChatCompletionMessageParam => {
    switch (message.role) {
      case 'system':
        return { role: 'system', content: message.content };
      case 'user':
        return { role: 'user', content: message.content };
      case 'tool':
        return { role: 'tool', tool_call_id: message.toolCallId, content: message.content };
      case 'assistant':
        if (message.toolCalls?.length) {
          return {
            role: 'assistant',
            content: null,
            tool_calls: message.toolCalls.map((call) => ({
              id: call.id,
              type: 'function',
              function: { name: call.functionName, arguments: call.argumentsJson },
            })),
          };
        }
        return { role: 'assistant', content: message.content ?? '' };
    }
  });
}

/** Reasoning models put their chain of thought in a field the SDK does not type. */
function readReasoning(delta: object): string | undefined {
  if ('reasoning_content' in delta && typeof delta.reasoning_content === 'string') {
    return delta.reasoning_content;
  }
  if ('reasoning' in delta && typeof delta.reasoning === 'string') {
    return delta.reasoning;
  }
  return undefined;
}

export function toStreamDelta(chunk: ChatCompletionChunk): StreamDelta | null {
  const delta = chunk.choices[0]?.delta;
  if (!delta) return null;

  const result: StreamDelta = {};
  const reasoning = readReasoning(delta);
  if (reasoning) result.reasoning = reasoning;
  if (delta.content) result.content = delta.content;
  if (delta.tool_calls?.length) {
    result.toolCalls = delta.tool_calls.map((call): ToolCallDelta => {
      const fragment: ToolCallDelta = { index: call.index };
      if (call.id) fragment.id = call.id;
      if (call.function?.name) fragment.name = call.function.name;
      if (call.function?.arguments) fragment.arguments = call.function.arguments;
      return fragment;
    });
  }
  return result.reasoning || result.content || result.toolCalls ? result : null;
}

export function describeApiError(error: unknown, baseUrl: string, model: string): string {
  if (error instanceof OpenAI.APIError) {
    // The SDK already prefixes the status code.
    let message = error.message;
    if (error.status === 404) {
      message += `. Diagnostic: Base URL=${baseUrl}, Model=${model}, Endpoint should be ${baseUrl}/chat/completions`;
    }
    return message;
  }
  return errorMessage(error);
}

/** The part of the SDK client the provider calls. An `OpenAI` instance satisfies it. */
export interface CompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsStreaming): Promise<AsyncIterable<ChatCompletionChunk>>;
    };
  };
}

/** Streams chat completions from any OpenAI-compatible endpoint. */
export class OpenAIChatProvider implements ChatProvider {
  private readonly client: CompletionsClient;
  private readonly config: OpenAIProviderConfig;
  private readonly baseUrl: string;
  private readonly tracker?: SessionTracker;

  constructor(config: OpenAIProviderConfig, tracker?: SessionTracker, client?: CompletionsClient) {
    this.config = config;
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.tracker = tracker;
    this.client =
      client ??
      new OpenAI({
        apiKey: config.apiKey,
        baseURL: this.baseUrl,
        timeout: config.timeoutMs ?? 360000,
      });
  }

  get model(): string {
    return this.config.model;
  }

  async *streamChat(messages: readonly Readonly<Message>[], tools: ChatTool[]): AsyncGenerator<StreamDelta> {
    const request: ChatCompletionCreateParamsStreaming = {
      model: this.config.model,
      messages: toChatCompletionMessages(messages),
      stream: true,
    };
    if (tools.length > 0) {
      request.tools = tools;
      request.tool_choice = 'auto';
    }
    if (this.config.maxTokens) {
      request.max_tokens = this.config.maxTokens;
    }
    if (this.config.temperature !== undefined) {
      request.temperature = this.config.temperature;
    }

    debugLog('[openai-provider] POST', `${this.baseUrl}/chat/completions`, 'model:', this.config.model, 'messages:', messages.length);
    const started = Date.now();
    try {
      const stream = await this.client.chat.completions.create(request);
      for await (const chunk of stream) {
        const delta = toStreamDelta(chunk);
        if (delta) yield delta;
      }
    } catch (error) {
      throw new TurnError(`Model API error: ${describeApiError(error, this.baseUrl, this.config.model)}`, {
        cause: error,
      });
    } finally {
      this.tracker?.recordApiCall(Date.now() - started);
    }
  }
}
