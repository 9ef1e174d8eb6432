import type { ChatProvider, StreamDelta, ToolCallDelta } from '../providers/base.js';
import type { Conversation } from '../session/conversation.js';
import type { SessionTracker } from '../session/tracker.js';
import type { ToolRegistry } from '../tools/registry.js';
import type { Reporter, Spinner } from '../ui/reporter.js';
import type { ToolCall } from '../types.js';
import { ToolCallAccumulator } from './accumulator.js';
import { TurnError, errorMessage } from '../errors.js';
import { debugLog, debugError } from '../utils/debug.js';

export type TurnPhase = 'idle' | 'streaming-first' | 'dispatching' | 'streaming-second';

export type TurnEvent =
  | { kind: 'reasoning'; text: string }
  | { kind: 'content'; text: string }
  | { kind: 'tool-call'; delta: ToolCallDelta };

export type TurnOutcome =
  | { ok: true; content: string; toolCalls: ToolCall[] }
  | { ok: false; error: TurnError };

interface StreamedTurn {
  content: string;
  toolCalls: ToolCall[];
}

export interface TurnDriverOptions {
  reporter?: Reporter;
  tracker?: SessionTracker;
}

export function classifyDelta(delta: StreamDelta): TurnEvent[] {
  const events: TurnEvent[] = [];
  if (delta.reasoning) events.push({ kind: 'reasoning', text: delta.reasoning });
  if (delta.content) events.push({ kind: 'content', text: delta.content });
  for (const fragment of delta.toolCalls ?? []) {
    events.push({ kind: 'tool-call', delta: fragment });
  }
  return events;
}

/**
 * Runs one user turn: stream the model's reply, execute any tool calls it
 * asked for in order, then stream one follow-up reply over the results.
 * Tool calls requested by the follow-up are not executed.
 */
export class TurnDriver {
  private readonly provider: ChatProvider;
  private readonly conversation: Conversation;
  private readonly tools: ToolRegistry;
  private readonly reporter?: Reporter;
  private readonly tracker?: SessionTracker;
  private phase: TurnPhase = 'idle';

  constructor(
    provider: ChatProvider,
    conversation: Conversation,
    tools: ToolRegistry,
    options?: TurnDriverOptions,
  ) {
    this.provider = provider;
    this.conversation = conversation;
    this.tools = tools;
    this.reporter = options?.reporter;
    this.tracker = options?.tracker;
  }

  getPhase(): TurnPhase {
    return this.phase;
  }

  async runTurn(userText: string): Promise<TurnOutcome> {
    if (this.phase !== 'idle') {
      return { ok: false, error: new TurnError(`A turn is already in progress (${this.phase})`) };
    }

    this.conversation.appendUser(userText);
    const trimmed = this.conversation.trim();
    if (trimmed > 0) {
      debugLog('Trimmed', trimmed, 'messages from the conversation');
    }

    try {
      this.phase = 'streaming-first';
      const first = await this.streamTurn('Connecting to model...');

      if (first.toolCalls.length === 0) {
        this.conversation.appendAssistant(first.content || null);
        this.tracker?.recordTurn(true);
        return { ok: true, content: first.content, toolCalls: [] };
      }

      this.conversation.appendAssistant(null, first.toolCalls);
      this.phase = 'dispatching';
      await this.dispatch(first.toolCalls);

      this.phase = 'streaming-second';
      const second = await this.streamTurn('Processing results...');
      if (second.toolCalls.length > 0) {
        debugLog(
          'Follow-up reply requested tools that will not run:',
          second.toolCalls.map((call) => call.functionName).join(', '),
        );
      }
      this.conversation.appendAssistant(second.content);
      this.tracker?.recordTurn(true);
      return { ok: true, content: second.content, toolCalls: first.toolCalls };
    } catch (error) {
      debugError('Turn failed:', error);
      this.tracker?.recordTurn(false);
      const turnError =
        error instanceof TurnError ? error : new TurnError(`Turn failed: ${errorMessage(error)}`, { cause: error });
      return { ok: false, error: turnError };
    } finally {
      this.phase = 'idle';
    }
  }

  private async streamTurn(label: string): Promise<StreamedTurn> {
    const accumulator = new ToolCallAccumulator();
    let content = '';
    let spinner: Spinner | undefined = this.reporter?.spinner(label);
    const stopSpinner = () => {
      spinner?.stop();
      spinner = undefined;
    };

    try {
      const stream = this.provider.streamChat(this.conversation.snapshot(), this.tools.toChatTools());
      for await (const delta of stream) {
        for (const event of classifyDelta(delta)) {
          switch (event.kind) {
            case 'reasoning':
              stopSpinner();
              this.reporter?.reasoning(event.text);
              break;
            case 'content':
              stopSpinner();
              content += event.text;
              this.reporter?.stream(event.text);
              break;
            case 'tool-call':
              accumulator.add(event.delta);
              spinner?.update(`Receiving ${accumulator.slotCount} tool call(s)...`);
              break;
          }
        }
      }
    } catch (error) {
      if (error instanceof TurnError) throw error;
      throw new TurnError(`Model stream failed: ${errorMessage(error)}`, { cause: error });
    } finally {
      stopSpinner();
      this.reporter?.endStream();
    }

    return { content, toolCalls: accumulator.finalize() };
  }

  private async dispatch(calls: ToolCall[]): Promise<void> {
    this.reporter?.info(`Executing ${calls.length} function call(s)...`);
    for (const call of calls) {
      this.reporter?.info(`→ ${call.functionName}`);
      let result: string;
      try {
        result = await this.tools.execute(call);
      } catch (error) {
        result = `Error: ${errorMessage(error)}`;
      }
      this.conversation.appendToolResult(call.id, result);
    }
  }
}
