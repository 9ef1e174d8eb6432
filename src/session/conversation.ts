import type { AssistantMessage, Message, SystemMessage, ToolCall } from '../types.js';
import { ConversationInvariantError } from '../errors.js';

/** Conversations at or under this many messages are never trimmed. */
export const TRIM_THRESHOLD = 20;
/** Non-system messages kept by a trim. */
export const TRIM_KEEP_RECENT = 15;

export function fileContentMarker(absolutePath: string): string {
  return `Content of file '${absolutePath}'`;
}

export function fileContentMessage(absolutePath: string, content: string): string {
  return `${fileContentMarker(absolutePath)}:\n\n${content}`;
}

/**
 * Ordered message log sent to the model on every request.
 *
 * The first message is the system prompt. Tool messages must answer an
 * outstanding call of the latest assistant message, and follow it with
 * nothing in between: system messages appended while calls are outstanding
 * are held back until the last response arrives.
 */
export class Conversation {
  private messages: Message[];
  private outstanding = new Set<string>();
  private deferred: SystemMessage[] = [];

  constructor(systemPrompt: string) {
    this.messages = [{ role: 'system', content: systemPrompt }];
  }

  get size(): number {
    return this.messages.length;
  }

  append(message: Message): void {
    switch (message.role) {
      case 'system':
        if (this.outstanding.size > 0) {
          this.deferred.push(message);
        } else {
          this.messages.push(message);
        }
        return;
      case 'user':
        this.assertNoOutstanding('user message');
        this.messages.push(message);
        return;
      case 'assistant':
        this.assertNoOutstanding('assistant message');
        this.messages.push(this.checkAssistant(message));
        return;
      case 'tool':
        if (!this.outstanding.has(message.toolCallId)) {
          throw new ConversationInvariantError(
            `Tool response ${message.toolCallId} does not answer a pending call of the latest assistant message`,
          );
        }
        this.messages.push(message);
        this.outstanding.delete(message.toolCallId);
        if (this.outstanding.size === 0 && this.deferred.length > 0) {
          this.messages.push(...this.deferred);
          this.deferred = [];
        }
        return;
    }
  }

  appendUser(content: string): void {
    this.append({ role: 'user', content });
  }

  appendSystem(content: string): void {
    this.append({ role: 'system', content });
  }

  appendAssistant(content: string | null, toolCalls?: ToolCall[]): void {
    this.append(toolCalls?.length ? { role: 'assistant', content, toolCalls } : { role: 'assistant', content });
  }

  appendToolResult(toolCallId: string, content: string): void {
    this.append({ role: 'tool', toolCallId, content });
  }

  pendingToolCallIds(): string[] {
    return Array.from(this.outstanding);
  }

  /** True when some message (sent or held back) carries the file's content marker. */
  hasFileContent(absolutePath: string): boolean {
    const marker = fileContentMarker(absolutePath);
    return [...this.messages, ...this.deferred].some(
      (message) => typeof message.content === 'string' && message.content.includes(marker),
    );
  }

  /**
   * Keep every system message plus the latest non-system messages. A tool
   * message whose assistant message fell off the front is dropped too.
   * Returns the number of messages removed.
   */
  trim(): number {
    if (this.messages.length <= TRIM_THRESHOLD || this.outstanding.size > 0) {
      return 0;
    }

    const system = this.messages.filter((message) => message.role === 'system');
    const rest = this.messages.filter((message) => message.role !== 'system');
    const tail = rest.slice(-TRIM_KEEP_RECENT);
    while (tail.length > 0 && tail[0].role === 'tool') {
      tail.shift();
    }

    const before = this.messages.length;
    this.messages = [...system, ...tail];
    return before - this.messages.length;
  }

  snapshot(): readonly Readonly<Message>[] {
    return [...this.messages];
  }

  reset(systemPrompt: string): void {
    this.messages = [{ role: 'system', content: systemPrompt }];
    this.outstanding.clear();
    this.deferred = [];
  }

  replaceSystemPrompt(systemPrompt: string): void {
    this.messages[0] = { role: 'system', content: systemPrompt };
  }

  private assertNoOutstanding(what: string): void {
    if (this.outstanding.size > 0) {
      throw new ConversationInvariantError(
        `Cannot append ${what} while tool calls are unanswered: ${this.pendingToolCallIds().join(', ')}`,
      );
    }
  }

  private checkAssistant(message: AssistantMessage): AssistantMessage {
    const calls = message.toolCalls ?? [];
    if (calls.length === 0) {
      return { role: 'assistant', content: message.content };
    }
    if (message.content !== null) {
      throw new ConversationInvariantError('An assistant message with tool calls must have null content');
    }
    const ids = new Set<string>();
    for (const call of calls) {
      if (!call.id || ids.has(call.id)) {
        throw new ConversationInvariantError(`Tool call ids must be unique and non-empty (got "${call.id}")`);
      }
      ids.add(call.id);
    }
    this.outstanding = ids;
    return { role: 'assistant', content: null, toolCalls: calls.map((call) => ({ ...call })) };
  }
}
