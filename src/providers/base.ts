import type { Message } from '../types.js';
import type { ChatTool } from '../tools/types.js';

/** One fragment of a tool call; `index` names the call slot it belongs to. */
export interface ToolCallDelta {
  index: number;
  id?: string;
  name?: string;
  arguments?: string;
}

/** An incremental event of a streamed chat completion. */
export interface StreamDelta {
  reasoning?: string;
  content?: string;
  toolCalls?: ToolCallDelta[];
}

export interface ChatProvider {
  readonly model: string;
  streamChat(messages: readonly Readonly<Message>[], tools: ChatTool[]): AsyncIterable<StreamDelta>;
}
