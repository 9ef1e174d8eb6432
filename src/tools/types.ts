import type { FileStore } from '../file-store.js';
import type { ContextLoader } from '../session/context-loader.js';
import type { SessionTracker } from '../session/tracker.js';
import type { Reporter } from '../ui/reporter.js';
import type { SnippetEditor } from './snippet-editor.js';

export type JsonSchema =
  | { type: 'string'; description?: string }
  | { type: 'array'; items: JsonSchema; description?: string }
  | {
      type: 'object';
      properties: Record<string, JsonSchema>;
      required: string[];
      additionalProperties?: boolean;
      description?: string;
    };

export type ToolParameters = {
  type: 'object';
  properties: Record<string, JsonSchema>;
  required: string[];
  additionalProperties: false;
};

/** Function declaration in the shape chat-completion APIs take. */
export type ChatTool = {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: ToolParameters;
  };
};

export type ToolResult = { ok: true; output: string } | { ok: false; error: string };

export interface ToolExecuteContext {
  files: FileStore;
  editor: SnippetEditor;
  context: ContextLoader;
  tracker?: SessionTracker;
  reporter?: Reporter;
}

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameters;
  /** Writes to disk; subject to approval in interactive mode. */
  mutates: boolean;
  execute: (args: Record<string, unknown>, ctx: ToolExecuteContext) => Promise<ToolResult>;
}
