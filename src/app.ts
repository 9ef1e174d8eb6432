import type { ProjectConfig } from './types.js';
import type { ChatProvider } from './providers/base.js';
import type { Reporter } from './ui/reporter.js';
import { ConsoleReporter } from './ui/reporter.js';
import { FileStore } from './file-store.js';
import { Conversation } from './session/conversation.js';
import { ContextLoader } from './session/context-loader.js';
import { SessionState, type PermissionMode } from './session/state.js';
import { SessionTracker } from './session/tracker.js';
import { SnippetEditor } from './tools/snippet-editor.js';
import { ToolRegistry } from './tools/registry.js';
import { toolDefinitions } from './tools/definitions.js';
import { TurnDriver } from './agent/turn-driver.js';
import { buildSystemPrompt } from './agent/system-prompt.js';
import { REPL } from './repl.js';

export interface AppOptions {
  model: string;
  projectConfig: ProjectConfig;
  /** Builds the provider once the tracker exists so API time is recorded. */
  createProvider: (tracker: SessionTracker) => ChatProvider;
  permissionMode?: PermissionMode;
  /** False when nobody can answer an approval prompt. */
  interactive: boolean;
  cwd?: string;
  reporter?: Reporter;
}

export interface App {
  sessionState: SessionState;
  tracker: SessionTracker;
  conversation: Conversation;
  files: FileStore;
  context: ContextLoader;
  registry: ToolRegistry;
  driver: TurnDriver;
  repl: REPL;
  buildPrompt: () => string;
}

export function createApp(options: AppOptions): App {
  const reporter = options.reporter ?? new ConsoleReporter();
  const permissionMode = options.permissionMode ?? options.projectConfig.permissionMode;
  const sessionState = new SessionState(options.model, permissionMode);
  const tracker = new SessionTracker();

  const files = new FileStore({ cwd: options.cwd, reporter });
  const editor = new SnippetEditor(files, reporter);
  // Replaced below once the registry can list itself in the prompt.
  const conversation = new Conversation('');
  const context = new ContextLoader(conversation, files, reporter);

  const registry = new ToolRegistry(
    toolDefinitions,
    { files, editor, context, tracker, reporter },
    { sessionState, interactive: options.interactive },
  );

  const buildPrompt = () => buildSystemPrompt(registry, options.projectConfig, sessionState);
  conversation.replaceSystemPrompt(buildPrompt());

  const driver = new TurnDriver(options.createProvider(tracker), conversation, registry, { reporter, tracker });
  const repl = new REPL({ driver, registry, conversation, context, sessionState, tracker, reporter, buildPrompt });

  return { sessionState, tracker, conversation, files, context, registry, driver, repl, buildPrompt };
}
