import { mkdtemp, rm } from 'fs/promises';
import { join } from 'path';
import { tmpdir } from 'os';
import { FileStore } from '../../src/file-store.js';
import { Conversation } from '../../src/session/conversation.js';
import { ContextLoader } from '../../src/session/context-loader.js';
import { SessionTracker } from '../../src/session/tracker.js';
import { SnippetEditor } from '../../src/tools/snippet-editor.js';
import { ToolRegistry } from '../../src/tools/registry.js';
import { toolDefinitions } from '../../src/tools/definitions.js';
import type { ToolExecuteContext } from '../../src/tools/types.js';
import { SilentReporter } from '../../src/ui/reporter.js';
import type { SessionState } from '../../src/session/state.js';

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'deltacode-test-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export interface Workspace {
  dir: string;
  reporter: SilentReporter;
  files: FileStore;
  conversation: Conversation;
  context: ContextLoader;
  tracker: SessionTracker;
  ctx: ToolExecuteContext;
  registry: ToolRegistry;
}

export function makeWorkspace(
  dir: string,
  options: { sessionState?: SessionState; interactive?: boolean } = {},
): Workspace {
  const reporter = new SilentReporter();
  const files = new FileStore({ cwd: dir, reporter });
  const conversation = new Conversation('You are a test assistant.');
  const context = new ContextLoader(conversation, files, reporter);
  const tracker = new SessionTracker();
  const editor = new SnippetEditor(files, reporter);
  const ctx: ToolExecuteContext = { files, editor, context, tracker, reporter };
  const registry = new ToolRegistry(toolDefinitions, ctx, {
    sessionState: options.sessionState,
    interactive: options.interactive ?? false,
  });
  return { dir, reporter, files, conversation, context, tracker, ctx, registry };
}
