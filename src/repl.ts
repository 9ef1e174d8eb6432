import readline from 'readline';
import chalk from 'chalk';
import type { TurnDriver } from './agent/turn-driver.js';
import type { ToolRegistry } from './tools/registry.js';
import type { Conversation } from './session/conversation.js';
import type { ContextLoader, AddSummary } from './session/context-loader.js';
import type { SessionState } from './session/state.js';
import type { SessionTracker } from './session/tracker.js';
import type { Reporter } from './ui/reporter.js';
import { errorMessage } from './errors.js';
import { debugLog, debugError } from './utils/debug.js';

const COMMANDS = [
  { name: '/add <path>', desc: 'load a file, or every eligible file in a directory, into the conversation' },
  { name: '/clear', desc: 'clear the conversation and refresh the system prompt' },
  { name: '/status', desc: 'show model, permission mode, conversation size and usage' },
  { name: '/help', desc: 'show this help' },
  { name: '/exit, /quit', desc: 'exit and print the session summary (plain exit and quit work too)' },
];

/** Skipped paths listed after /add before the rest are folded into a count. */
export const SKIPPED_PREVIEW = 10;

type PromptBuilder = () => string;

export interface REPLDeps {
  driver: TurnDriver;
  registry: ToolRegistry;
  conversation: Conversation;
  context: ContextLoader;
  sessionState: SessionState;
  tracker: SessionTracker;
  reporter: Reporter;
  buildPrompt: PromptBuilder;
}

export function formatAddSummary(summary: AddSummary): string[] {
  const lines = [`Added ${summary.added.length} file(s) from ${summary.root}; skipped ${summary.skipped.length}.`];
  if (summary.limitReached) {
    lines.push('File limit reached; remaining files were not loaded.');
  }
  for (const skipped of summary.skipped.slice(0, SKIPPED_PREVIEW)) {
    lines.push(`  skipped: ${skipped}`);
  }
  if (summary.skipped.length > SKIPPED_PREVIEW) {
    lines.push(`  ... and ${summary.skipped.length - SKIPPED_PREVIEW} more`);
  }
  return lines;
}

export class REPL {
  private readonly deps: REPLDeps;
  private rl: readline.Interface | null = null;
  // An approval prompt owns stdin; lines the REPL sees meanwhile are its answers.
  private isPaused = false;

  constructor(deps: REPLDeps) {
    this.deps = deps;
  }

  async start(): Promise<void> {
    console.log(chalk.cyan.bold('deltacode') + chalk.gray(` · ${this.deps.sessionState.getModelName()}`));
    console.log(chalk.gray('Type /help for commands. Ask anything, or /add files to give the model context.\n'));

    this.rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
      prompt: chalk.green('> '),
    });
    const rl = this.rl;
    this.deps.registry.setPromptHooks({
      before: () => {
        this.isPaused = true;
        rl.pause();
      },
      after: () => {
        this.isPaused = false;
        rl.resume();
      },
    });

    return new Promise<void>((resolve) => {
      // Lines arriving while a turn runs queue up behind it.
      let queue = Promise.resolve();

      rl.on('line', (input: string) => {
        if (this.isPaused) {
          debugLog('Ignoring line typed into an approval prompt');
          return;
        }
        queue = queue.then(async () => {
          try {
            const keepGoing = await this.handleInput(input);
            if (keepGoing) {
              rl.prompt();
            } else {
              rl.close();
            }
          } catch (error) {
            debugError('Error in handleInput:', error);
            this.deps.reporter.error(`Input handling error: ${errorMessage(error)}`);
            rl.prompt();
          }
        });
      });

      rl.on('close', () => {
        debugLog('Readline closed');
        this.deps.registry.setPromptHooks(undefined);
        this.printSessionSummary();
        resolve();
      });

      rl.on('SIGINT', () => {
        console.log('');
        rl.close();
      });

      rl.prompt();
    });
  }

  /** Handles one input line. Returns false when the session should end. */
  async handleInput(input: string): Promise<boolean> {
    const trimmed = input.trim();
    if (!trimmed) {
      return true;
    }
    const lower = trimmed.toLowerCase();

    if (lower === 'exit' || lower === 'quit' || lower === '/exit' || lower === '/quit') {
      return false;
    }

    if (lower === '/add' || lower.startsWith('/add ')) {
      await this.addPath(trimmed.slice('/add'.length).trim());
      return true;
    }

    if (trimmed.startsWith('/')) {
      this.handleSlashCommand(lower);
      return true;
    }

    await this.runTurn(trimmed);
    return true;
  }

  private handleSlashCommand(command: string): void {
    const { reporter } = this.deps;
    switch (command) {
      case '/clear':
        this.deps.conversation.reset(this.deps.buildPrompt());
        reporter.info('Conversation cleared; system prompt refreshed.');
        break;
      case '/status':
        this.showStatus();
        break;
      case '/help':
        this.showHelp();
        break;
      default:
        reporter.warn(`Unknown command: ${command}. Type /help for the list.`);
    }
  }

  private async addPath(path: string): Promise<void> {
    const { reporter, context } = this.deps;
    if (!path) {
      reporter.warn('Usage: /add <path>');
      return;
    }
    try {
      const summary = await context.addPath(path);
      const [headline, ...rest] = formatAddSummary(summary);
      if (summary.added.length > 0) {
        reporter.success(headline);
      } else {
        reporter.warn(headline);
      }
      rest.forEach((line) => reporter.info(line));
    } catch (error) {
      reporter.error(`Could not add '${path}': ${errorMessage(error)}`);
    }
  }

  private async runTurn(text: string): Promise<void> {
    const outcome = await this.deps.driver.runTurn(text);
    if (!outcome.ok) {
      this.deps.reporter.error(outcome.error.message);
      this.deps.reporter.info('Use /clear if the conversation looks inconsistent.');
    }
  }

  private showStatus(): void {
    const { sessionState, conversation, tracker, reporter } = this.deps;
    reporter.panel(
      'Status',
      [
        `Model:        ${sessionState.getModelName()}`,
        `Permissions:  ${sessionState.permissionSummary()}`,
        `Conversation: ${conversation.size} message(s)`,
        '',
        tracker.buildSummary(sessionState.getModelName()),
      ].join('\n'),
    );
  }

  private showHelp(): void {
    const width = Math.max(...COMMANDS.map((command) => command.name.length));
    this.deps.reporter.panel(
      'Commands',
      COMMANDS.map((command) => `${command.name.padEnd(width)}  ${command.desc}`).join('\n'),
    );
  }

  private printSessionSummary(): void {
    console.log(`\n${this.deps.tracker.buildSummary(this.deps.sessionState.getModelName())}\n`);
  }
}
