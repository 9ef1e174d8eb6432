import chalk from 'chalk';
import ora from 'ora';
import { diffLines } from 'diff';
import { Colors, type ColorRole } from './colors.js';

export interface Spinner {
  update(text: string): void;
  succeed(text?: string): void;
  fail(text?: string): void;
  stop(): void;
}

/**
 * Everything user-visible goes through a Reporter so the core can run
 * against a recording stand-in in tests.
 */
export interface Reporter {
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Answer text from the model, written without a trailing newline. */
  stream(chunk: string): void;
  /** Reasoning text from the model; shown, never stored. */
  reasoning(chunk: string): void;
  /** Closes any open answer/reasoning block. */
  endStream(): void;
  panel(title: string, body: string): void;
  diff(path: string, before: string, after: string): void;
  spinner(text: string): Spinner;
}

export function formatLineDiff(before: string, after: string): string[] {
  return diffLines(before, after).flatMap((part) => {
    const prefix = part.added ? '+' : part.removed ? '-' : ' ';
    return part.value
      .replace(/\r/g, '')
      .split('\n')
      .filter((line, index, arr) => !(line === '' && index === arr.length - 1))
      .map((line) => `${prefix}${line}`);
  });
}

function paint(role: ColorRole, text: string): string {
  return chalk[Colors[role]](text);
}

type StreamMode = 'none' | 'reasoning' | 'answer';

export class ConsoleReporter implements Reporter {
  private mode: StreamMode = 'none';
  private readonly out: NodeJS.WriteStream;

  constructor(out: NodeJS.WriteStream = process.stdout) {
    this.out = out;
  }

  info(message: string): void {
    this.closeStream();
    console.log(paint('Dim', message));
  }

  success(message: string): void {
    this.closeStream();
    console.log(`${paint('Success', '✓')} ${message}`);
  }

  warn(message: string): void {
    this.closeStream();
    console.log(paint('Warning', `⚠ ${message}`));
  }

  error(message: string): void {
    this.closeStream();
    console.error(paint('Error', `✗ ${message}`));
  }

  stream(chunk: string): void {
    if (this.mode !== 'answer') {
      if (this.mode === 'reasoning') {
        this.out.write('\n\n');
      }
      this.out.write(chalk.bold(paint('Primary', 'deltacode> ')));
      this.mode = 'answer';
    }
    this.out.write(chunk.includes('```') ? paint('Accent', chunk) : chunk);
  }

  reasoning(chunk: string): void {
    if (this.mode !== 'reasoning') {
      if (this.mode === 'answer') {
        this.out.write('\n');
      }
      this.out.write(`\n${paint('Reasoning', '// thinking:')}\n`);
      this.mode = 'reasoning';
    }
    this.out.write(paint('Reasoning', chunk));
  }

  endStream(): void {
    this.closeStream();
  }

  panel(title: string, body: string): void {
    this.closeStream();
    const rule = paint('Secondary', '─'.repeat(Math.max(title.length + 4, 40)));
    console.log(`${rule}\n${paint('Accent', `[ ${title} ]`)}\n${body}\n${rule}`);
  }

  diff(path: string, before: string, after: string): void {
    this.closeStream();
    console.log(paint('Accent', `--- ${path}`));
    for (const line of formatLineDiff(before, after)) {
      if (line.startsWith('+')) {
        console.log(paint('Added', line));
      } else if (line.startsWith('-')) {
        console.log(paint('Removed', line));
      }
    }
  }

  spinner(text: string): Spinner {
    this.closeStream();
    const instance = ora({ text, stream: this.out }).start();
    return {
      update: (next) => {
        instance.text = next;
      },
      succeed: (message) => {
        instance.succeed(message);
      },
      fail: (message) => {
        instance.fail(message);
      },
      stop: () => {
        instance.stop();
      },
    };
  }

  private closeStream(): void {
    if (this.mode !== 'none') {
      this.out.write('\n');
      this.mode = 'none';
    }
  }
}

export interface ReportEntry {
  kind: 'info' | 'success' | 'warn' | 'error' | 'stream' | 'reasoning' | 'panel' | 'diff' | 'spinner';
  text: string;
}

/** Records output instead of printing it. */
export class SilentReporter implements Reporter {
  readonly entries: ReportEntry[] = [];

  info(message: string): void {
    this.entries.push({ kind: 'info', text: message });
  }

  success(message: string): void {
    this.entries.push({ kind: 'success', text: message });
  }

  warn(message: string): void {
    this.entries.push({ kind: 'warn', text: message });
  }

  error(message: string): void {
    this.entries.push({ kind: 'error', text: message });
  }

  stream(chunk: string): void {
    this.entries.push({ kind: 'stream', text: chunk });
  }

  reasoning(chunk: string): void {
    this.entries.push({ kind: 'reasoning', text: chunk });
  }

  endStream(): void {}

  panel(title: string, body: string): void {
    this.entries.push({ kind: 'panel', text: `${title}\n${body}` });
  }

  diff(path: string, before: string, after: string): void {
    this.entries.push({ kind: 'diff', text: [path, ...formatLineDiff(before, after)].join('\n') });
  }

  spinner(text: string): Spinner {
    this.entries.push({ kind: 'spinner', text });
    return { update() {}, succeed() {}, fail() {}, stop() {} };
  }

  textsOf(kind: ReportEntry['kind']): string[] {
    return this.entries.filter((entry) => entry.kind === kind).map((entry) => entry.text);
  }
}
