import { diffLines } from 'diff';

type ToolCounts = Record<string, number>;

function countLines(value: string): number {
  if (value.length === 0) return 0;
  const lines = value.split('\n');
  return lines[lines.length - 1] === '' ? lines.length - 1 : lines.length;
}

export function lineChanges(before: string | null, after: string): { added: number; removed: number } {
  let added = 0;
  let removed = 0;
  for (const part of diffLines(before ?? '', after)) {
    if (part.added) added += countLines(part.value);
    if (part.removed) removed += countLines(part.value);
  }
  return { added, removed };
}

export class SessionTracker {
  private readonly startedAt = Date.now();
  private apiDurationMs = 0;
  private apiCalls = 0;
  private turns = 0;
  private failedTurns = 0;
  private toolCounts: ToolCounts = {};
  private toolFailures = 0;
  private filesChanged = new Set<string>();
  private linesAdded = 0;
  private linesRemoved = 0;

  getApiCalls(): number {
    return this.apiCalls;
  }

  getApiDurationMs(): number {
    return this.apiDurationMs;
  }

  getTurns(): { completed: number; failed: number } {
    return { completed: this.turns, failed: this.failedTurns };
  }

  getToolCounts(): ToolCounts {
    return { ...this.toolCounts };
  }

  getToolFailures(): number {
    return this.toolFailures;
  }

  getFileChangeStats(): { filesChanged: number; linesAdded: number; linesRemoved: number } {
    return {
      filesChanged: this.filesChanged.size,
      linesAdded: this.linesAdded,
      linesRemoved: this.linesRemoved,
    };
  }

  recordApiCall(durationMs: number): void {
    this.apiCalls += 1;
    this.apiDurationMs += durationMs;
  }

  recordTurn(ok: boolean): void {
    if (ok) {
      this.turns += 1;
    } else {
      this.failedTurns += 1;
    }
  }

  recordToolCall(name: string, ok: boolean): void {
    this.toolCounts[name] = (this.toolCounts[name] || 0) + 1;
    if (!ok) this.toolFailures += 1;
  }

  recordFileChange(path: string, before: string | null, after: string): void {
    this.filesChanged.add(path);
    const diff = lineChanges(before, after);
    this.linesAdded += diff.added;
    this.linesRemoved += diff.removed;
  }

  buildSummary(modelName: string): string {
    const wallMs = Date.now() - this.startedAt;
    const formatMs = (ms: number) => (ms / 1000).toFixed(1) + 's';
    const toolSummary = Object.entries(this.toolCounts)
      .map(([name, count]) => `    ${name}: ${count}`)
      .join('\n');

    return [
      'Session summary:',
      `  Turns:                 ${this.turns} completed, ${this.failedTurns} failed`,
      `  Total duration (API):  ${formatMs(this.apiDurationMs)}`,
      `  Total duration (wall): ${formatMs(wallMs)}`,
      `  Total code changes:    ${this.linesAdded} lines added, ${this.linesRemoved} lines removed`,
      `  Files changed:         ${this.filesChanged.size}`,
      `  Model:                 ${modelName} (${this.apiCalls} call(s))`,
      toolSummary
        ? `  Tool usage (${this.toolFailures} failed):\n${toolSummary}`
        : '  Tool usage: none',
    ].join('\n');
  }
}
