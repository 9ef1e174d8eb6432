import { describe, it, expect, beforeEach } from 'vitest';
import { SessionTracker, lineChanges } from '../../src/session/tracker.js';

describe('lineChanges', () => {
  it('counts a new file as all added', () => {
    expect(lineChanges(null, 'a\nb\nc\n')).toEqual({ added: 3, removed: 0 });
  });

  it('counts a replaced line both ways', () => {
    expect(lineChanges('a\nb\nc\n', 'a\nB\nc\n')).toEqual({ added: 1, removed: 1 });
  });

  it('counts nothing for identical content', () => {
    expect(lineChanges('same\n', 'same\n')).toEqual({ added: 0, removed: 0 });
  });
});

describe('SessionTracker', () => {
  let tracker: SessionTracker;

  beforeEach(() => {
    tracker = new SessionTracker();
  });

  it('accumulates API calls and turns', () => {
    tracker.recordApiCall(1200);
    tracker.recordApiCall(300);
    tracker.recordTurn(true);
    tracker.recordTurn(false);
    expect(tracker.getApiCalls()).toBe(2);
    expect(tracker.getApiDurationMs()).toBe(1500);
    expect(tracker.getTurns()).toEqual({ completed: 1, failed: 1 });
  });

  it('counts files once however often they change', () => {
    tracker.recordFileChange('/p/a.txt', null, 'one\n');
    tracker.recordFileChange('/p/a.txt', 'one\n', 'one\ntwo\n');
    expect(tracker.getFileChangeStats()).toEqual({ filesChanged: 1, linesAdded: 2, linesRemoved: 0 });
  });

  it('builds a summary', () => {
    tracker.recordApiCall(1500);
    tracker.recordTurn(true);
    tracker.recordToolCall('create_file', true);
    tracker.recordToolCall('edit_file', false);
    tracker.recordFileChange('/p/hello.txt', null, 'Hi');

    const lines = tracker.buildSummary('deepseek-chat').split('\n');
    expect(lines[0]).toBe('Session summary:');
    expect(lines[1]).toBe('  Turns:                 1 completed, 0 failed');
    expect(lines[2]).toBe('  Total duration (API):  1.5s');
    expect(lines[4]).toBe('  Total code changes:    1 lines added, 0 lines removed');
    expect(lines[5]).toBe('  Files changed:         1');
    expect(lines[6]).toBe('  Model:                 deepseek-chat (1 call(s))');
    expect(lines.slice(7)).toEqual(['  Tool usage (1 failed):', '    create_file: 1', '    edit_file: 1']);
  });

  it('says when no tools ran', () => {
    expect(tracker.buildSummary('m').split('\n').at(-1)).toBe('  Tool usage: none');
  });
});
