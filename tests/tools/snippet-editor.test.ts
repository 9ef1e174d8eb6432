import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { join } from 'path';
import { FileStore } from '../../src/file-store.js';
import { SnippetEditor, countOccurrences } from '../../src/tools/snippet-editor.js';
import { AmbiguousEditError, FileNotFoundError, SnippetNotFoundError, ValidationError } from '../../src/errors.js';
import { SilentReporter } from '../../src/ui/reporter.js';
import { makeTempDir, removeTempDir } from '../helpers/fixtures.js';

describe('countOccurrences', () => {
  it('counts non-overlapping literal matches', () => {
    expect(countOccurrences('aaaa', 'aa')).toBe(2);
    expect(countOccurrences('abcabc', 'abc')).toBe(2);
    expect(countOccurrences('abc', 'x')).toBe(0);
    expect(countOccurrences('a.b', '.')).toBe(1);
  });

  it('returns 0 for an empty needle', () => {
    expect(countOccurrences('abc', '')).toBe(0);
  });
});

describe('SnippetEditor', () => {
  let dir: string;
  let reporter: SilentReporter;
  let files: FileStore;
  let editor: SnippetEditor;

  beforeEach(async () => {
    dir = await makeTempDir();
    reporter = new SilentReporter();
    files = new FileStore({ cwd: dir });
    editor = new SnippetEditor(files, reporter);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('replaces a unique snippet', async () => {
    await files.write('app.py', 'def greet():\n    return "hi"\n');
    const outcome = await editor.apply({
      path: 'app.py',
      originalSnippet: 'return "hi"',
      newSnippet: 'return "hello"',
    });

    expect(outcome).toEqual({
      path: join(dir, 'app.py'),
      before: 'def greet():\n    return "hi"\n',
      after: 'def greet():\n    return "hello"\n',
    });
    expect(await files.read('app.py')).toBe('def greet():\n    return "hello"\n');
    expect(reporter.textsOf('diff')).toEqual([
      `${join(dir, 'app.py')}\n def greet():\n-    return "hi"\n+    return "hello"`,
    ]);
  });

  it('inserts replacement text literally', async () => {
    await files.write('price.txt', 'cost: X');
    await editor.apply({ path: 'price.txt', originalSnippet: 'X', newSnippet: "$& $1 $$ $'" });
    expect(await files.read('price.txt')).toBe("cost: $& $1 $$ $'");
  });

  it('matches regex metacharacters literally', async () => {
    await files.write('re.txt', 'a.*b\naxxb\n');
    await editor.apply({ path: 're.txt', originalSnippet: 'a.*b', newSnippet: 'done' });
    expect(await files.read('re.txt')).toBe('done\naxxb\n');
  });

  it('fails on zero matches and leaves the file untouched', async () => {
    await files.write('a.txt', 'alpha\nbeta\n');
    await expect(
      editor.apply({ path: 'a.txt', originalSnippet: 'gamma', newSnippet: 'delta' }),
    ).rejects.toThrow(SnippetNotFoundError);
    expect(await files.read('a.txt')).toBe('alpha\nbeta\n');
    expect(reporter.textsOf('panel')).toEqual(['EXPECTED\ngamma', 'ACTUAL\nalpha\nbeta\n']);
  });

  it('fails on ambiguous matches and reports the count', async () => {
    await files.write('dup.txt', 'x = 1\nx = 1\n');
    const attempt = editor.apply({ path: 'dup.txt', originalSnippet: 'x = 1', newSnippet: 'x = 2' });
    await expect(attempt).rejects.toThrow(AmbiguousEditError);
    await expect(
      editor.apply({ path: 'dup.txt', originalSnippet: 'x = 1', newSnippet: 'x = 2' }),
    ).rejects.toThrow(`Ambiguous edit: 2 matches of the original snippet in '${join(dir, 'dup.txt')}'`);
    expect(await files.read('dup.txt')).toBe('x = 1\nx = 1\n');
  });

  it('rejects an empty original snippet', async () => {
    await files.write('a.txt', 'content');
    await expect(editor.apply({ path: 'a.txt', originalSnippet: '', newSnippet: 'x' })).rejects.toThrow(
      ValidationError,
    );
  });

  it('propagates a missing file', async () => {
    await expect(editor.apply({ path: 'nope.txt', originalSnippet: 'a', newSnippet: 'b' })).rejects.toThrow(
      FileNotFoundError,
    );
  });

  it('allows deleting a snippet', async () => {
    await files.write('a.txt', 'keep DROP keep');
    await editor.apply({ path: 'a.txt', originalSnippet: ' DROP', newSnippet: '' });
    expect(await files.read('a.txt')).toBe('keep keep');
  });
});
