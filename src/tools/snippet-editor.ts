import type { FileStore } from '../file-store.js';
import type { Reporter } from '../ui/reporter.js';
import type { FileEditRequest } from '../types.js';
import { AmbiguousEditError, SnippetNotFoundError, ValidationError } from '../errors.js';

export interface EditOutcome {
  path: string;
  before: string;
  after: string;
}

/** Non-overlapping literal occurrences of `needle` in `haystack`. */
export function countOccurrences(haystack: string, needle: string): number {
  if (needle.length === 0) return 0;
  let count = 0;
  let from = haystack.indexOf(needle);
  while (from !== -1) {
    count += 1;
    from = haystack.indexOf(needle, from + needle.length);
  }
  return count;
}

/**
 * Replaces exactly one literal occurrence of a snippet. Zero or several
 * matches leave the file untouched.
 */
export class SnippetEditor {
  private readonly files: FileStore;
  private readonly reporter?: Reporter;

  constructor(files: FileStore, reporter?: Reporter) {
    this.files = files;
    this.reporter = reporter;
  }

  async apply(request: FileEditRequest): Promise<EditOutcome> {
    const { originalSnippet, newSnippet } = request;
    if (originalSnippet.length === 0) {
      throw new ValidationError('original_snippet must not be empty');
    }

    const path = this.files.resolve(request.path);
    const before = await this.files.read(path);
    const occurrences = countOccurrences(before, originalSnippet);

    if (occurrences !== 1) {
      const error =
        occurrences === 0
          ? new SnippetNotFoundError(path)
          : new AmbiguousEditError(path, occurrences);
      this.reporter?.warn(error.message);
      this.reporter?.panel('EXPECTED', originalSnippet);
      this.reporter?.panel('ACTUAL', before);
      throw error;
    }

    const index = before.indexOf(originalSnippet);
    const after = before.slice(0, index) + newSnippet + before.slice(index + originalSnippet.length);
    await this.files.write(path, after);
    this.reporter?.diff(path, before, after);
    return { path, before, after };
  }
}
