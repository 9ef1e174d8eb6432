import { readFileSync } from 'fs';
import { basename, join } from 'path';
import fg from 'fast-glob';
import { minimatch } from 'minimatch';
import type { FileStore } from '../file-store.js';
import { MAX_FILE_BYTES } from '../file-store.js';
import type { Reporter } from '../ui/reporter.js';
import type { Conversation } from './conversation.js';
import { fileContentMessage } from './conversation.js';
import { InvalidPathError, errorMessage } from '../errors.js';
import { debugLog } from '../utils/debug.js';

export const MAX_DIRECTORY_FILES = 1000;

export interface Denylist {
  names: string[];
  filePatterns: string[];
}

export interface AddSummary {
  root: string;
  added: string[];
  skipped: string[];
  limitReached: boolean;
}

function stringList(value: unknown, field: string): string[] {
  if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
    return value;
  }
  throw new Error(`context-denylist.json: expected "${field}" to be a list of strings`);
}

export function loadDenylist(): Denylist {
  const raw: unknown = JSON.parse(
    readFileSync(new URL('../../config/context-denylist.json', import.meta.url), 'utf-8'),
  );
  if (!raw || typeof raw !== 'object') {
    throw new Error('context-denylist.json: expected an object');
  }
  return {
    names: stringList('names' in raw ? raw.names : undefined, 'names'),
    filePatterns: stringList('filePatterns' in raw ? raw.filePatterns : undefined, 'filePatterns'),
  };
}

/**
 * Puts file contents into the conversation as system messages, one file at
 * a time (edit preconditions) or a whole directory (`/add`).
 */
export class ContextLoader {
  private readonly conversation: Conversation;
  private readonly files: FileStore;
  private readonly reporter?: Reporter;
  private readonly denylist: Denylist;

  constructor(conversation: Conversation, files: FileStore, reporter?: Reporter, denylist?: Denylist) {
    this.conversation = conversation;
    this.files = files;
    this.reporter = reporter;
    this.denylist = denylist ?? loadDenylist();
  }

  /**
   * Make sure the model has seen the file before it is edited. Returns false
   * when the file cannot be read.
   */
  /** True when the conversation already carries the file's content. */
  isLoaded(path: string): boolean {
    try {
      return this.conversation.hasFileContent(this.files.resolve(path));
    } catch (error) {
      if (error instanceof InvalidPathError) return false;
      throw error;
    }
  }

  async ensureLoaded(path: string): Promise<boolean> {
    let absolute: string;
    let content: string;
    try {
      absolute = this.files.resolve(path);
      content = await this.files.read(absolute);
    } catch (error) {
      this.reporter?.error(`Could not read file '${path}' for editing context: ${errorMessage(error)}`);
      return false;
    }

    if (!this.conversation.hasFileContent(absolute)) {
      this.conversation.appendSystem(fileContentMessage(absolute, content));
      debugLog('ContextLoader: loaded', absolute);
    }
    return true;
  }

  /** Loads a file, or every eligible file under a directory. */
  async addPath(path: string): Promise<AddSummary> {
    const root = this.files.resolve(path);
    if (await this.files.isDirectory(root)) {
      return this.addDirectory(root);
    }

    if (await this.files.isBinary(root)) {
      return { root, added: [], skipped: [`${root} (binary)`], limitReached: false };
    }
    const content = await this.files.read(root);
    this.conversation.appendSystem(fileContentMessage(root, content));
    return { root, added: [root], skipped: [], limitReached: false };
  }

  isExcluded(fileName: string): boolean {
    if (this.denylist.names.includes(fileName)) return true;
    return this.denylist.filePatterns.some((pattern) =>
      minimatch(fileName, pattern, { nocase: true, dot: true }),
    );
  }

  private async addDirectory(root: string): Promise<AddSummary> {
    const ignore = this.denylist.names.map((name) => `**/${name}/**`);
    const entries = await fg('**/*', {
      cwd: root,
      ignore,
      dot: false,
      onlyFiles: true,
      followSymbolicLinks: false,
      unique: true,
    });
    entries.sort();

    const summary: AddSummary = { root, added: [], skipped: [], limitReached: false };
    for (const entry of entries) {
      if (summary.added.length >= MAX_DIRECTORY_FILES) {
        summary.limitReached = true;
        break;
      }

      const fullPath = join(root, entry);
      if (this.isExcluded(basename(entry))) {
        summary.skipped.push(fullPath);
        continue;
      }

      try {
        if ((await this.files.size(fullPath)) > MAX_FILE_BYTES) {
          summary.skipped.push(`${fullPath} (exceeds size limit)`);
          continue;
        }
        if (await this.files.isBinary(fullPath)) {
          summary.skipped.push(`${fullPath} (binary)`);
          continue;
        }
        const content = await this.files.read(fullPath);
        this.conversation.appendSystem(fileContentMessage(fullPath, content));
        summary.added.push(fullPath);
      } catch (error) {
        summary.skipped.push(`${fullPath} (${errorMessage(error)})`);
      }
    }

    debugLog('ContextLoader: directory scan', root, 'added', summary.added.length, 'skipped', summary.skipped.length);
    return summary;
  }
}
