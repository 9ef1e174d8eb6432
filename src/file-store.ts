import { mkdir, open, readFile, stat, writeFile, type FileHandle } from 'fs/promises';
import { dirname } from 'path';
import { normalizePath, hasHomeShorthand } from './path-guard.js';
import { FileIOError, FileNotFoundError, ValidationError } from './errors.js';
import type { Reporter } from './ui/reporter.js';

export const MAX_FILE_BYTES = 5_000_000;

function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function toFsError(path: string, error: unknown): Error {
  const code = errnoCode(error);
  if (code === 'ENOENT' || code === 'ENOTDIR') {
    return new FileNotFoundError(path, { cause: error });
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new FileIOError(path, detail, { cause: error });
}

export interface FileStoreOptions {
  cwd?: string;
  reporter?: Reporter;
}

/**
 * Read/write primitives for the project tree. Relative paths resolve
 * against `cwd`.
 */
export class FileStore {
  readonly cwd: string;
  private readonly reporter?: Reporter;

  constructor(options: FileStoreOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.reporter = options.reporter;
  }

  resolve(path: string): string {
    return normalizePath(path, this.cwd);
  }

  async read(path: string): Promise<string> {
    const absolute = this.resolve(path);
    try {
      return await readFile(absolute, 'utf-8');
    } catch (error) {
      throw toFsError(absolute, error);
    }
  }

  /** Creates parent directories and overwrites. Returns the absolute path written. */
  async write(path: string, content: string): Promise<string> {
    if (hasHomeShorthand(path)) {
      throw new ValidationError(`Home directory references not allowed: ${path}`);
    }
    const bytes = Buffer.byteLength(content, 'utf-8');
    if (bytes > MAX_FILE_BYTES) {
      throw new ValidationError(
        `Content for ${path} is ${bytes} bytes, over the ${MAX_FILE_BYTES} byte limit`,
      );
    }

    const absolute = this.resolve(path);
    try {
      await mkdir(dirname(absolute), { recursive: true });
      await writeFile(absolute, content, 'utf-8');
    } catch (error) {
      throw toFsError(absolute, error);
    }
    this.reporter?.success(`File written: ${absolute}`);
    return absolute;
  }

  async exists(path: string): Promise<boolean> {
    try {
      await stat(this.resolve(path));
      return true;
    } catch {
      return false;
    }
  }

  async size(path: string): Promise<number> {
    const absolute = this.resolve(path);
    try {
      return (await stat(absolute)).size;
    } catch (error) {
      throw toFsError(absolute, error);
    }
  }

  async isDirectory(path: string): Promise<boolean> {
    const absolute = this.resolve(path);
    try {
      return (await stat(absolute)).isDirectory();
    } catch (error) {
      throw toFsError(absolute, error);
    }
  }

  /** True when a NUL byte shows up in the first `peekBytes`, or the file can't be read. */
  async isBinary(path: string, peekBytes = 1024): Promise<boolean> {
    let handle: FileHandle | undefined;
    try {
      handle = await open(this.resolve(path), 'r');
      const buffer = Buffer.alloc(peekBytes);
      const { bytesRead } = await handle.read(buffer, 0, peekBytes, 0);
      return buffer.subarray(0, bytesRead).includes(0);
    } catch {
      return true;
    } finally {
      await handle?.close();
    }
  }
}
