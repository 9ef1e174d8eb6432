import { resolve } from 'path';
import { InvalidPathError } from './errors.js';

function segments(path: string): string[] {
  return path.split(/[\\/]+/).filter((part) => part.length > 0);
}

export function hasHomeShorthand(pathInput: string): boolean {
  return segments(pathInput).some((part) => part.startsWith('~'));
}

/**
 * Resolve `pathInput` against `cwd` into a canonical absolute path.
 * `..` segments are collapsed by resolution; the check applies to the
 * resolved path. Home shorthands are rejected and absolute paths are accepted.
 */
export function normalizePath(pathInput: string, cwd: string = process.cwd()): string {
  const trimmed = pathInput.trim();
  if (trimmed.length === 0) {
    throw new InvalidPathError(pathInput, 'is empty');
  }
  if (hasHomeShorthand(trimmed)) {
    throw new InvalidPathError(pathInput, 'uses a home directory reference');
  }

  const resolved = resolve(cwd, trimmed);
  if (segments(resolved).includes('..')) {
    throw new InvalidPathError(pathInput, 'contains parent directory references');
  }
  return resolved;
}
