export type ErrorCode =
  | 'INVALID_PATH'
  | 'VALIDATION'
  | 'FILE_NOT_FOUND'
  | 'FILE_IO'
  | 'SNIPPET_NOT_FOUND'
  | 'AMBIGUOUS_EDIT'
  | 'TURN'
  | 'CONVERSATION_INVARIANT'
  | 'CONFIG';

export class DeltacodeError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Path uses a home shorthand or a parent-directory segment. */
export class InvalidPathError extends DeltacodeError {
  readonly path: string;

  constructor(path: string, reason: string) {
    super('INVALID_PATH', `Invalid path: ${path} ${reason}`);
    this.path = path;
  }
}

export class ValidationError extends DeltacodeError {
  constructor(message: string) {
    super('VALIDATION', message);
  }
}

export class FileNotFoundError extends DeltacodeError {
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super('FILE_NOT_FOUND', `File not found: ${path}`, options);
    this.path = path;
  }
}

export class FileIOError extends DeltacodeError {
  readonly path: string;

  constructor(path: string, detail: string, options?: { cause?: unknown }) {
    super('FILE_IO', `Could not access ${path}: ${detail}`, options);
    this.path = path;
  }
}

export class SnippetNotFoundError extends DeltacodeError {
  readonly path: string;

  constructor(path: string) {
    super('SNIPPET_NOT_FOUND', `Original snippet not found in '${path}'. No changes made.`);
    this.path = path;
  }
}

export class AmbiguousEditError extends DeltacodeError {
  readonly path: string;
  readonly occurrences: number;

  constructor(path: string, occurrences: number) {
    super(
      'AMBIGUOUS_EDIT',
      `Ambiguous edit: ${occurrences} matches of the original snippet in '${path}'. ` +
        'Include more surrounding lines so the snippet is unique. No changes made.',
    );
    this.path = path;
    this.occurrences = occurrences;
  }
}

export class TurnError extends DeltacodeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TURN', message, options);
  }
}

export class ConversationInvariantError extends DeltacodeError {
  constructor(message: string) {
    super('CONVERSATION_INVARIANT', message);
  }
}

export class ConfigError extends DeltacodeError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
