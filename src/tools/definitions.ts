import type { ToolDefinition, ToolExecuteContext, ToolParameters, ToolResult } from './types.js';
import { ValidationError, errorMessage } from '../errors.js';
import { fileContentMessage } from '../session/conversation.js';

export const RESULT_SEPARATOR = `\n\n${'='.repeat(50)}\n\n`;

interface FileToCreate {
  path: string;
  content: string;
}

function requireString(value: unknown, field: string): string {
  if (typeof value === 'string' && value.trim().length > 0) {
    return value;
  }
  throw new ValidationError(`Expected non-empty string for ${field}`);
}

/** Like requireString, but the empty string is a valid value. */
function requireText(value: unknown, field: string): string {
  if (typeof value === 'string') {
    return value;
  }
  throw new ValidationError(`Expected string for ${field}`);
}

function requireStringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError(`Expected non-empty array for ${field}`);
  }
  return value.map((item, index) => requireString(item, `${field}[${index}]`));
}

function requireFiles(value: unknown): FileToCreate[] {
  if (!Array.isArray(value) || value.length === 0) {
    throw new ValidationError('Expected non-empty array for files');
  }
  return value.map((item: unknown, index) => {
    if (!item || typeof item !== 'object') {
      throw new ValidationError(`Expected object for files[${index}]`);
    }
    return {
      path: requireString('path' in item ? item.path : undefined, `files[${index}].path`),
      content: requireText('content' in item ? item.content : undefined, `files[${index}].content`),
    };
  });
}

type ToolBody = (args: Record<string, unknown>, ctx: ToolExecuteContext) => Promise<string>;

export const PRE_EDIT_NOTE = 'The file content added to the conversation for this edit shows the text before the change.';

/** Wraps a tool body so that failures come back as a result instead of a throw. */
function guarded(body: ToolBody): ToolDefinition['execute'] {
  return async (args, ctx): Promise<ToolResult> => {
    try {
      return { ok: true, output: await body(args, ctx) };
    } catch (error) {
      return { ok: false, error: errorMessage(error) };
    }
  };
}

function params(properties: ToolParameters['properties'], required: string[]): ToolParameters {
  return { type: 'object', properties, required, additionalProperties: false };
}

async function readPrevious(ctx: ToolExecuteContext, path: string): Promise<string | null> {
  try {
    return await ctx.files.read(path);
  } catch {
    return null;
  }
}

async function createOne(ctx: ToolExecuteContext, file: FileToCreate): Promise<string> {
  const previous = await readPrevious(ctx, file.path);
  const absolute = await ctx.files.write(file.path, file.content);
  ctx.tracker?.recordFileChange(absolute, previous, file.content);
  return absolute;
}

export const toolDefinitions: ToolDefinition[] = [
  {
    name: 'read_file',
    description: 'Read the content of a single file from the filesystem',
    parameters: params(
      {
        file_path: { type: 'string', description: 'The path to the file to read (relative or absolute)' },
      },
      ['file_path'],
    ),
    mutates: false,
    execute: guarded(async (args, ctx) => {
      const path = ctx.files.resolve(requireString(args.file_path, 'file_path'));
      const content = await ctx.files.read(path);
      return fileContentMessage(path, content);
    }),
  },
  {
    name: 'read_multiple_files',
    description: 'Read the content of multiple files from the filesystem',
    parameters: params(
      {
        file_paths: {
          type: 'array',
          items: { type: 'string' },
          description: 'Array of file paths to read (relative or absolute)',
        },
      },
      ['file_paths'],
    ),
    mutates: false,
    execute: guarded(async (args, ctx) => {
      const paths = requireStringArray(args.file_paths, 'file_paths');
      const results: string[] = [];
      for (const filePath of paths) {
        try {
          const absolute = ctx.files.resolve(filePath);
          results.push(fileContentMessage(absolute, await ctx.files.read(absolute)));
        } catch (error) {
          results.push(`Error reading '${filePath}': ${errorMessage(error)}`);
        }
      }
      return results.join(RESULT_SEPARATOR);
    }),
  },
  {
    name: 'create_file',
    description: 'Create a new file or overwrite an existing file with the provided content',
    parameters: params(
      {
        file_path: { type: 'string', description: 'The path where the file should be created' },
        content: { type: 'string', description: 'The content to write to the file' },
      },
      ['file_path', 'content'],
    ),
    mutates: true,
    execute: guarded(async (args, ctx) => {
      const path = requireString(args.file_path, 'file_path');
      const content = requireText(args.content, 'content');
      await createOne(ctx, { path, content });
      return `Successfully created file '${path}'`;
    }),
  },
  {
    name: 'create_multiple_files',
    description:
      'Create multiple files at once. Files are written in order; a failure stops the batch and files already written are kept.',
    parameters: params(
      {
        files: {
          type: 'array',
          items: {
            type: 'object',
            properties: {
              path: { type: 'string' },
              content: { type: 'string' },
            },
            required: ['path', 'content'],
            additionalProperties: false,
          },
          description: 'Array of files to create with their paths and content',
        },
      },
      ['files'],
    ),
    mutates: true,
    execute: guarded(async (args, ctx) => {
      const files = requireFiles(args.files);
      const created: string[] = [];
      for (const file of files) {
        try {
          await createOne(ctx, file);
        } catch (error) {
          const done = created.length ? created.join(', ') : 'none';
          throw new Error(`${errorMessage(error)} (stopped at '${file.path}'; created before failure: ${done})`);
        }
        created.push(file.path);
      }
      return `Successfully created ${created.length} files: ${created.join(', ')}`;
    }),
  },
  {
    name: 'edit_file',
    description:
      'Edit an existing file by replacing a specific snippet with new content. The snippet must match exactly once.',
    parameters: params(
      {
        file_path: { type: 'string', description: 'The path to the file to edit' },
        original_snippet: { type: 'string', description: 'The exact text snippet to find and replace' },
        new_snippet: { type: 'string', description: 'The new text to replace the original snippet with' },
      },
      ['file_path', 'original_snippet', 'new_snippet'],
    ),
    mutates: true,
    execute: guarded(async (args, ctx) => {
      const path = requireString(args.file_path, 'file_path');
      const originalSnippet = requireText(args.original_snippet, 'original_snippet');
      const newSnippet = requireText(args.new_snippet, 'new_snippet');

      const seenBefore = ctx.context.isLoaded(path);
      if (!(await ctx.context.ensureLoaded(path))) {
        throw new Error(`Could not read file '${path}' for editing`);
      }
      const outcome = await ctx.editor.apply({ path, originalSnippet, newSnippet });
      ctx.tracker?.recordFileChange(outcome.path, outcome.before, outcome.after);
      // Content loaded here is posted after this result and predates the edit.
      return seenBefore ? `Successfully edited file '${path}'` : `Successfully edited file '${path}'. ${PRE_EDIT_NOTE}`;
    }),
  },
];
