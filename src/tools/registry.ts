import inquirer from 'inquirer';
import type { ChatTool, ToolDefinition, ToolExecuteContext, ToolResult } from './types.js';
import type { ToolCall } from '../types.js';
import type { SessionState } from '../session/state.js';
import { errorMessage } from '../errors.js';
import { debugLog, debugError } from '../utils/debug.js';

/** Called around each approval prompt so the caller can release the terminal. */
export interface PromptHooks {
  before(): void;
  after(): void;
}

interface ToolRegistryOptions {
  sessionState?: SessionState;
  interactive?: boolean;
}

type ParsedArguments = { ok: true; args: Record<string, unknown> } | { ok: false; error: string };

export function parseToolArguments(raw: string): ParsedArguments {
  if (raw.trim().length === 0) {
    return { ok: true, args: {} };
  }
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    return { ok: false, error: `Invalid JSON arguments: ${errorMessage(error)}` };
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    return { ok: false, error: 'Arguments must be a JSON object' };
  }
  return { ok: true, args: Object.fromEntries(Object.entries(parsed)) };
}

/**
 * The fixed tool catalog. `execute` always resolves with the text of the
 * tool message, whatever happens inside the tool.
 */
export class ToolRegistry {
  private tools = new Map<string, ToolDefinition>();
  private readonly ctx: ToolExecuteContext;
  private readonly sessionState?: SessionState;
  private readonly interactive: boolean;
  private promptHooks?: PromptHooks;

  constructor(tools: ToolDefinition[], ctx: ToolExecuteContext, options?: ToolRegistryOptions) {
    tools.forEach((tool) => this.tools.set(tool.name, tool));
    this.ctx = ctx;
    this.sessionState = options?.sessionState;
    this.interactive = options?.interactive ?? true;
  }

  setPromptHooks(hooks: PromptHooks | undefined): void {
    this.promptHooks = hooks;
  }

  names(): string[] {
    return Array.from(this.tools.keys());
  }

  toChatTools(): ChatTool[] {
    return Array.from(this.tools.values()).map((tool) => ({
      type: 'function',
      function: {
        name: tool.name,
        description: tool.description,
        parameters: tool.parameters,
      },
    }));
  }

  listSummaries(): string {
    return Array.from(this.tools.values())
      .map((tool) => {
        const fields = Object.entries(tool.parameters.properties)
          .map(([key, schema]) => {
            const required = tool.parameters.required.includes(key) ? ' (required)' : '';
            return `  - ${key}${required}: ${schema.description ?? schema.type}`;
          })
          .join('\n');
        return `• ${tool.name}: ${tool.description}\n${fields}`;
      })
      .join('\n\n');
  }

  async execute(call: ToolCall): Promise<string> {
    const name = call.functionName;
    const tool = this.tools.get(name);
    if (!tool) {
      this.ctx.tracker?.recordToolCall(name, false);
      return `Unknown function: ${name}`;
    }

    const result = await this.run(tool, call);
    this.ctx.tracker?.recordToolCall(name, result.ok);
    if (!result.ok) {
      debugLog('Tool failed:', name, result.error);
      return `Error executing ${name}: ${result.error}`;
    }
    return result.output;
  }

  private async run(tool: ToolDefinition, call: ToolCall): Promise<ToolResult> {
    const parsed = parseToolArguments(call.argumentsJson);
    if (!parsed.ok) {
      return { ok: false, error: parsed.error };
    }

    try {
      if (tool.mutates && this.requiresApproval()) {
        const approved = await this.promptApproval(tool.name, parsed.args);
        if (!approved) {
          return { ok: true, output: `Approval denied for ${tool.name}.` };
        }
      }
      return await tool.execute(parsed.args, this.ctx);
    } catch (error) {
      debugError('Tool dispatch error:', error);
      return { ok: false, error: errorMessage(error) };
    }
  }

  private requiresApproval(): boolean {
    if (!this.sessionState || !this.interactive) return false;
    return !this.sessionState.isAutoApproved();
  }

  private async promptApproval(name: string, args: Record<string, unknown>): Promise<boolean> {
    const target = typeof args.file_path === 'string' ? args.file_path : JSON.stringify(args).slice(0, 200);
    this.promptHooks?.before();
    try {
      const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
        {
          type: 'confirm',
          name: 'confirm',
          message: `Allow ${name} on ${target}?`,
          default: false,
        },
      ]);
      return confirm;
    } finally {
      this.promptHooks?.after();
    }
  }
}
