import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { join } from 'path';
import dotenv from 'dotenv';
import type { AgentConfig, ProjectConfig } from './types.js';
import type { PermissionMode } from './session/state.js';
import { InstructionsLoader } from './config/instructions.js';
import { DEFAULT_MODEL, defaultBaseUrl, getModelConfig, listAvailableModels } from './models.js';
import { ConfigError, errorMessage } from './errors.js';
import { debugLog } from './utils/debug.js';

dotenv.config({ path: ['.env.local', '.env'] });

export const PROJECT_CONFIG_FILE = '.deltacoderc';

const API_KEY_VARS = ['DELTACODE_API_KEY', 'DEEPSEEK_API_KEY', 'OPENAI_API_KEY'];

type Env = Record<string, string | undefined>;

function isPermissionMode(value: unknown): value is PermissionMode {
  return value === 'interactive' || value === 'auto-accept';
}

export function parseProjectConfig(raw: string): ProjectConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Could not parse ${PROJECT_CONFIG_FILE}: ${errorMessage(error)}`, { cause: error });
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigError(`${PROJECT_CONFIG_FILE} must contain a JSON object`);
  }

  const config: ProjectConfig = {};
  if ('instructions' in parsed && typeof parsed.instructions === 'string') {
    config.instructions = parsed.instructions;
  }
  if ('permissionMode' in parsed) {
    if (!isPermissionMode(parsed.permissionMode)) {
      throw new ConfigError(`${PROJECT_CONFIG_FILE}: permissionMode must be "interactive" or "auto-accept"`);
    }
    config.permissionMode = parsed.permissionMode;
  }
  return config;
}

/**
 * Reads .deltacoderc from the project root, then appends AGENTS.md
 * instructions (global before project) to whatever it declared.
 */
export async function loadProjectConfig(
  cwd: string = process.cwd(),
  instructions: InstructionsLoader = new InstructionsLoader(cwd),
): Promise<ProjectConfig> {
  const configPath = join(cwd, PROJECT_CONFIG_FILE);
  let config: ProjectConfig = {};

  if (existsSync(configPath)) {
    config = parseProjectConfig(await readFile(configPath, 'utf-8'));
  }

  const merged = await instructions.mergeInstructions();
  if (merged) {
    config.instructions = config.instructions ? `${config.instructions}\n\n${merged}` : merged;
  }

  return config;
}

function firstSet(env: Env, names: string[]): string | undefined {
  for (const name of names) {
    const value = env[name]?.trim();
    if (value) return value;
  }
  return undefined;
}

function parseNumber(env: Env, name: string): number | undefined {
  const raw = env[name]?.trim();
  if (!raw) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a number, got "${raw}"`);
  }
  return value;
}

export function getAgentConfig(modelOverride?: string, env: Env = process.env): AgentConfig {
  const apiKey = firstSet(env, API_KEY_VARS);
  if (!apiKey) {
    throw new ConfigError(`API key not found. Set one of ${API_KEY_VARS.join(', ')} (a .env file works too).`);
  }

  // CLI override > env var > default
  const model = modelOverride || env.DELTACODE_MODEL?.trim() || DEFAULT_MODEL;
  const modelConfig = getModelConfig(model);
  if (!modelConfig) {
    throw new ConfigError(`Invalid model: ${model}. Available models: ${listAvailableModels().join(', ')}`);
  }

  const requestedMaxTokens = parseNumber(env, 'DELTACODE_MAX_TOKENS') ?? modelConfig.maxOutputTokens;
  const maxTokens = Math.max(1, Math.min(Math.floor(requestedMaxTokens), modelConfig.maxOutputTokens));

  const config: AgentConfig = {
    apiKey,
    model,
    baseUrl: env.DELTACODE_BASE_URL?.trim() || defaultBaseUrl(model),
    maxTokens,
  };
  const temperature = parseNumber(env, 'DELTACODE_TEMPERATURE');
  if (temperature !== undefined) {
    config.temperature = temperature;
  }

  debugLog('Agent config:', { model, baseUrl: config.baseUrl, maxTokens, temperature });
  return config;
}
