#!/usr/bin/env node
import { Command } from 'commander';
import chalk from 'chalk';
import { getAgentConfig, loadProjectConfig } from './config.js';
import { getModelConfig, listAvailableModels } from './models.js';
import { OpenAIChatProvider } from './providers/openai.js';
import { createApp } from './app.js';
import { debugLog, enableDebug, isDebugEnabled } from './utils/debug.js';
import { errorMessage } from './errors.js';

interface CliOptions {
  model?: string;
  autoApprove?: boolean;
  debug?: boolean;
  prompt?: string;
}

function printModels(): void {
  console.log(chalk.cyan('\nAvailable models:\n'));
  for (const name of listAvailableModels()) {
    const config = getModelConfig(name);
    if (!config) continue;
    console.log(chalk.green(`  ${name}`) + chalk.gray(` (${config.vendor}${config.reasoning ? ', reasoning' : ''})`));
    console.log(chalk.gray(`    Max context: ${config.maxContextLength.toLocaleString()} tokens`));
    console.log(chalk.gray(`    Max output:  ${config.maxOutputTokens.toLocaleString()} tokens`));
  }
  console.log('');
}

async function run(options: CliOptions): Promise<void> {
  if (options.debug) {
    enableDebug();
  }

  const agentConfig = getAgentConfig(options.model);
  const projectConfig = await loadProjectConfig();
  debugLog('CLI options:', options);
  debugLog('Project config:', projectConfig);

  // Single-prompt mode has nobody to answer approval prompts.
  const singlePrompt = options.prompt !== undefined;
  const app = createApp({
    model: agentConfig.model,
    projectConfig,
    createProvider: (tracker) => new OpenAIChatProvider(agentConfig, tracker),
    permissionMode: options.autoApprove || singlePrompt ? 'auto-accept' : undefined,
    interactive: Boolean(process.stdin.isTTY) && !singlePrompt,
  });

  if (options.prompt !== undefined) {
    const outcome = await app.driver.runTurn(options.prompt);
    console.log(`\n${app.tracker.buildSummary(agentConfig.model)}\n`);
    if (!outcome.ok) {
      throw outcome.error;
    }
    return;
  }

  await app.repl.start();
}

function fail(error: unknown): never {
  console.error(chalk.red(`\n✗ Error: ${errorMessage(error)}\n`));
  if (isDebugEnabled() && error instanceof Error && error.stack) {
    console.error(chalk.gray(error.stack));
  }
  process.exit(1);
}

const program = new Command();
program
  .name('deltacode')
  .description('Terminal coding agent for OpenAI-compatible models')
  .version('0.1.0')
  .option('-m, --model <model>', 'model to use (see "deltacode models")')
  .option('-y, --auto-approve', 'apply file writes and edits without asking')
  .option('-p, --prompt <text>', 'run a single prompt and exit')
  .option('--debug', 'print debug logs')
  .action(async (options: CliOptions) => {
    await run(options);
  });

program
  .command('models')
  .description('list available models and their limits')
  .action(() => {
    printModels();
  });

process.on('unhandledRejection', (reason) => {
  console.error(chalk.red(`\n✗ Unhandled promise rejection: ${errorMessage(reason)}\n`));
});

program.parseAsync(process.argv).catch(fail);
