#!/usr/bin/env node
/**
 * Ragline CLI Entry Point
 *
 * This is the main entry point for the `ragline` command.
 * It sets up Commander.js with global options and registers all subcommands.
 */

import { readFileSync } from 'node:fs';
import { Command } from 'commander';
import chalk from 'chalk';
import { z } from 'zod';
import type { GlobalOptions, CommandContext } from './types.js';
import { createAskCommand } from './commands/ask.js';
import { createConfigCommand } from './commands/config.js';
import { createIngestCommand } from './commands/ingest.js';
import {
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  CLIError,
} from '../errors/index.js';
import {
  validateStartupConfig,
  printStartupValidation,
  getValidationOptionsForCommand,
} from '../config/index.js';

// Same relative path from src/cli and dist/cli
const PackageJsonSchema = z.object({ version: z.string() });
const VERSION = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf-8'))
).version;

// Create the root program
const program = new Command();

// Configure the program
program
  .name('ragline')
  .description('Answer questions from your documents with retrieval-augmented generation')
  .version(VERSION, '-v, --version', 'Display version number')

  // Global options - available to ALL subcommands
  .option('--verbose', 'Enable verbose output for debugging', false)
  .option('--json', 'Output results as JSON', false)

  // Custom help formatting
  .addHelpText('after', `
${chalk.dim('Examples:')}
  ${chalk.cyan('ragline ingest https://example.com/report.pdf')}   Add a document to the index
  ${chalk.cyan('ragline ask "What does the report conclude?"')}    Ask a question
  ${chalk.cyan('ragline ask "..." --scope handbook --no-web')}     Limit to one scope, skip web search
  ${chalk.cyan('ragline config list')}                             Show all configuration
  ${chalk.cyan('ragline config set completion.max_tokens 2048')}   Change a setting

${chalk.dim('Environment:')}
  RAGIE_API_KEY       Document index (required)
  ANTHROPIC_API_KEY   Answer generation (required for ask)
  SERPAPI_API_KEY     Web search (optional)
`);

/**
 * Create a command context with logging utilities
 * This is passed to all command handlers
 */
function createContext(options: GlobalOptions): CommandContext {
  return {
    options,
    log: (message: string) => {
      if (!options.json) {
        console.log(message);
      }
    },
    debug: (message: string) => {
      if (options.verbose && !options.json) {
        console.log(chalk.dim(`[debug] ${message}`));
      }
    },
    warn: (message: string) => {
      if (!options.json) {
        console.warn(chalk.yellow(`Warning: ${message}`));
      }
    },
    error: (message: string) => {
      if (options.json) {
        console.error(JSON.stringify({ error: message }));
      } else {
        console.error(chalk.red(`Error: ${message}`));
      }
    },
  };
}

/**
 * Get global options from the program
 * Commander stores options on the Command object after parsing
 */
function getGlobalOptions(): GlobalOptions {
  const opts = program.opts<Partial<GlobalOptions>>();
  return {
    verbose: opts.verbose ?? false,
    json: opts.json ?? false,
  };
}

// ============================================================================
// COMMANDS
// ============================================================================

// Ask command - answer a question with the RAG pipeline
program.addCommand(createAskCommand(() => createContext(getGlobalOptions())));

// Ingest command - submit a document URL for indexing
program.addCommand(createIngestCommand(() => createContext(getGlobalOptions())));

// Config command - manage ~/.ragline/config.toml
program.addCommand(createConfigCommand(() => createContext(getGlobalOptions())));

// ============================================================================
// ERROR HANDLING & EXECUTION
// ============================================================================

// Handle unknown commands
program.on('command:*', (operands: string[]) => {
  throw new CLIError(
    `Unknown command: ${operands[0]}`,
    `Run: ragline --help  to see available commands`
  );
});

// Check API keys before commands that need them
program.hook('preAction', (_rootCommand, actionCommand) => {
  const opts = getGlobalOptions();
  const validationOptions = getValidationOptionsForCommand(actionCommand.name());

  if (!validationOptions.required?.length && !validationOptions.optional?.length) {
    return;
  }

  const result = validateStartupConfig(validationOptions);

  // Errors always print; warnings only with --verbose
  if (result.errors.length > 0 || (opts.verbose && result.warnings.length > 0)) {
    printStartupValidation(result, opts.verbose);

    if (result.errors.length > 0) {
      throw new CLIError(
        'Configuration validation failed',
        'Fix the issues above and try again'
      );
    }
  }
});

// Parse arguments and execute
async function main(): Promise<void> {
  const getErrorOptions = (): ErrorHandlerOptions => {
    const opts = getGlobalOptions();
    return { verbose: opts.verbose, json: opts.json };
  };

  // Last resort for errors that escape every try/catch. Flags are read when
  // the error fires, after parseAsync has filled them in.
  const globalHandler = createGlobalErrorHandler(getErrorOptions);
  process.on('uncaughtException', globalHandler);
  process.on('unhandledRejection', globalHandler);

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    handleError(error, getErrorOptions());
  }
}

void main();
