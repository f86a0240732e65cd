/**
 * Ask Command
 *
 * Answers a question from the hosted document index, optionally augmented
 * with live web search, using Claude for generation.
 *
 *   ragline ask "What is photosynthesis?"
 *   ragline ask "How do refunds work?" --scope handbook
 *   ragline ask "Summarize the report" --no-web --json
 *
 * Keys come from the environment (RAGIE_API_KEY, ANTHROPIC_API_KEY and,
 * optionally, SERPAPI_API_KEY); everything else from ~/.ragline/config.toml.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext, SessionFactory } from '../types.js';
import { loadConfig } from '../../config/loader.js';
import { getApiKey } from '../../config/env.js';
import { Session } from '../../session/session.js';
import type { PipelineResult } from '../../rag/types.js';
import { AskArgsSchema, AskOptionsSchema, parseCommandInput } from '../validation.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Command-specific options parsed from CLI arguments.
 */
interface AskCommandOptions {
  /** Retrieval scope (defaults to retrieval.default_scope) */
  scope?: string;
  /** False with --no-web */
  web: boolean;
}

/**
 * JSON output format for the ask command.
 */
export interface AskOutputJSON {
  question: string;
  answer: string;
  metadata: {
    scope: string;
    webSearch: boolean;
    generated: boolean;
    chunkCount: number;
    webResultCount: number;
    retrievalMs: number;
    webSearchMs: number;
    generationMs: number;
    totalMs: number;
    model: string;
  };
}

const USAGE_HINT = 'Example: ragline ask "What is photosynthesis?" --scope tutorial';

export const createDefaultSession: SessionFactory = (config, logger) =>
  new Session({ config, logger });

// ============================================================================
// Helpers
// ============================================================================

function displayAnswer(ctx: CommandContext, result: PipelineResult): void {
  if (result.generated) {
    ctx.log(result.answer);
  } else {
    ctx.log(chalk.yellow(result.answer));
    ctx.log(chalk.dim('Try a different scope, or set SERPAPI_API_KEY to include web results.'));
  }

  ctx.log('');
  ctx.log(
    chalk.dim(
      `${result.chunkCount} document chunk(s), ${result.webResultCount} web result(s) · ` +
        `${result.timings.totalMs}ms`
    )
  );

  if (ctx.options.verbose) {
    ctx.log(chalk.dim(`Retrieval: ${result.timings.retrievalMs}ms`));
    ctx.log(chalk.dim(`Web search: ${result.timings.webSearchMs}ms`));
    ctx.log(chalk.dim(`Generation: ${result.timings.generationMs}ms`));
  }
}

// ============================================================================
// Command Factory
// ============================================================================

/**
 * Create the ask command.
 *
 * @param getContext - Factory to get command context with global options
 * @param createSession - Builds the session the question runs against
 */
export function createAskCommand(
  getContext: () => CommandContext,
  createSession: SessionFactory = createDefaultSession
): Command {
  return new Command('ask')
    .argument('<question>', 'Question to answer from your documents')
    .description('Answer a question using the document index, web search and Claude')
    .option('-s, --scope <scope>', 'Retrieval scope (defaults to retrieval.default_scope)')
    .option('--no-web', 'Skip web search even when SERPAPI_API_KEY is set')
    .action(async (question: string, cmdOptions: AskCommandOptions) => {
      const ctx = getContext();

      const args = parseCommandInput(AskArgsSchema, { question }, USAGE_HINT);
      const options = parseCommandInput(AskOptionsSchema, cmdOptions, USAGE_HINT);

      const config = loadConfig();
      const scope = options.scope ?? config.retrieval.default_scope;
      ctx.debug(`Scope: ${scope}`);
      ctx.debug(`Model: ${config.completion.model}`);

      const session = createSession(config, ctx);
      session.configure({
        retrievalKey: getApiKey('retrieval') ?? '',
        completionKey: getApiKey('completion') ?? '',
        webSearchKey: options.web ? getApiKey('web-search') : undefined,
      });
      ctx.debug(`Web search: ${session.webSearchEnabled ? 'enabled' : 'disabled'}`);

      const spinner =
        !ctx.options.json && process.stdout.isTTY
          ? ora({ text: 'Searching...' }).start()
          : null;

      let result: PipelineResult;
      try {
        result = await session.run(args.question, scope);
        spinner?.stop();
      } catch (error) {
        spinner?.fail('Failed to answer');
        throw error;
      }

      if (ctx.options.json) {
        const output: AskOutputJSON = {
          question: args.question,
          answer: result.answer,
          metadata: {
            scope,
            webSearch: session.webSearchEnabled,
            generated: result.generated,
            chunkCount: result.chunkCount,
            webResultCount: result.webResultCount,
            retrievalMs: result.timings.retrievalMs,
            webSearchMs: result.timings.webSearchMs,
            generationMs: result.timings.generationMs,
            totalMs: result.timings.totalMs,
            model: config.completion.model,
          },
        };
        console.log(JSON.stringify(output, null, 2));
        return;
      }

      displayAnswer(ctx, result);
    });
}
