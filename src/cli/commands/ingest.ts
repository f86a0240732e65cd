/**
 * Ingest Command
 *
 * Submits a publicly reachable document URL to the document index.
 *
 *   ragline ingest https://example.com/files/report.pdf
 *   ragline ingest https://example.com/handbook --name "Handbook" --mode accurate
 *
 * The backend indexes asynchronously. The command returns once the
 * submission is acknowledged; it does not wait for the document to become
 * searchable.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import type { CommandContext } from '../types.js';
import type { Config } from '../../config/schema.js';
import { loadConfig } from '../../config/loader.js';
import { getApiKey } from '../../config/env.js';
import { APIKeyError } from '../../errors/index.js';
import { createDocumentIngestor, type DocumentIngestor } from '../../rag/ingestor.js';
import type { IngestionAck } from '../../rag/types.js';
import type { Logger } from '../../utils/logger.js';
import { IngestArgsSchema, IngestOptionsSchema, parseCommandInput } from '../validation.js';

interface IngestCommandOptions {
  name?: string;
  mode?: string;
}

/**
 * Builds the ingestor a command submits through.
 */
export type IngestorFactory = (apiKey: string, config: Config, logger: Logger) => DocumentIngestor;

export const createDefaultIngestor: IngestorFactory = (apiKey, config, logger) =>
  createDocumentIngestor(apiKey, config, { logger });

export const INDEXING_NOTICE =
  'Indexing continues in the background; questions asked right away may not see this document yet.';

const USAGE_HINT = 'Example: ragline ingest https://example.com/files/report.pdf --mode fast';

/**
 * Create the ingest command.
 */
export function createIngestCommand(
  getContext: () => CommandContext,
  createIngestor: IngestorFactory = createDefaultIngestor
): Command {
  return new Command('ingest')
    .argument('<url>', 'Publicly reachable URL of the document')
    .description('Submit a document to the index')
    .option('-n, --name <name>', 'Document name (defaults to the last URL segment)')
    .option('-m, --mode <mode>', 'Ingestion mode: fast or accurate (defaults to ingestion.default_mode)')
    .action(async (url: string, cmdOptions: IngestCommandOptions) => {
      const ctx = getContext();

      const args = parseCommandInput(IngestArgsSchema, { url }, USAGE_HINT);
      const options = parseCommandInput(IngestOptionsSchema, cmdOptions, USAGE_HINT);

      const apiKey = getApiKey('retrieval');
      if (apiKey === undefined) {
        throw new APIKeyError('Retrieval', 'RAGIE_API_KEY');
      }

      const config = loadConfig();
      const mode = options.mode ?? config.ingestion.default_mode;
      ctx.debug(`Mode: ${mode}`);

      const ingestor = createIngestor(apiKey, config, ctx);
      const spinner =
        !ctx.options.json && process.stdout.isTTY
          ? ora({ text: 'Uploading document...' }).start()
          : null;

      let ack: IngestionAck;
      try {
        ack = await ingestor.ingest({ url: args.url, name: options.name, mode });
        spinner?.stop();
      } catch (error) {
        spinner?.fail('Upload failed');
        throw error;
      }

      if (ctx.options.json) {
        console.log(JSON.stringify({ success: true, document: ack, indexing: 'async' }, null, 2));
        return;
      }

      ctx.log(`${chalk.green('✓')} Submitted ${chalk.cyan(ack.name)} (${ack.mode})`);
      ctx.log(chalk.dim(`Document ID: ${ack.id}${ack.status ? ` · status: ${ack.status}` : ''}`));
      ctx.warn(INDEXING_NOTICE);
    });
}
