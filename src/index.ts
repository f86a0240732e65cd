/**
 * Ragline - Library Entry Point
 *
 * Retrieval-augmented question answering: a hosted document index supplies
 * context, optional web search adds live snippets, and Claude writes the
 * answer. The CLI (`ragline`) is built on the same exports.
 *
 * @example Answer a question
 * ```typescript
 * import { Session, loadConfig } from 'ragline';
 *
 * const session = new Session({ config: loadConfig() });
 * session.configure({
 *   retrievalKey: process.env.RAGIE_API_KEY ?? '',
 *   completionKey: process.env.ANTHROPIC_API_KEY ?? '',
 *   webSearchKey: process.env.SERPAPI_API_KEY,
 * });
 *
 * await session.ingestDocument('https://example.com/files/report.pdf');
 * const answer = await session.processQuery('What does the report conclude?');
 * ```
 *
 * @example Bring your own backends
 * ```typescript
 * import { RagPipeline } from 'ragline';
 *
 * const pipeline = new RagPipeline({ retrieval, webSearch, completion });
 * const { answer, timings } = await pipeline.run('How do refunds work?', 'handbook');
 * ```
 *
 * @packageDocumentation
 */

// Session
export { Session, type SessionOptions, type SessionState } from './session/index.js';

// Pipeline, clients and prompt assembly
export * from './rag/index.js';

// Configuration
export {
  loadConfig,
  getConfigPath,
  getRaglineDir,
  DEFAULT_CONFIG,
  ConfigSchema,
  type Config,
  type IngestionMode,
} from './config/index.js';

// Errors
export * from './errors/index.js';

// Logging
export { consoleLogger, silentLogger, type Logger } from './utils/logger.js';

// CLI types for library consumers building their own commands
export type { GlobalOptions, CommandContext } from './cli/types.js';
