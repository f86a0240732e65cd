/**
 * RAG Pipeline
 *
 * Orchestrates one question end to end:
 *
 * ```
 * query ──▶ ChunkRetriever.retrieve(query, scope)
 *       ──▶ WebSearcher.retrieve(query, limit)     (only when enabled)
 *       ──▶ both empty? ──yes──▶ NO_CONTEXT_ANSWER (no model call)
 *       ──▶ composePrompt(chunks, webResults)
 *       ──▶ Completer.complete(prompt, query) ──▶ answer
 * ```
 *
 * Steps run strictly in sequence. Errors from any backend propagate to the
 * caller unchanged; the only condition handled here is "no context found".
 * Nothing is cached between calls.
 *
 * @example
 * ```typescript
 * const pipeline = createRagPipeline(
 *   { retrievalKey, completionKey, webSearchKey },
 *   loadConfig()
 * );
 * const answer = await pipeline.processQuery('What is photosynthesis?');
 * ```
 */

import type { Config } from '../config/schema.js';
import { ValidationError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { CompletionClient, type MessagesBackend } from './completion-client.js';
import type { FetchLike } from './http.js';
import { composePrompt } from './prompt-composer.js';
import { RetrievalClient } from './retrieval-client.js';
import {
  QuerySchema,
  ScopeSchema,
  type ChunkRetriever,
  type Completer,
  type PipelineResult,
  type RagCredentials,
  type WebSearcher,
} from './types.js';
import { WebSearchClient, DEFAULT_WEB_RESULT_LIMIT } from './web-search-client.js';

/** Returned instead of a generated answer when no source yielded context */
export const NO_CONTEXT_ANSWER = 'No relevant information found for your query.';

export const DEFAULT_SCOPE = 'tutorial';

export interface RagPipelineOptions {
  retrieval: ChunkRetriever;
  webSearch: WebSearcher;
  completion: Completer;
  /** Scope used when processQuery() gets none. @default 'tutorial' */
  defaultScope?: string;
  /** Maximum web results per query. @default 3 */
  webResultLimit?: number;
  logger?: Logger;
}

export class RagPipeline {
  private readonly retrieval: ChunkRetriever;
  private readonly webSearch: WebSearcher;
  private readonly completion: Completer;
  private readonly logger: Logger;
  readonly defaultScope: string;
  readonly webResultLimit: number;

  constructor(options: RagPipelineOptions) {
    this.retrieval = options.retrieval;
    this.webSearch = options.webSearch;
    this.completion = options.completion;
    this.defaultScope = options.defaultScope ?? DEFAULT_SCOPE;
    this.webResultLimit = options.webResultLimit ?? DEFAULT_WEB_RESULT_LIMIT;
    this.logger = options.logger ?? silentLogger;
  }

  /** Whether queries will be augmented with web results */
  get webSearchEnabled(): boolean {
    return this.webSearch.enabled;
  }

  /**
   * Answer a question.
   *
   * @returns The model's answer, or NO_CONTEXT_ANSWER when neither source
   *   produced any context
   * @throws ValidationError for a blank query or scope
   * @throws RetrievalError | WebSearchError | CompletionError from the backends
   */
  async processQuery(query: string, scope?: string): Promise<string> {
    const result = await this.run(query, scope);
    return result.answer;
  }

  /**
   * Answer a question and report what happened along the way.
   * Same semantics as processQuery().
   */
  async run(query: string, scope: string = this.defaultScope): Promise<PipelineResult> {
    validateInput(query, scope);
    const startedAt = Date.now();

    const chunks = await this.retrieval.retrieve(query, scope);
    const retrievedAt = Date.now();

    const webResults = this.webSearch.enabled
      ? await this.webSearch.retrieve(query, this.webResultLimit)
      : [];
    const searchedAt = Date.now();

    this.logger.debug?.(
      `pipeline: ${chunks.length} chunk(s), ${webResults.length} web result(s)` +
        (this.webSearch.enabled ? '' : ' (web search disabled)')
    );

    if (chunks.length === 0 && webResults.length === 0) {
      this.logger.debug?.('pipeline: no context found, skipping generation');
      return {
        answer: NO_CONTEXT_ANSWER,
        chunkCount: 0,
        webResultCount: 0,
        generated: false,
        timings: {
          retrievalMs: retrievedAt - startedAt,
          webSearchMs: searchedAt - retrievedAt,
          generationMs: 0,
          totalMs: searchedAt - startedAt,
        },
      };
    }

    const prompt = composePrompt(chunks, webResults);
    const answer = await this.completion.complete(prompt, query);
    const finishedAt = Date.now();

    return {
      answer,
      chunkCount: chunks.length,
      webResultCount: webResults.length,
      generated: true,
      timings: {
        retrievalMs: retrievedAt - startedAt,
        webSearchMs: searchedAt - retrievedAt,
        generationMs: finishedAt - searchedAt,
        totalMs: finishedAt - startedAt,
      },
    };
  }
}

function validateInput(query: string, scope: string): void {
  const issues: string[] = [];

  const queryResult = QuerySchema.safeParse(query);
  if (!queryResult.success) {
    issues.push(...queryResult.error.issues.map((issue) => issue.message));
  }
  const scopeResult = ScopeSchema.safeParse(scope);
  if (!scopeResult.success) {
    issues.push(...scopeResult.error.issues.map((issue) => issue.message));
  }

  if (issues.length > 0) {
    throw new ValidationError('Invalid query', issues);
  }
}

// ============================================================================
// FACTORY
// ============================================================================

export interface CreateRagPipelineOptions {
  fetch?: FetchLike;
  /** Replaces the Anthropic SDK client */
  completionBackend?: MessagesBackend;
  logger?: Logger;
}

/**
 * Build a pipeline wired to the configured HTTP backends.
 * Web search is enabled only when `credentials.webSearchKey` is non-blank.
 */
export function createRagPipeline(
  credentials: RagCredentials,
  config: Config,
  options: CreateRagPipelineOptions = {}
): RagPipeline {
  const { fetch, completionBackend, logger } = options;

  return new RagPipeline({
    retrieval: new RetrievalClient({
      apiKey: credentials.retrievalKey,
      baseUrl: config.retrieval.base_url,
      timeoutMs: config.retrieval.timeout_ms,
      fetch,
      logger,
    }),
    webSearch: new WebSearchClient({
      apiKey: credentials.webSearchKey,
      endpoint: config.web_search.endpoint,
      engine: config.web_search.engine,
      defaultLimit: config.web_search.num_results,
      timeoutMs: config.web_search.timeout_ms,
      fetch,
      logger,
    }),
    completion: new CompletionClient({
      apiKey: credentials.completionKey,
      model: config.completion.model,
      maxTokens: config.completion.max_tokens,
      timeoutMs: config.completion.timeout_ms,
      backend: completionBackend,
      logger,
    }),
    defaultScope: config.retrieval.default_scope,
    webResultLimit: config.web_search.num_results,
    logger,
  });
}
