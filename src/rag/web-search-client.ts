/**
 * Web Search Client
 *
 * Adds live search snippets to the grounding context. Web search is opt-in:
 * without an API key the client reports `enabled: false` and `retrieve`
 * resolves to an empty list without touching the network.
 *
 *   GET {endpoint}?engine=google&q=...&api_key=...&num=3
 *   → { "organic_results": [{ "title": "...", "snippet": "..." }] }
 */

import { z } from 'zod';
import { ValidationError, WebSearchError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { requestJson, type FetchLike } from './http.js';
import type { WebSearcher } from './types.js';

export const DEFAULT_WEB_SEARCH_ENDPOINT = 'https://serpapi.com/search.json';
export const DEFAULT_WEB_SEARCH_ENGINE = 'google';
export const DEFAULT_WEB_RESULT_LIMIT = 3;
export const DEFAULT_WEB_SEARCH_TIMEOUT_MS = 10000;

// Entries missing a title or snippet (or not objects at all) degrade to ''
const OrganicResultSchema = z
  .object({
    title: z.string().catch(''),
    snippet: z.string().catch(''),
  })
  .catch({ title: '', snippet: '' });

const WebSearchResponseSchema = z.object({
  organic_results: z.array(OrganicResultSchema).default([]),
});

const LimitSchema = z.number().int().min(1);

export interface WebSearchClientOptions {
  /** Blank or missing disables web search */
  apiKey?: string;
  /** @default 'https://serpapi.com/search.json' */
  endpoint?: string;
  /** @default 'google' */
  engine?: string;
  /** Used when retrieve() is called without a limit. @default 3 */
  defaultLimit?: number;
  /** @default 10000 */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

/**
 * Format one search hit as a single prompt line: `**title**: snippet`.
 */
export function formatWebResult(title: string, snippet: string): string {
  return `**${title}**: ${snippet}`;
}

export class WebSearchClient implements WebSearcher {
  private readonly apiKey: string | undefined;
  private readonly endpoint: string;
  private readonly engine: string;
  private readonly defaultLimit: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger;

  constructor(options: WebSearchClientOptions = {}) {
    const key = options.apiKey?.trim();
    this.apiKey = key ? key : undefined;
    this.endpoint = options.endpoint ?? DEFAULT_WEB_SEARCH_ENDPOINT;
    this.engine = options.engine ?? DEFAULT_WEB_SEARCH_ENGINE;
    this.defaultLimit = options.defaultLimit ?? DEFAULT_WEB_RESULT_LIMIT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_WEB_SEARCH_TIMEOUT_MS;
    this.fetchImpl = options.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  get enabled(): boolean {
    return this.apiKey !== undefined;
  }

  /**
   * Search the web and return at most `limit` formatted results.
   *
   * @throws ValidationError if limit is not a positive integer
   * @throws WebSearchError on a non-2xx response, timeout or network failure
   */
  async retrieve(query: string, limit: number = this.defaultLimit): Promise<string[]> {
    if (this.apiKey === undefined) {
      return [];
    }

    if (!LimitSchema.safeParse(limit).success) {
      throw new ValidationError('Invalid web result limit', [
        `limit: expected a positive integer, got ${limit}`,
      ]);
    }

    const url = new URL(this.endpoint);
    url.searchParams.set('engine', this.engine);
    url.searchParams.set('q', query);
    url.searchParams.set('api_key', this.apiKey);
    url.searchParams.set('num', String(limit));

    const outcome = await requestJson(
      { url, method: 'GET', headers: { accept: 'application/json' }, timeoutMs: this.timeoutMs },
      this.fetchImpl
    );

    if (!outcome.ok) {
      throw new WebSearchError(outcome.status, outcome.reason);
    }

    const parsed = WebSearchResponseSchema.safeParse(outcome.data);
    if (!parsed.success) {
      throw new WebSearchError(
        outcome.status,
        'Malformed response: expected organic_results to be a list'
      );
    }

    // The backend treats `num` as a hint, so cap the list here as well
    const results = parsed.data.organic_results
      .slice(0, limit)
      .map((result) => formatWebResult(result.title, result.snippet));

    this.logger.debug?.(`web search: ${results.length} result(s)`);
    return results;
  }
}
