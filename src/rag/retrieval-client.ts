/**
 * Retrieval Client
 *
 * Queries the document-retrieval backend for ranked chunks within a scope.
 *
 *   POST {baseUrl}/retrievals
 *   { "query": "...", "filters": { "scope": "tutorial" } }
 *   → { "scored_chunks": [{ "text": "...", "score": 0.8, ... }] }
 *
 * Only the chunk texts survive, in backend rank order. Scores, ids and
 * metadata are dropped here so they can never reach the prompt.
 */

import { z } from 'zod';
import { RetrievalError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { bearerJsonHeaders, joinUrl, requestJson, type FetchLike } from './http.js';
import type { ChunkRetriever } from './types.js';

export const DEFAULT_RETRIEVAL_BASE_URL = 'https://api.ragie.ai';
export const DEFAULT_RETRIEVAL_TIMEOUT_MS = 10000;

const RetrievalResponseSchema = z.object({
  scored_chunks: z.array(z.object({ text: z.string() }).passthrough()).default([]),
});

export interface RetrievalClientOptions {
  apiKey: string;
  /** @default 'https://api.ragie.ai' */
  baseUrl?: string;
  /** @default 10000 */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export class RetrievalClient implements ChunkRetriever {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger;

  constructor(options: RetrievalClientOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_RETRIEVAL_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RETRIEVAL_TIMEOUT_MS;
    this.fetchImpl = options.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Retrieve chunk texts for a query, most relevant first.
   *
   * @returns All matching chunk texts; an empty list means nothing matched
   * @throws RetrievalError on a non-2xx response, timeout, network failure,
   *   or a response that does not have the expected shape
   */
  async retrieve(query: string, scope: string): Promise<string[]> {
    const outcome = await requestJson(
      {
        url: joinUrl(this.baseUrl, 'retrievals'),
        method: 'POST',
        headers: bearerJsonHeaders(this.apiKey),
        body: { query, filters: { scope } },
        timeoutMs: this.timeoutMs,
      },
      this.fetchImpl
    );

    if (!outcome.ok) {
      throw new RetrievalError(outcome.status, outcome.reason);
    }

    const parsed = RetrievalResponseSchema.safeParse(outcome.data);
    if (!parsed.success) {
      throw new RetrievalError(
        outcome.status,
        'Malformed response: expected scored_chunks to be a list of { text } objects'
      );
    }

    const chunks = parsed.data.scored_chunks.map((chunk) => chunk.text);
    this.logger.debug?.(`retrieval: ${chunks.length} chunk(s) for scope "${scope}"`);
    return chunks;
  }
}
