/**
 * Document Ingestor
 *
 * Submits a document URL to the retrieval backend for indexing.
 *
 *   POST {baseUrl}/documents/url
 *   { "mode": "fast", "name": "report.pdf", "url": "https://..." }
 *   → { "id": "...", "status": "pending", ... }
 *
 * KNOWN LIMITATION: indexing is asynchronous on the backend and this module
 * returns as soon as the submission is acknowledged. A query issued right
 * after ingest() may not see the new document yet. There is no completion
 * tracking here; callers that need it must wait or re-query themselves.
 */

import { z } from 'zod';
import type { Config } from '../config/schema.js';
import { IngestionError, ValidationError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { bearerJsonHeaders, joinUrl, requestJson, type FetchLike } from './http.js';
import { DEFAULT_RETRIEVAL_BASE_URL, DEFAULT_RETRIEVAL_TIMEOUT_MS } from './retrieval-client.js';
import { DocumentSourceSchema, type DocumentSource, type IngestionAck } from './types.js';

/** Name used when none is given and the URL has no usable last segment */
export const DEFAULT_DOCUMENT_NAME = 'document';

const UploadResponseSchema = z.object({
  id: z.string().min(1),
  status: z.string().optional(),
});

/**
 * Derive a document name from the last path segment of its URL.
 *
 * @example
 * deriveDocumentName('https://example.com/files/report.pdf') // 'report.pdf'
 * deriveDocumentName('https://example.com/')                 // 'document'
 * deriveDocumentName('not a url')                            // 'document'
 */
export function deriveDocumentName(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return DEFAULT_DOCUMENT_NAME;
  }
  const lastSegment = pathname.split('/').pop();
  return lastSegment ? lastSegment : DEFAULT_DOCUMENT_NAME;
}

export interface DocumentIngestorOptions {
  apiKey: string;
  /** @default 'https://api.ragie.ai' */
  baseUrl?: string;
  /** @default 10000 */
  timeoutMs?: number;
  fetch?: FetchLike;
  logger?: Logger;
}

export class DocumentIngestor {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly logger: Logger;

  constructor(options: DocumentIngestorOptions) {
    this.apiKey = options.apiKey;
    this.baseUrl = options.baseUrl ?? DEFAULT_RETRIEVAL_BASE_URL;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RETRIEVAL_TIMEOUT_MS;
    this.fetchImpl = options.fetch;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Submit a document for indexing.
   *
   * @returns The backend's acknowledgment (document id and submitted name)
   * @throws ValidationError for an empty URL or unknown mode
   * @throws IngestionError if the backend rejects the submission or cannot be reached
   */
  async ingest(source: DocumentSource): Promise<IngestionAck> {
    const parsed = DocumentSourceSchema.safeParse(source);
    if (!parsed.success) {
      throw new ValidationError(
        'Invalid document source',
        parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      );
    }

    const { url, mode } = parsed.data;
    const explicitName = parsed.data.name?.trim();
    const name = explicitName ? explicitName : deriveDocumentName(url);

    const outcome = await requestJson(
      {
        url: joinUrl(this.baseUrl, 'documents/url'),
        method: 'POST',
        headers: bearerJsonHeaders(this.apiKey),
        body: { mode, name, url },
        timeoutMs: this.timeoutMs,
      },
      this.fetchImpl
    );

    if (!outcome.ok) {
      throw new IngestionError(outcome.status, outcome.reason);
    }

    const ack = UploadResponseSchema.safeParse(outcome.data);
    if (!ack.success) {
      throw new IngestionError(outcome.status, 'Malformed response: missing document id');
    }

    this.logger.debug?.(`ingest: submitted "${name}" (${mode}) as ${ack.data.id}`);

    return {
      id: ack.data.id,
      name,
      status: ack.data.status,
      mode,
    };
  }
}

/**
 * Build an ingestor against the configured retrieval backend.
 */
export function createDocumentIngestor(
  apiKey: string,
  config: Config,
  options: { fetch?: FetchLike; logger?: Logger } = {}
): DocumentIngestor {
  return new DocumentIngestor({
    apiKey,
    baseUrl: config.retrieval.base_url,
    timeoutMs: config.retrieval.timeout_ms,
    fetch: options.fetch,
    logger: options.logger,
  });
}
