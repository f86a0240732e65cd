/**
 * Backend Errors
 *
 * One error class per remote service the pipeline talks to. Each carries the
 * HTTP status (null when no response arrived: timeout or network failure)
 * and the reason phrase, plus a `kind` discriminant so callers can branch
 * without inspecting message strings.
 *
 * Exit code 7: Backend error
 */

import { CLIError } from './types.js';

/** Which remote service failed */
export type BackendErrorKind = 'retrieval' | 'web-search' | 'completion' | 'ingestion';

const SERVICE_LABELS: Record<BackendErrorKind, string> = {
  retrieval: 'Retrieval',
  'web-search': 'Web search',
  completion: 'Completion',
  ingestion: 'Document upload',
};

const SERVICE_HINTS: Record<BackendErrorKind, string> = {
  retrieval: 'Check RAGIE_API_KEY and retrieval.base_url, then try again',
  'web-search': 'Check SERPAPI_API_KEY, or unset it to disable web search',
  completion: 'Check ANTHROPIC_API_KEY and completion.model, then try again',
  ingestion: 'Check that the document URL is publicly reachable and RAGIE_API_KEY is valid',
};

/** Human-readable name of a service, as used in messages */
export function serviceLabel(kind: BackendErrorKind): string {
  return SERVICE_LABELS[kind];
}

/**
 * Base class for failures of a remote call.
 *
 * @example
 * ```typescript
 * try {
 *   await session.processQuery(question);
 * } catch (error) {
 *   if (isBackendError(error, 'retrieval') && error.status === 401) {
 *     // re-prompt for the retrieval key
 *   }
 * }
 * ```
 */
export class BackendError extends CLIError {
  public readonly kind: BackendErrorKind;
  /** HTTP status, or null if the request never got a response */
  public readonly status: number | null;
  /** Reason phrase from the backend, or a description of the transport failure */
  public readonly reason: string;

  constructor(kind: BackendErrorKind, status: number | null, reason: string) {
    const detail = status === null ? reason : `${status} ${reason}`.trim();
    super(`${SERVICE_LABELS[kind]} failed: ${detail}`, SERVICE_HINTS[kind], 7);
    this.name = 'BackendError';
    this.kind = kind;
    this.status = status;
    this.reason = reason;
  }
}

/** Thrown when the document-retrieval backend rejects or fails a query */
export class RetrievalError extends BackendError {
  declare readonly kind: 'retrieval';

  constructor(status: number | null, reason: string) {
    super('retrieval', status, reason);
    this.name = 'RetrievalError';
  }
}

/** Thrown when the web-search backend fails */
export class WebSearchError extends BackendError {
  declare readonly kind: 'web-search';

  constructor(status: number | null, reason: string) {
    super('web-search', status, reason);
    this.name = 'WebSearchError';
  }
}

/** Thrown when the language-model call fails (network, auth, rate limit) */
export class CompletionError extends BackendError {
  declare readonly kind: 'completion';

  constructor(status: number | null, reason: string) {
    super('completion', status, reason);
    this.name = 'CompletionError';
  }
}

/** Thrown when the backend refuses a document submission */
export class IngestionError extends BackendError {
  declare readonly kind: 'ingestion';

  constructor(status: number | null, reason: string) {
    super('ingestion', status, reason);
    this.name = 'IngestionError';
  }
}

/**
 * Narrow an unknown error to a BackendError, optionally of a specific kind.
 */
export function isBackendError(error: unknown): error is BackendError;
export function isBackendError<K extends BackendErrorKind>(
  error: unknown,
  kind: K
): error is BackendError & { kind: K };
export function isBackendError(error: unknown, kind?: BackendErrorKind): boolean {
  if (!(error instanceof BackendError)) {
    return false;
  }
  return kind === undefined || error.kind === kind;
}
