/**
 * RAG Pipeline Types
 *
 * Seams between the orchestrator and its backends. The pipeline depends on
 * these interfaces, not on the HTTP clients, so tests (and alternative
 * backends) can stand in for any step.
 */

import { z } from 'zod';
import { IngestionModeSchema, type IngestionMode } from '../config/schema.js';

// ============================================================================
// INPUT SCHEMAS
// ============================================================================

/**
 * A user question. Must contain non-whitespace text; the text itself is
 * passed on unchanged.
 */
export const QuerySchema = z
  .string()
  .refine((query) => query.trim().length > 0, 'query must contain non-whitespace text');

/** A corpus partition tag sent as the retrieval scope filter */
export const ScopeSchema = z
  .string()
  .refine((scope) => scope.trim().length > 0, 'scope must not be blank');

/**
 * A document to submit for indexing.
 */
export const DocumentSourceSchema = z.object({
  url: z
    .string()
    .refine((url) => url.trim().length > 0, 'url must not be empty'),
  /** Display name; derived from the URL when omitted */
  name: z.string().optional(),
  mode: IngestionModeSchema,
});

export type DocumentSource = z.infer<typeof DocumentSourceSchema>;

// ============================================================================
// BACKEND SEAMS
// ============================================================================

/**
 * Fetches ranked text fragments for a query within a scope.
 * Either returns the full (possibly empty) list or throws.
 */
export interface ChunkRetriever {
  retrieve(query: string, scope: string): Promise<string[]>;
}

/**
 * Optional live web search.
 * When `enabled` is false the pipeline never calls `retrieve`.
 */
export interface WebSearcher {
  readonly enabled: boolean;
  retrieve(query: string, limit?: number): Promise<string[]>;
}

/**
 * Generates the final answer from a grounding prompt and the user's question.
 */
export interface Completer {
  complete(systemPrompt: string, userQuery: string): Promise<string>;
}

// ============================================================================
// RESULTS
// ============================================================================

/**
 * Backend acknowledgment of a document submission.
 * Receiving one does NOT mean the document is searchable yet.
 */
export interface IngestionAck {
  /** Backend document identifier */
  id: string;
  /** Name the document was submitted under */
  name: string;
  /** Indexing status reported at submission time, if any */
  status?: string;
  mode: IngestionMode;
}

export interface QueryTimings {
  retrievalMs: number;
  webSearchMs: number;
  /** 0 when generation was skipped */
  generationMs: number;
  totalMs: number;
}

/**
 * Everything one pipeline run produced.
 */
export interface PipelineResult {
  answer: string;
  chunkCount: number;
  webResultCount: number;
  /** False when no context was found and the sentinel answer was returned */
  generated: boolean;
  timings: QueryTimings;
}

/**
 * Credentials for the three backends. Immutable once a pipeline is built.
 */
export interface RagCredentials {
  readonly retrievalKey: string;
  readonly completionKey: string;
  /** Omit (or leave blank) to disable web search */
  readonly webSearchKey?: string;
}
