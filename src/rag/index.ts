/**
 * RAG Module
 *
 * Retrieval-augmented question answering over a hosted document index,
 * optional web search, and Claude.
 *
 * MAIN ENTRY POINT:
 * ```typescript
 * import { createRagPipeline } from './rag/index.js';
 * const pipeline = createRagPipeline(credentials, config);
 * const answer = await pipeline.processQuery('How do refunds work?', 'handbook');
 * ```
 */

// Orchestrator
export {
  RagPipeline,
  createRagPipeline,
  NO_CONTEXT_ANSWER,
  DEFAULT_SCOPE,
  type RagPipelineOptions,
  type CreateRagPipelineOptions,
} from './pipeline.js';

// Backend clients
export {
  RetrievalClient,
  DEFAULT_RETRIEVAL_BASE_URL,
  type RetrievalClientOptions,
} from './retrieval-client.js';
export {
  WebSearchClient,
  formatWebResult,
  DEFAULT_WEB_RESULT_LIMIT,
  type WebSearchClientOptions,
} from './web-search-client.js';
export {
  CompletionClient,
  DEFAULT_COMPLETION_MODEL,
  DEFAULT_MAX_TOKENS,
  type CompletionClientOptions,
  type CompletionRequest,
  type CompletionResponse,
  type MessagesBackend,
} from './completion-client.js';
export {
  DocumentIngestor,
  createDocumentIngestor,
  deriveDocumentName,
  DEFAULT_DOCUMENT_NAME,
  type DocumentIngestorOptions,
} from './ingestor.js';

// Prompt assembly
export {
  composePrompt,
  PERSONA_INSTRUCTIONS,
  INSUFFICIENT_CONTEXT_INSTRUCTION,
  DOCUMENT_SECTION_TITLE,
  WEB_SECTION_TITLE,
} from './prompt-composer.js';

// HTTP plumbing
export { requestJson, type FetchLike, type HttpOutcome, type JsonRequest } from './http.js';

// Types
export {
  QuerySchema,
  ScopeSchema,
  DocumentSourceSchema,
  type DocumentSource,
  type ChunkRetriever,
  type WebSearcher,
  type Completer,
  type IngestionAck,
  type PipelineResult,
  type QueryTimings,
  type RagCredentials,
} from './types.js';
