/**
 * Session
 *
 * Everything one user interaction needs, held in one object that callers pass
 * around: the configured pipeline and ingestor plus the flags a front end
 * shows (keys configured, document submitted). There is no module-level
 * state; two Session instances never see each other.
 *
 * Lifecycle:
 * ```
 * new Session() ──configure(keys)──▶ ready ──ingestDocument()/processQuery()──▶ ...
 *       ▲                                                                   │
 *       └──────────────────────────── reset() ◀─────────────────────────────┘
 * ```
 */

import type { Config, IngestionMode } from '../config/schema.js';
import { DEFAULT_CONFIG } from '../config/defaults.js';
import { APIKeyError, CLIError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { MessagesBackend } from '../rag/completion-client.js';
import type { FetchLike } from '../rag/http.js';
import { createDocumentIngestor, type DocumentIngestor } from '../rag/ingestor.js';
import { createRagPipeline, type RagPipeline } from '../rag/pipeline.js';
import type { IngestionAck, PipelineResult, RagCredentials } from '../rag/types.js';

/**
 * The enumerated session fields. reset() restores exactly this shape.
 */
export interface SessionState {
  pipeline: RagPipeline | null;
  ingestor: DocumentIngestor | null;
  keysConfigured: boolean;
  documentIngested: boolean;
  lastIngestion: IngestionAck | null;
}

export interface SessionOptions {
  /** @default DEFAULT_CONFIG */
  config?: Config;
  fetch?: FetchLike;
  completionBackend?: MessagesBackend;
  logger?: Logger;
}

function initialState(): SessionState {
  return {
    pipeline: null,
    ingestor: null,
    keysConfigured: false,
    documentIngested: false,
    lastIngestion: null,
  };
}

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim().length === 0;
}

export class Session {
  readonly config: Config;
  private readonly fetchImpl: FetchLike | undefined;
  private readonly completionBackend: MessagesBackend | undefined;
  private readonly logger: Logger;
  private state: SessionState = initialState();

  constructor(options: SessionOptions = {}) {
    this.config = options.config ?? DEFAULT_CONFIG;
    this.fetchImpl = options.fetch;
    this.completionBackend = options.completionBackend;
    this.logger = options.logger ?? silentLogger;
  }

  get keysConfigured(): boolean {
    return this.state.keysConfigured;
  }

  get documentIngested(): boolean {
    return this.state.documentIngested;
  }

  get lastIngestion(): IngestionAck | null {
    return this.state.lastIngestion;
  }

  /** Whether configured queries will include web results */
  get webSearchEnabled(): boolean {
    return this.state.pipeline?.webSearchEnabled ?? false;
  }

  /** A copy of the current state, for display and tests */
  snapshot(): Readonly<SessionState> {
    return { ...this.state };
  }

  /**
   * Build fresh clients from the given keys. Replaces any previous
   * configuration but keeps the ingestion flags.
   *
   * @throws APIKeyError if the retrieval or completion key is blank
   */
  configure(credentials: RagCredentials): void {
    if (isBlank(credentials.retrievalKey)) {
      throw new APIKeyError('Retrieval', 'RAGIE_API_KEY');
    }
    if (isBlank(credentials.completionKey)) {
      throw new APIKeyError('Anthropic', 'ANTHROPIC_API_KEY');
    }

    const dependencies = {
      fetch: this.fetchImpl,
      completionBackend: this.completionBackend,
      logger: this.logger,
    };

    this.state = {
      ...this.state,
      pipeline: createRagPipeline(credentials, this.config, dependencies),
      ingestor: createDocumentIngestor(credentials.retrievalKey, this.config, dependencies),
      keysConfigured: true,
    };
  }

  /**
   * Submit a document for indexing and record the acknowledgment.
   * Returns once the backend accepts it; indexing continues in the background.
   *
   * @throws CLIError if configure() has not been called
   * @throws ValidationError for an empty URL
   * @throws IngestionError if the backend rejects the submission
   */
  async ingestDocument(
    url: string,
    name?: string,
    mode: IngestionMode = this.config.ingestion.default_mode
  ): Promise<IngestionAck> {
    const { ingestor } = this.requireConfigured();
    const ack = await ingestor.ingest({ url, name, mode });

    this.state = { ...this.state, documentIngested: true, lastIngestion: ack };
    return ack;
  }

  /**
   * Answer a question with the configured pipeline.
   *
   * @throws CLIError if configure() has not been called
   */
  async processQuery(query: string, scope?: string): Promise<string> {
    const result = await this.run(query, scope);
    return result.answer;
  }

  /**
   * Like processQuery(), but returns counts and timings as well.
   */
  async run(query: string, scope?: string): Promise<PipelineResult> {
    const { pipeline } = this.requireConfigured();
    return pipeline.run(query, scope);
  }

  /** Drop all clients and flags */
  reset(): void {
    this.state = initialState();
  }

  private requireConfigured(): { pipeline: RagPipeline; ingestor: DocumentIngestor } {
    const { pipeline, ingestor } = this.state;
    if (!this.state.keysConfigured || pipeline === null || ingestor === null) {
      throw new CLIError(
        'Session is not configured',
        'Provide the retrieval and completion API keys first'
      );
    }
    return { pipeline, ingestor };
  }
}
