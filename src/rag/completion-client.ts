/**
 * Completion Client
 *
 * Sends the grounding prompt (as the system prompt) and the user's question
 * (as the single user message) to Claude through the Anthropic SDK.
 *
 * The SDK's own retries are switched off: a failed call surfaces once as a
 * CompletionError, and any retry policy belongs to the caller.
 *
 * SECURITY: the API key is handed to the SDK and never logged.
 */

import Anthropic from '@anthropic-ai/sdk';
import { CompletionError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import type { Completer } from './types.js';

// ============================================================================
// TYPES
// ============================================================================

export interface CompletionRequest {
  model: string;
  max_tokens: number;
  system: string;
  messages: Array<{ role: 'user'; content: string }>;
}

export interface CompletionResponse {
  content: Array<{ type: string; text?: string }>;
}

/**
 * The slice of the SDK's `messages` resource this client uses.
 * `new Anthropic(...).messages` satisfies it; tests pass a fake.
 */
export interface MessagesBackend {
  create(body: CompletionRequest): Promise<CompletionResponse>;
}

export interface CompletionClientOptions {
  apiKey: string;
  /** @default 'claude-3-sonnet-20240229' */
  model?: string;
  /** @default 1024 */
  maxTokens?: number;
  /** @default 30000 */
  timeoutMs?: number;
  /** Replaces the SDK client (tests, proxies) */
  backend?: MessagesBackend;
  logger?: Logger;
}

// ============================================================================
// CONSTANTS
// ============================================================================

export const DEFAULT_COMPLETION_MODEL = 'claude-3-sonnet-20240229';
export const DEFAULT_MAX_TOKENS = 1024;
export const DEFAULT_COMPLETION_TIMEOUT_MS = 30000;

// ============================================================================
// CLIENT
// ============================================================================

export class CompletionClient implements Completer {
  readonly model: string;
  readonly maxTokens: number;
  private readonly messages: MessagesBackend;
  private readonly logger: Logger;

  constructor(options: CompletionClientOptions) {
    this.model = options.model ?? DEFAULT_COMPLETION_MODEL;
    this.maxTokens = options.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.logger = options.logger ?? silentLogger;
    this.messages =
      options.backend ??
      new Anthropic({
        apiKey: options.apiKey,
        timeout: options.timeoutMs ?? DEFAULT_COMPLETION_TIMEOUT_MS,
        maxRetries: 0,
      }).messages;
  }

  /**
   * Generate an answer.
   *
   * @returns Text of the first text block in the response ('' if there is none)
   * @throws CompletionError if the backend call fails for any reason
   */
  async complete(systemPrompt: string, userQuery: string): Promise<string> {
    let response: CompletionResponse;
    try {
      response = await this.messages.create({
        model: this.model,
        max_tokens: this.maxTokens,
        system: systemPrompt,
        messages: [{ role: 'user', content: userQuery }],
      });
    } catch (error) {
      throw toCompletionError(error);
    }

    const firstText = response.content.find((block) => block.type === 'text');
    this.logger.debug?.(
      `completion: ${response.content.length} content block(s) from ${this.model}`
    );
    return firstText?.text ?? '';
  }
}

/**
 * Map whatever the SDK threw onto a CompletionError.
 * SDK API errors expose `status`; connection errors and timeouts do not.
 */
function toCompletionError(error: unknown): CompletionError {
  if (error instanceof CompletionError) {
    return error;
  }

  const status =
    typeof error === 'object' &&
    error !== null &&
    'status' in error &&
    typeof error.status === 'number'
      ? error.status
      : null;

  let reason = error instanceof Error ? error.message : String(error);
  // SDK messages start with the status code, which BackendError already prints
  if (status !== null && reason.startsWith(`${status} `)) {
    reason = reason.slice(`${status} `.length);
  }

  return new CompletionError(status, reason);
}
