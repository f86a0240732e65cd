/**
 * Error handling module for Ragline
 *
 * This module exports:
 * - Custom error classes for different error types
 * - Backend error kinds raised by the pipeline clients
 * - Error formatting and handling utilities
 *
 * Usage:
 *   import { ConfigError, handleError } from './errors/index.js';
 *
 *   throw new ConfigError('Invalid option', 'Try: ragline config list');
 */

// Error types
export {
  CLIError,
  ConfigError,
  APIKeyError,
  ValidationError,
} from './types.js';

// Backend errors
export {
  BackendError,
  RetrievalError,
  WebSearchError,
  CompletionError,
  IngestionError,
  isBackendError,
  serviceLabel,
  type BackendErrorKind,
} from './backend.js';

// Error handling utilities
export {
  formatError,
  toErrorOutput,
  getExitCode,
  handleError,
  createGlobalErrorHandler,
  type ErrorHandlerOptions,
  type ErrorOutput,
  type ErrorHandlerOptionsSource,
} from './handler.js';
