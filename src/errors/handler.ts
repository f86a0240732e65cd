/**
 * Error reporting for the CLI.
 *
 * Every failure is first reduced to an `ErrorOutput` record. `--json` prints
 * that record as is; the default text mode renders it line by line, adding
 * which remote service failed and whether it answered at all.
 */

import chalk from 'chalk';
import { CLIError } from './types.js';
import { BackendError, serviceLabel, type BackendErrorKind } from './backend.js';

export interface ErrorHandlerOptions {
  /** Include stack traces */
  verbose?: boolean;
  /** Print the ErrorOutput record as JSON */
  json?: boolean;
}

/** Options fixed up front, or read when an error actually arrives */
export type ErrorHandlerOptionsSource = ErrorHandlerOptions | (() => ErrorHandlerOptions);

export interface ErrorOutput {
  error: string;
  code: number;
  hint?: string;
  backend?: {
    kind: BackendErrorKind;
    /** null when the service never responded */
    status: number | null;
  };
  stack?: string;
}

const VERBOSE_HINT = 'Run with --verbose for more details';

/**
 * Reduce any thrown value to the record printed by `--json`.
 */
export function toErrorOutput(error: unknown, verbose = false): ErrorOutput {
  if (error instanceof BackendError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      backend: { kind: error.kind, status: error.status },
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof CLIError) {
    return {
      error: error.message,
      code: error.code,
      hint: error.hint,
      stack: verbose ? error.stack : undefined,
    };
  }
  if (error instanceof Error) {
    return { error: error.message, code: 1, stack: verbose ? error.stack : undefined };
  }
  return { error: String(error), code: 1 };
}

/**
 * Format an error for stderr. Pure, so tests need no process.exit stub.
 */
export function formatError(error: unknown, options: ErrorHandlerOptions = {}): string {
  const { verbose = false, json = false } = options;
  const output = toErrorOutput(error, verbose);

  if (json) {
    return JSON.stringify(output, null, 2);
  }

  // Unexpected errors have no hint of their own
  const unexpected = error instanceof Error && !(error instanceof CLIError);
  const hint = output.hint ?? (unexpected && !verbose ? VERBOSE_HINT : undefined);

  return renderText({ ...output, hint });
}

function renderText(output: ErrorOutput): string {
  const lines = [chalk.red('Error: ') + output.error];

  if (output.backend) {
    lines.push(chalk.dim('Service: ') + describeBackend(output.backend));
  }
  if (output.hint) {
    lines.push(chalk.dim('Hint: ') + output.hint);
  }
  if (output.stack) {
    lines.push('', chalk.dim('Stack trace:'), chalk.dim(output.stack));
  }

  return lines.join('\n');
}

function describeBackend(backend: NonNullable<ErrorOutput['backend']>): string {
  const reached = backend.status === null ? 'no response' : `HTTP ${backend.status}`;
  return `${serviceLabel(backend.kind)} (${reached})`;
}

/**
 * CLIError carries its own exit code; anything else exits with 1.
 */
export function getExitCode(error: unknown): number {
  return error instanceof CLIError ? error.code : 1;
}

/**
 * Print the error to stderr and exit with its code.
 */
export function handleError(error: unknown, options: ErrorHandlerOptions = {}): never {
  console.error(formatError(error, options));
  process.exit(getExitCode(error));
}

/**
 * Build a listener for `uncaughtException` and `unhandledRejection`.
 *
 * Pass a function when the options are only known later, e.g. global flags
 * that commander has not parsed yet when the listener is installed.
 */
export function createGlobalErrorHandler(
  options: ErrorHandlerOptionsSource = {}
): (error: unknown) => never {
  return (error: unknown) =>
    handleError(error, typeof options === 'function' ? options() : options);
}
