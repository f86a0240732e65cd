/**
 * Startup Configuration Validation
 *
 * Checks, before a command runs, that the backend keys it needs are present.
 * Missing required keys are errors; a missing web-search key only means
 * answers are grounded on documents alone, so it is reported as a warning.
 */

import chalk from 'chalk';
import { hasApiKey, SETUP_INSTRUCTIONS, SERVICE_ENV_VARS, type ServiceName } from './env.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Result of startup validation.
 */
export interface StartupValidationResult {
  /** Whether all required keys are present */
  valid: boolean;
  /** Warning messages (non-fatal issues) */
  warnings: string[];
  /** Error messages (the command cannot run) */
  errors: string[];
  /** Setup instructions for each error */
  hints: string[];
}

/**
 * Which services a command depends on.
 */
export interface StartupValidationOptions {
  /** Services whose keys must be present */
  required?: ServiceName[];
  /** Services whose keys are nice to have */
  optional?: ServiceName[];
}

// ============================================================================
// Validation Functions
// ============================================================================

/**
 * Validate API keys at CLI startup.
 *
 * @example
 * const result = validateStartupConfig({ required: ['retrieval'] });
 * if (!result.valid) printStartupValidation(result);
 */
export function validateStartupConfig(
  options: StartupValidationOptions = {}
): StartupValidationResult {
  const { required = [], optional = [] } = options;
  const warnings: string[] = [];
  const errors: string[] = [];
  const hints: string[] = [];

  for (const service of required) {
    if (!hasApiKey(service)) {
      errors.push(`${SERVICE_ENV_VARS[service]} is not set`);
      hints.push(SETUP_INSTRUCTIONS[service]);
    }
  }

  for (const service of optional) {
    if (!hasApiKey(service)) {
      warnings.push(`${SERVICE_ENV_VARS[service]} is not set; ${service} is disabled`);
    }
  }

  return {
    valid: errors.length === 0,
    warnings,
    errors,
    hints,
  };
}

/**
 * Print startup validation warnings/errors to console.
 *
 * @param result - Validation result from validateStartupConfig
 * @param verbose - Whether to show warnings (errors are always shown)
 */
export function printStartupValidation(
  result: StartupValidationResult,
  verbose = false
): void {
  for (const error of result.errors) {
    console.error(chalk.red(`✗ ${error}`));
  }

  for (const hint of result.hints) {
    console.error(chalk.dim(hint.replace(/^/gm, '  ')));
  }

  if (verbose) {
    for (const warning of result.warnings) {
      console.warn(chalk.yellow(`⚠ ${warning}`));
    }
  }
}

/**
 * Services each command needs. Commands not listed need none.
 */
export const COMMAND_REQUIREMENTS: Record<string, Required<StartupValidationOptions>> = {
  ask: { required: ['retrieval', 'completion'], optional: ['web-search'] },
  ingest: { required: ['retrieval'], optional: [] },
};

/**
 * Get validation options for a command.
 *
 * @param command - Command name (e.g., 'ask', 'config')
 */
export function getValidationOptionsForCommand(
  command: string
): StartupValidationOptions {
  return COMMAND_REQUIREMENTS[command] ?? { required: [], optional: [] };
}
