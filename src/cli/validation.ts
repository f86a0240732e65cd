/**
 * Zod validation schemas for CLI inputs
 *
 * Commander.js parses arguments, then we validate with Zod for:
 * - Allowed values (ingestion mode)
 * - Non-blank strings
 * - Helpful error messages
 */

import { z } from 'zod';
import { IngestionModeSchema } from '../config/schema.js';
import { CLIError } from '../errors/index.js';

// ============================================================================
// GLOBAL OPTIONS SCHEMA
// ============================================================================

export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type GlobalOptionsInput = z.input<typeof GlobalOptionsSchema>;
export type GlobalOptionsOutput = z.output<typeof GlobalOptionsSchema>;

// ============================================================================
// ASK COMMAND SCHEMA
// ============================================================================

export const AskArgsSchema = z.object({
  question: z
    .string()
    .trim()
    .min(1, 'Question cannot be empty')
    .max(2000, 'Question too long (max 2000 chars)'),
});

export const AskOptionsSchema = z.object({
  scope: z.string().trim().min(1, 'Scope cannot be empty').optional(),
  web: z.boolean().default(true),
});

// ============================================================================
// INGEST COMMAND SCHEMA
// ============================================================================

export const IngestArgsSchema = z.object({
  url: z.string().trim().url('Document URL must be an absolute URL'),
});

export const IngestOptionsSchema = z.object({
  name: z.string().trim().min(1, 'Document name cannot be empty').optional(),
  mode: IngestionModeSchema.optional(),
});

// ============================================================================
// VALIDATION HELPER
// ============================================================================

/**
 * Validate input with a Zod schema and return a formatted error message
 * if validation fails.
 *
 * @example
 * ```typescript
 * const result = validateInput(IngestOptionsSchema, options);
 * if (!result.success) {
 *   throw new CLIError(result.error);
 * }
 * const validOptions = result.data;
 * ```
 */
export function validateInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown
): { success: true; data: z.output<T> } | { success: false; error: string } {
  const result = schema.safeParse(input);

  if (result.success) {
    return { success: true, data: result.data };
  }

  // Format Zod errors into a readable message
  const errors = result.error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('\n  ');

  return { success: false, error: `Validation failed:\n  ${errors}` };
}

/**
 * validateInput() for command handlers: returns the data or throws a CLIError
 * carrying the formatted issues and a usage hint.
 */
export function parseCommandInput<T extends z.ZodSchema>(
  schema: T,
  input: unknown,
  hint: string
): z.output<T> {
  const result = validateInput(schema, input);
  if (!result.success) {
    throw new CLIError(result.error, hint);
  }
  return result.data;
}
