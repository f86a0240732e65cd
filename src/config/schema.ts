/**
 * Configuration Schema
 *
 * Defines the shape of ~/.ragline/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Indexing mode sent with a document upload.
 * `fast` indexes quickly; `accurate` spends longer extracting layout and tables.
 */
export const IngestionModeSchema = z.enum(['fast', 'accurate']);
export type IngestionMode = z.infer<typeof IngestionModeSchema>;

/**
 * Document-retrieval backend
 */
export const RetrievalConfigSchema = z.object({
  base_url: z.string().url().describe('Base URL of the retrieval API'),
  default_scope: z
    .string()
    .min(1)
    .describe('Scope filter used when a query does not name one'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(120000)
    .describe('Timeout for retrieval and upload requests (1000-120000)'),
});

/**
 * Web-search backend (only used when SERPAPI_API_KEY is set)
 */
export const WebSearchConfigSchema = z.object({
  endpoint: z.string().url().describe('Search endpoint URL'),
  engine: z.string().min(1).describe('Search engine name passed to the backend'),
  num_results: z
    .number()
    .int()
    .min(1)
    .max(10)
    .describe('Maximum web results added to the prompt (1-10)'),
  timeout_ms: z.number().int().min(1000).max(120000),
});

/**
 * Language-model backend
 */
export const CompletionConfigSchema = z.object({
  model: z.string().min(1).describe('Anthropic model identifier'),
  max_tokens: z
    .number()
    .int()
    .min(1)
    .max(8192)
    .describe('Maximum tokens in the generated answer'),
  timeout_ms: z.number().int().min(1000).max(600000),
});

/**
 * Document ingestion
 */
export const IngestionConfigSchema = z.object({
  default_mode: IngestionModeSchema.describe('Indexing mode when --mode is omitted'),
});

/**
 * Root configuration schema
 * This is the complete shape of config.toml
 */
export const ConfigSchema = z.object({
  retrieval: RetrievalConfigSchema,
  web_search: WebSearchConfigSchema,
  completion: CompletionConfigSchema,
  ingestion: IngestionConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 * Every field becomes optional, allowing sparse config files
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;
