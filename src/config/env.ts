/**
 * Environment Variable Handler
 *
 * Loads and provides secure access to backend API keys.
 * Supports .env files for local development via dotenv.
 *
 * SECURITY NOTES:
 * - Keys are NEVER logged, even in verbose mode
 * - Keys are NEVER included in error messages
 * - Only key presence/absence is reported
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Environment variable schema with optional values.
 * Keys are not required at load time - only the command being run checks
 * for the keys it needs.
 */
export const EnvSchema = z.object({
  RAGIE_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  SERPAPI_API_KEY: z.string().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

/** Backend services that take a credential */
export type ServiceName = 'retrieval' | 'completion' | 'web-search';

/** Env var holding each service's credential */
export const SERVICE_ENV_VARS: Record<ServiceName, keyof EnvVars> = {
  retrieval: 'RAGIE_API_KEY',
  completion: 'ANTHROPIC_API_KEY',
  'web-search': 'SERPAPI_API_KEY',
};

// ============================================================================
// PRIVATE STATE
// ============================================================================

/**
 * Cached environment variables (loaded once at first access).
 * Access through getEnv(); _clearEnvCache() resets it for tests.
 */
let _envCache: EnvVars | null = null;

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  _envCache = EnvSchema.parse({
    RAGIE_API_KEY: process.env.RAGIE_API_KEY,
    ANTHROPIC_API_KEY: process.env.ANTHROPIC_API_KEY,
    SERPAPI_API_KEY: process.env.SERPAPI_API_KEY,
  });

  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  return loadEnv()[key];
}

/**
 * Check if a service's API key is configured (non-blank).
 * Returns true/false WITHOUT exposing the key value.
 */
export function hasApiKey(service: ServiceName): boolean {
  return Boolean(getEnv(SERVICE_ENV_VARS[service])?.trim());
}

/**
 * Get a service key, treating blank values as absent.
 */
export function getApiKey(service: ServiceName): string | undefined {
  const value = getEnv(SERVICE_ENV_VARS[service])?.trim();
  return value ? value : undefined;
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to mock different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Service-specific setup instructions, shown when a required key is missing.
 */
export const SETUP_INSTRUCTIONS: Record<ServiceName, string> = {
  retrieval: `
To use the document index:

1. Create an API key in the Ragie dashboard (https://ragie.ai)
2. Set the environment variable:

   export RAGIE_API_KEY="..."

   or add RAGIE_API_KEY=... to a .env file in the working directory
`.trim(),

  completion: `
To generate answers with Claude:

1. Get your API key from https://console.anthropic.com/
2. Set the environment variable:

   export ANTHROPIC_API_KEY="..."

   or add ANTHROPIC_API_KEY=... to a .env file in the working directory
`.trim(),

  'web-search': `
Web search is optional. To add live search snippets to answers:

1. Get an API key from https://serpapi.com/
2. Set the environment variable:

   export SERPAPI_API_KEY="..."
`.trim(),
};
