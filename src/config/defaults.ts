/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and for any field the user's file omits.
 * The loader merges user config ON TOP of these defaults.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  retrieval: {
    base_url: 'https://api.ragie.ai',
    default_scope: 'tutorial',
    timeout_ms: 10000,
  },

  web_search: {
    endpoint: 'https://serpapi.com/search.json',
    engine: 'google',
    num_results: 3,
    timeout_ms: 10000,
  },

  completion: {
    model: 'claude-3-sonnet-20240229',
    max_tokens: 1024,
    timeout_ms: 30000,
  },

  ingestion: {
    default_mode: 'fast',
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.ragline/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# Ragline Configuration
# Location: ~/.ragline/config.toml
# API keys are NOT stored here: set RAGIE_API_KEY, ANTHROPIC_API_KEY
# and (optionally) SERPAPI_API_KEY in the environment or a .env file.

[retrieval]
base_url = "${DEFAULT_CONFIG.retrieval.base_url}"
default_scope = "${DEFAULT_CONFIG.retrieval.default_scope}"
timeout_ms = ${DEFAULT_CONFIG.retrieval.timeout_ms}

# Only used when SERPAPI_API_KEY is set
[web_search]
endpoint = "${DEFAULT_CONFIG.web_search.endpoint}"
engine = "${DEFAULT_CONFIG.web_search.engine}"
num_results = ${DEFAULT_CONFIG.web_search.num_results}
timeout_ms = ${DEFAULT_CONFIG.web_search.timeout_ms}

[completion]
model = "${DEFAULT_CONFIG.completion.model}"
max_tokens = ${DEFAULT_CONFIG.completion.max_tokens}
timeout_ms = ${DEFAULT_CONFIG.completion.timeout_ms}

# fast | accurate
[ingestion]
default_mode = "${DEFAULT_CONFIG.ingestion.default_mode}"
`;
