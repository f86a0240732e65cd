/**
 * Startup Validation Tests
 *
 * Tests for CLI startup key validation.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../env.js', () => ({
  hasApiKey: vi.fn(),
  SERVICE_ENV_VARS: {
    retrieval: 'RAGIE_API_KEY',
    completion: 'ANTHROPIC_API_KEY',
    'web-search': 'SERPAPI_API_KEY',
  },
  SETUP_INSTRUCTIONS: {
    retrieval: 'Set RAGIE_API_KEY in your environment',
    completion: 'Set ANTHROPIC_API_KEY in your environment',
    'web-search': 'Set SERPAPI_API_KEY in your environment',
  },
}));

import { hasApiKey } from '../env.js';
import {
  validateStartupConfig,
  getValidationOptionsForCommand,
} from '../startup-validation.js';

describe('validateStartupConfig', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('is valid when every required key is present', () => {
    vi.mocked(hasApiKey).mockReturnValue(true);

    const result = validateStartupConfig({ required: ['retrieval', 'completion'] });

    expect(result).toEqual({ valid: true, warnings: [], errors: [], hints: [] });
  });

  it('reports each missing required key with its setup hint', () => {
    vi.mocked(hasApiKey).mockImplementation((service) => service === 'retrieval');

    const result = validateStartupConfig({ required: ['retrieval', 'completion'] });

    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(['ANTHROPIC_API_KEY is not set']);
    expect(result.hints).toEqual(['Set ANTHROPIC_API_KEY in your environment']);
  });

  it('downgrades missing optional keys to warnings', () => {
    vi.mocked(hasApiKey).mockImplementation((service) => service !== 'web-search');

    const result = validateStartupConfig({ required: ['retrieval'], optional: ['web-search'] });

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual(['SERPAPI_API_KEY is not set; web-search is disabled']);
  });

  it('checks nothing when no services are named', () => {
    const result = validateStartupConfig();

    expect(result.valid).toBe(true);
    expect(hasApiKey).not.toHaveBeenCalled();
  });
});

describe('getValidationOptionsForCommand', () => {
  it('requires retrieval and completion keys for ask', () => {
    expect(getValidationOptionsForCommand('ask')).toEqual({
      required: ['retrieval', 'completion'],
      optional: ['web-search'],
    });
  });

  it('requires only the retrieval key for ingest', () => {
    expect(getValidationOptionsForCommand('ingest').required).toEqual(['retrieval']);
  });

  it('requires nothing for other commands', () => {
    expect(getValidationOptionsForCommand('config')).toEqual({ required: [], optional: [] });
  });
});
