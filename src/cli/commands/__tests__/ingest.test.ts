/**
 * Tests for ingest command
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Command } from 'commander';
import { createIngestCommand, INDEXING_NOTICE, type IngestorFactory } from '../ingest.js';
import type { CommandContext } from '../../types.js';
import * as configLoader from '../../../config/loader.js';
import * as env from '../../../config/env.js';
import { DEFAULT_CONFIG } from '../../../config/defaults.js';
import { DocumentIngestor } from '../../../rag/ingestor.js';
import { APIKeyError, CLIError, IngestionError } from '../../../errors/index.js';
import {
  fetchReturning,
  jsonBodyOf,
  jsonResponse,
  requestOf,
  type FetchMock,
} from '../../../rag/__tests__/helpers.js';

vi.mock('../../../config/loader.js', () => ({
  loadConfig: vi.fn(),
}));

vi.mock('../../../config/env.js', () => ({
  getApiKey: vi.fn(),
}));

describe('createIngestCommand', () => {
  let mockContext: CommandContext;
  let logOutput: string[];
  let warn: ReturnType<typeof vi.fn>;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;
  let fetchMock: FetchMock;

  const createIngestor: IngestorFactory = (apiKey, config, logger) =>
    new DocumentIngestor({ apiKey, baseUrl: config.retrieval.base_url, fetch: fetchMock, logger });

  async function runIngest(args: string[]): Promise<void> {
    const program = new Command();
    program.addCommand(createIngestCommand(() => mockContext, createIngestor));
    await program.parseAsync(['node', 'test', 'ingest', ...args]);
  }

  beforeEach(() => {
    logOutput = [];
    warn = vi.fn();
    mockContext = {
      options: { verbose: false, json: false },
      log: (msg: string) => logOutput.push(msg),
      debug: vi.fn(),
      warn,
      error: vi.fn(),
    };
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

    vi.mocked(env.getApiKey).mockReturnValue('test-ragie');
    vi.mocked(configLoader.loadConfig).mockReturnValue(DEFAULT_CONFIG);
    fetchMock = fetchReturning(jsonResponse({ id: 'doc-42', status: 'pending' }));
  });

  afterEach(() => {
    vi.clearAllMocks();
    consoleLogSpy.mockRestore();
  });

  it('submits the document with the derived name and default mode', async () => {
    await runIngest(['https://example.com/files/report.pdf']);

    expect(requestOf(fetchMock).url).toBe('https://api.ragie.ai/documents/url');
    expect(jsonBodyOf(fetchMock)).toEqual({
      mode: 'fast',
      name: 'report.pdf',
      url: 'https://example.com/files/report.pdf',
    });
    expect(logOutput[0]).toContain('report.pdf');
    expect(logOutput[1]).toContain('doc-42');
  });

  it('warns that indexing is asynchronous', async () => {
    await runIngest(['https://example.com/files/report.pdf']);

    expect(warn).toHaveBeenCalledWith(INDEXING_NOTICE);
  });

  it('passes --name and --mode', async () => {
    await runIngest(['https://example.com/', '--name', 'Handbook', '--mode', 'accurate']);

    expect(jsonBodyOf(fetchMock)).toEqual({
      mode: 'accurate',
      name: 'Handbook',
      url: 'https://example.com/',
    });
  });

  it('falls back to the default name for a bare URL', async () => {
    await runIngest(['https://example.com/']);

    expect(jsonBodyOf(fetchMock)).toMatchObject({ name: 'document' });
  });

  it('outputs the acknowledgment as JSON', async () => {
    mockContext.options.json = true;

    await runIngest(['https://example.com/files/report.pdf']);

    expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual({
      success: true,
      document: { id: 'doc-42', name: 'report.pdf', status: 'pending', mode: 'fast' },
      indexing: 'async',
    });
  });

  it('rejects an unknown mode before uploading', async () => {
    const error = await runIngest(['https://example.com/a.pdf', '--mode', 'thorough']).catch(
      (e: unknown) => e
    );

    expect(error).toBeInstanceOf(CLIError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('rejects a URL that is not absolute', async () => {
    await expect(runIngest(['report.pdf'])).rejects.toThrow(
      'Validation failed:\n  url: Document URL must be an absolute URL'
    );
  });

  it('requires the retrieval key', async () => {
    vi.mocked(env.getApiKey).mockReturnValue(undefined);

    await expect(runIngest(['https://example.com/a.pdf'])).rejects.toBeInstanceOf(APIKeyError);
  });

  it('propagates upload failures', async () => {
    fetchMock = fetchReturning(jsonResponse({}, { status: 422, statusText: 'Unprocessable Entity' }));

    const error = await runIngest(['https://example.com/a.pdf']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(IngestionError);
    expect(error).toMatchObject({ status: 422 });
    expect(warn).not.toHaveBeenCalled();
  });
});
