/**
 * Tests for WebSearchClient
 */

import { describe, it, expect, vi } from 'vitest';
import { WebSearchClient, formatWebResult } from '../web-search-client.js';
import { ValidationError, WebSearchError } from '../../errors/index.js';
import type { FetchLike } from '../http.js';
import {
  erroredBodyResponse,
  fetchReturning,
  jsonResponse,
  requestOf,
  timeoutError,
} from './helpers.js';

function createClient(fetchMock: FetchLike): WebSearchClient {
  return new WebSearchClient({
    apiKey: 'test-serp',
    endpoint: 'https://search.test/search.json',
    fetch: fetchMock,
  });
}

function createDisabledClient(fetchMock: FetchLike, apiKey?: string): WebSearchClient {
  return new WebSearchClient({ apiKey, fetch: fetchMock });
}

describe('formatWebResult', () => {
  it('renders a bold title followed by the snippet', () => {
    expect(formatWebResult('Leaves', 'Leaves capture light.')).toBe(
      '**Leaves**: Leaves capture light.'
    );
  });
});

describe('WebSearchClient', () => {
  describe('without a credential', () => {
    it.each([undefined, '', '   '])('is disabled for apiKey %j', (apiKey) => {
      expect(createDisabledClient(vi.fn<FetchLike>(), apiKey).enabled).toBe(false);
    });

    it('returns an empty list without any network call', async () => {
      const fetchMock = vi.fn<FetchLike>();
      const client = createDisabledClient(fetchMock);

      await expect(client.retrieve('anything at all', 5)).resolves.toEqual([]);
      expect(fetchMock).not.toHaveBeenCalled();
    });
  });

  it('is enabled with a non-blank credential', () => {
    expect(createClient(vi.fn<FetchLike>()).enabled).toBe(true);
  });

  it('sends engine, query, key and result count as query parameters', async () => {
    const fetchMock = fetchReturning(jsonResponse({ organic_results: [] }));

    await createClient(fetchMock).retrieve('what is photosynthesis', 2);

    const { url, init } = requestOf(fetchMock);
    const sent = new URL(url);
    expect(`${sent.origin}${sent.pathname}`).toBe('https://search.test/search.json');
    expect(sent.searchParams.get('engine')).toBe('google');
    expect(sent.searchParams.get('q')).toBe('what is photosynthesis');
    expect(sent.searchParams.get('api_key')).toBe('test-serp');
    expect(sent.searchParams.get('num')).toBe('2');
    expect(init.method).toBe('GET');
  });

  it('uses the default limit of 3', async () => {
    const fetchMock = fetchReturning(jsonResponse({ organic_results: [] }));

    await createClient(fetchMock).retrieve('q');

    expect(new URL(requestOf(fetchMock).url).searchParams.get('num')).toBe('3');
  });

  it('formats results and caps them at the limit', async () => {
    const fetchMock = fetchReturning(
      jsonResponse({
        organic_results: [
          { title: 'A', snippet: 'alpha', link: 'https://a.test' },
          { title: 'B', snippet: 'beta' },
          { title: 'C', snippet: 'gamma' },
        ],
      })
    );

    const results = await createClient(fetchMock).retrieve('q', 2);

    expect(results).toEqual(['**A**: alpha', '**B**: beta']);
  });

  it('renders missing titles and snippets as empty strings', async () => {
    const fetchMock = fetchReturning(
      jsonResponse({ organic_results: [{ title: 'Only title' }, { snippet: 'Only snippet' }] })
    );

    const results = await createClient(fetchMock).retrieve('q', 3);

    expect(results).toEqual(['**Only title**: ', '****: Only snippet']);
  });

  it('returns an empty list when organic_results is absent', async () => {
    const fetchMock = fetchReturning(jsonResponse({ search_metadata: {} }));

    await expect(createClient(fetchMock).retrieve('q')).resolves.toEqual([]);
  });

  it('throws WebSearchError when organic_results is not a list', async () => {
    const fetchMock = fetchReturning(jsonResponse({ organic_results: 'nope' }));

    const error = await createClient(fetchMock)
      .retrieve('q')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WebSearchError);
    expect(error).toMatchObject({
      reason: 'Malformed response: expected organic_results to be a list',
    });
  });

  it('throws WebSearchError carrying the HTTP status', async () => {
    const fetchMock = fetchReturning(
      jsonResponse({}, { status: 401, statusText: 'Unauthorized' })
    );

    const error = await createClient(fetchMock)
      .retrieve('q')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WebSearchError);
    expect(error).toMatchObject({
      kind: 'web-search',
      status: 401,
      message: 'Web search failed: 401 Unauthorized',
    });
  });

  it('throws WebSearchError with a null status on timeout', async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(timeoutError());

    const error = await createClient(fetchMock)
      .retrieve('q')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WebSearchError);
    expect(error).toMatchObject({
      status: null,
      message: 'Web search failed: Request timed out after 10000ms',
    });
  });

  it('throws WebSearchError when the error body fails mid-read', async () => {
    const fetchMock = fetchReturning(
      erroredBodyResponse(new TypeError('terminated'), { status: 502, statusText: 'Bad Gateway' })
    );

    const error = await createClient(fetchMock)
      .retrieve('q')
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(WebSearchError);
    expect(error).toMatchObject({ status: 502, message: 'Web search failed: 502 Bad Gateway' });
  });

  it.each([0, -1, 1.5])('rejects limit %d before calling the backend', async (limit) => {
    const fetchMock = vi.fn<FetchLike>();

    await expect(createClient(fetchMock).retrieve('q', limit)).rejects.toBeInstanceOf(
      ValidationError
    );
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
