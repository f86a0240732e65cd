/**
 * Tests for the JSON-over-HTTP helper
 */

import { describe, it, expect, vi } from 'vitest';
import { bearerJsonHeaders, joinUrl, requestJson, type FetchLike } from '../http.js';
import {
  erroredBodyResponse,
  fetchReturning,
  jsonResponse,
  requestOf,
  timeoutError,
  trackedBodyResponse,
} from './helpers.js';

describe('requestJson', () => {
  it('returns the decoded body for a 2xx response', async () => {
    const fetchMock = fetchReturning(jsonResponse({ hello: 'world' }));

    const outcome = await requestJson(
      { url: 'https://api.test/ping', method: 'GET', timeoutMs: 1000 },
      fetchMock
    );

    expect(outcome).toEqual({ ok: true, status: 200, data: { hello: 'world' } });
  });

  it('serializes the body and forwards method and headers', async () => {
    const fetchMock = fetchReturning(jsonResponse({}));

    await requestJson(
      {
        url: 'https://api.test/items',
        method: 'POST',
        headers: { 'x-test': '1' },
        body: { a: 1 },
        timeoutMs: 1000,
      },
      fetchMock
    );

    const { url, init } = requestOf(fetchMock);
    expect(url).toBe('https://api.test/items');
    expect(init.method).toBe('POST');
    expect(init.headers).toEqual({ 'x-test': '1' });
    expect(init.body).toBe('{"a":1}');
    expect(init.signal).toBeInstanceOf(AbortSignal);
  });

  it('sends no body for GET requests', async () => {
    const fetchMock = fetchReturning(jsonResponse({}));

    await requestJson({ url: 'https://api.test/', method: 'GET', timeoutMs: 1000 }, fetchMock);

    expect(requestOf(fetchMock).init.body).toBeUndefined();
  });

  it('reports status and reason phrase for a non-2xx response', async () => {
    const fetchMock = fetchReturning(
      jsonResponse({ detail: 'down' }, { status: 503, statusText: 'Service Unavailable' })
    );

    const outcome = await requestJson(
      { url: 'https://api.test/', method: 'GET', timeoutMs: 1000 },
      fetchMock
    );

    expect(outcome).toEqual({ ok: false, status: 503, reason: 'Service Unavailable' });
  });

  it('falls back to the standard reason phrase when the response has none', async () => {
    const fetchMock = fetchReturning(new Response('', { status: 404 }));

    const outcome = await requestJson(
      { url: 'https://api.test/', method: 'GET', timeoutMs: 1000 },
      fetchMock
    );

    expect(outcome).toEqual({ ok: false, status: 404, reason: 'Not Found' });
  });

  it('cancels the unread body of a non-2xx response', async () => {
    const { response, wasCancelled } = trackedBodyResponse({
      status: 503,
      statusText: 'Service Unavailable',
    });
    const fetchMock = fetchReturning(response);

    const outcome = await requestJson(
      { url: 'https://api.test/', method: 'GET', timeoutMs: 1000 },
      fetchMock
    );

    expect(outcome).toEqual({ ok: false, status: 503, reason: 'Service Unavailable' });
    expect(wasCancelled()).toBe(true);
  });

  it('keeps the HTTP status when the error body stream has already failed', async () => {
    const fetchMock = fetchReturning(
      erroredBodyResponse(timeoutError(), { status: 503, statusText: 'Service Unavailable' })
    );

    const outcome = await requestJson(
      { url: 'https://api.test/', method: 'GET', timeoutMs: 1000 },
      fetchMock
    );

    expect(outcome).toEqual({ ok: false, status: 503, reason: 'Service Unavailable' });
  });

  it('reports a timeout with a null status', async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(timeoutError());

    const outcome = await requestJson(
      { url: 'https://api.test/', method: 'GET', timeoutMs: 250 },
      fetchMock
    );

    expect(outcome).toEqual({
      ok: false,
      status: null,
      reason: 'Request timed out after 250ms',
    });
  });

  it('reports a network failure with a null status', async () => {
    const fetchMock = vi.fn<FetchLike>().mockRejectedValue(new TypeError('fetch failed'));

    const outcome = await requestJson(
      { url: 'https://api.test/', method: 'GET', timeoutMs: 1000 },
      fetchMock
    );

    expect(outcome).toEqual({ ok: false, status: null, reason: 'fetch failed' });
  });

  it('rejects a 2xx body that is not JSON', async () => {
    const fetchMock = fetchReturning(new Response('<html>oops</html>', { status: 200 }));

    const outcome = await requestJson(
      { url: 'https://api.test/', method: 'GET', timeoutMs: 1000 },
      fetchMock
    );

    expect(outcome).toEqual({
      ok: false,
      status: 200,
      reason: 'Response body is not valid JSON',
    });
  });
});

describe('joinUrl', () => {
  it('joins with exactly one slash', () => {
    expect(joinUrl('https://api.test', 'retrievals')).toBe('https://api.test/retrievals');
    expect(joinUrl('https://api.test/', '/retrievals')).toBe('https://api.test/retrievals');
    expect(joinUrl('https://api.test/v1//', 'documents/url')).toBe(
      'https://api.test/v1/documents/url'
    );
  });
});

describe('bearerJsonHeaders', () => {
  it('builds JSON headers with a bearer token', () => {
    expect(bearerJsonHeaders('test-secret')).toEqual({
      accept: 'application/json',
      'content-type': 'application/json',
      authorization: 'Bearer test-secret',
    });
  });
});
