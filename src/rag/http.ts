/**
 * JSON-over-HTTP helper shared by the backend clients.
 *
 * Returns an explicit outcome instead of throwing, so each client can map a
 * failure onto its own error kind. Every path either reads the response body
 * to the end or cancels it before returning, so the connection goes back to
 * the pool on success, error and timeout alike.
 */

import { STATUS_CODES } from 'node:http';

/** The subset of `fetch` the clients need; tests pass a vi.fn() */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

export interface JsonRequest {
  url: string | URL;
  method: 'GET' | 'POST';
  headers?: Record<string, string>;
  /** Serialized with JSON.stringify when present */
  body?: unknown;
  timeoutMs: number;
}

export type HttpOutcome =
  | { ok: true; status: number; data: unknown }
  | { ok: false; status: number | null; reason: string };

/**
 * Send one request and decode a JSON response.
 *
 * - Non-2xx: `{ ok: false, status, reason }` with the reason phrase
 * - Timeout or network failure: `{ ok: false, status: null, reason }`
 * - Body that is not JSON: `{ ok: false, status, reason }`
 */
export async function requestJson(
  request: JsonRequest,
  fetchImpl: FetchLike = fetch
): Promise<HttpOutcome> {
  let response: Response;
  try {
    response = await fetchImpl(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(request.timeoutMs),
    });
  } catch (error) {
    return { ok: false, status: null, reason: describeTransportError(error, request.timeoutMs) };
  }

  if (!response.ok) {
    await discardBody(response);
    return { ok: false, status: response.status, reason: reasonPhrase(response) };
  }

  try {
    return { ok: true, status: response.status, data: await response.json() };
  } catch (error) {
    if (isTimeout(error)) {
      return { ok: false, status: null, reason: describeTransportError(error, request.timeoutMs) };
    }
    return { ok: false, status: response.status, reason: 'Response body is not valid JSON' };
  }
}

/**
 * Join a base URL and a path without doubling or dropping slashes.
 */
export function joinUrl(baseUrl: string, path: string): string {
  return `${baseUrl.replace(/\/+$/, '')}/${path.replace(/^\/+/, '')}`;
}

/**
 * Standard headers for a bearer-authenticated JSON request.
 */
export function bearerJsonHeaders(apiKey: string): Record<string, string> {
  return {
    accept: 'application/json',
    'content-type': 'application/json',
    authorization: `Bearer ${apiKey}`,
  };
}

/**
 * Release an unread body. A stream that already errored rejects cancel() with
 * its stored error; the status line has arrived by then, so the outcome stays
 * the HTTP failure rather than the stream error.
 */
async function discardBody(response: Response): Promise<void> {
  await response.body?.cancel().catch(() => undefined);
}

function reasonPhrase(response: Response): string {
  return response.statusText || STATUS_CODES[response.status] || 'Unknown Status';
}

function isTimeout(error: unknown): boolean {
  return error instanceof Error && error.name === 'TimeoutError';
}

function describeTransportError(error: unknown, timeoutMs: number): string {
  if (isTimeout(error)) {
    return `Request timed out after ${timeoutMs}ms`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
