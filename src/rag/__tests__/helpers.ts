/**
 * Shared fakes for the RAG tests. Nothing here touches the network.
 */

import { vi, type Mock } from 'vitest';
import type { FetchLike } from '../http.js';

export type FetchMock = Mock<FetchLike>;

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'content-type': 'application/json' },
    ...init,
  });
}

/** A fetch that answers every call with the given responses, in order */
export function fetchReturning(...responses: Response[]): FetchMock {
  const fetchMock = vi.fn<FetchLike>();
  for (const response of responses) {
    fetchMock.mockResolvedValueOnce(response);
  }
  return fetchMock;
}

export function timeoutError(): Error {
  return Object.assign(new Error('The operation was aborted due to timeout'), {
    name: 'TimeoutError',
  });
}

/** A response whose body stream has already failed with `error` */
export function erroredBodyResponse(error: unknown, init: ResponseInit): Response {
  const body = new ReadableStream<Uint8Array>({
    start(controller) {
      controller.error(error);
    },
  });
  return new Response(body, init);
}

/** A response whose body stream records whether it was cancelled */
export function trackedBodyResponse(init: ResponseInit): {
  response: Response;
  wasCancelled: () => boolean;
} {
  let cancelled = false;
  const body = new ReadableStream<Uint8Array>({
    pull(controller) {
      controller.enqueue(new TextEncoder().encode('{"detail":"unavailable"}'));
    },
    cancel() {
      cancelled = true;
    },
  });
  return { response: new Response(body, init), wasCancelled: () => cancelled };
}

/** URL and init of the nth fetch call */
export function requestOf(fetchMock: FetchMock, index = 0): { url: string; init: RequestInit } {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was called ${fetchMock.mock.calls.length} time(s)`);
  }
  const [input, init = {}] = call;
  return { url: String(input), init };
}

export function jsonBodyOf(fetchMock: FetchMock, index = 0): unknown {
  return JSON.parse(String(requestOf(fetchMock, index).init.body));
}
