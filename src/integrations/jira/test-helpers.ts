// Licensed under the Hungry Ghost Hive License. See LICENSE.

import { vi, type Mock } from 'vitest';
import { JiraClient } from './client.js';

export const TEST_BASE_URL = 'https://example.atlassian.net';
export const TEST_EMAIL = 'test@example.com';
export const TEST_API_TOKEN = 'test-token';
/** base64("test@example.com:test-token") */
export const TEST_AUTH_HEADER = 'Basic dGVzdEBleGFtcGxlLmNvbTp0ZXN0LXRva2Vu';

export type FetchMock = Mock<typeof fetch>;

export function createTestClient(): JiraClient {
  return new JiraClient({ baseUrl: TEST_BASE_URL, email: TEST_EMAIL, apiToken: TEST_API_TOKEN });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function textResponse(body: string, status: number): Response {
  return new Response(body, { status, headers: { 'Content-Type': 'text/plain' } });
}

/**
 * Replace globalThis.fetch with a mock that builds a fresh response per call.
 * Callers restore the original fetch in afterEach.
 */
export function mockFetch(respond: () => Response): FetchMock {
  const fetchMock = vi.fn<typeof fetch>(async () => respond());
  globalThis.fetch = fetchMock;
  return fetchMock;
}

export interface CapturedRequest {
  url: URL;
  method: string;
  headers: Headers;
  body: unknown;
}

/** Decode the nth request a fetch mock received. */
export function capturedRequest(fetchMock: FetchMock, index = 0): CapturedRequest {
  const call = fetchMock.mock.calls[index];
  if (!call) {
    throw new Error(`fetch was not called ${index + 1} time(s)`);
  }
  const [input, init] = call;
  const rawBody = init?.body;
  return {
    url: new URL(String(input)),
    method: init?.method ?? 'GET',
    headers: new Headers(init?.headers),
    body: typeof rawBody === 'string' ? JSON.parse(rawBody) : undefined,
  };
}
