/**
 * Outbound HTTP.
 *
 * Providers and record backends take an `HttpFetch` so tests can hand in an
 * in-process fake. The default goes through an undici Agent, which is how
 * `recordSystem.verifyTls: false` reaches the TLS layer.
 */

import { Agent, FormData, fetch as undiciFetch } from 'undici';

export { FormData };

export interface HttpRequest {
  method?: string;
  headers?: Record<string, string>;
  body?: string | FormData;
  signal?: AbortSignal;
}

/** The slice of a fetch Response the clients read. */
export interface HttpResponse {
  ok: boolean;
  status: number;
  headers: { get(name: string): string | null };
  json(): Promise<unknown>;
  text(): Promise<string>;
}

export type HttpFetch = (url: string, init?: HttpRequest) => Promise<HttpResponse>;

export interface HttpFetchOptions {
  /** Reject self-signed or otherwise unverifiable certificates (default true). */
  verifyTls?: boolean;
}

/** Create a fetch bound to its own connection pool. */
export function createHttpFetch(options: HttpFetchOptions = {}): HttpFetch {
  const dispatcher = new Agent({
    connect: { rejectUnauthorized: options.verifyTls ?? true },
    keepAliveTimeout: 10_000,
  });
  return (url, init) =>
    undiciFetch(url, {
      method: init?.method,
      headers: init?.headers,
      body: init?.body,
      signal: init?.signal,
      dispatcher,
    });
}

/** Parse a Retry-After header (seconds or HTTP date) into milliseconds. */
export function parseRetryAfter(value: string | null, now: number = Date.now()): number | undefined {
  if (!value) return undefined;
  const seconds = Number(value);
  if (Number.isFinite(seconds) && seconds >= 0) return Math.round(seconds * 1000);
  const date = Date.parse(value);
  return Number.isNaN(date) ? undefined : Math.max(0, date - now);
}
