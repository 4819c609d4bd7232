/**
 * UpstreamSuccess represents a 2xx response from a backend.
 */
export interface UpstreamSuccess<T> {
  ok: true;
  status: number;
  body: T;
  headers: Headers;
}

/**
 * UpstreamFailure represents a transport failure, a timeout or a non-2xx response.
 */
export interface UpstreamFailure {
  ok: false;
  status: number;
  timedOut: boolean;
  error: unknown;
  body?: unknown;
  headers: Headers;
}

/**
 * UpstreamResult is a discriminated union for upstream responses.
 */
export type UpstreamResult<T> = UpstreamSuccess<T> | UpstreamFailure;

/**
 * Minimal fetch signature the client depends on; the global fetch satisfies it.
 */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

/**
 * HttpClientOptions configures the HTTP client behavior.
 */
export interface HttpClientOptions {
  timeoutMs: number;
  fetch?: FetchLike;
}
