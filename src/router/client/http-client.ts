import type { FetchLike, HttpClientOptions, UpstreamFailure, UpstreamResult } from "./types.ts";

/**
 * HttpClient handles low-level HTTP requests with timeout and abort support.
 * A request that outlives its timeout resolves as a timed-out failure; whatever
 * the transport produces afterwards is dropped.
 */
export class HttpClient {
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: HttpClientOptions) {
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  get timeout(): number {
    return this.timeoutMs;
  }

  /**
   * Execute a POST request and read the body as text.
   */
  async post(
    url: string,
    body: string | Record<string, unknown>,
    headers: Record<string, string> = {},
  ): Promise<UpstreamResult<string>> {
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const expired = new Promise<UpstreamFailure>((resolve) => {
      timer = setTimeout(() => {
        controller.abort();
        resolve({
          ok: false,
          status: 504,
          timedOut: true,
          error: new Error(`Request timed out after ${this.timeoutMs}ms`),
          headers: new Headers(),
        });
      }, this.timeoutMs);
    });

    const attempt = this.send(
      url,
      {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...headers,
        },
        body: typeof body === "string" ? body : JSON.stringify(body),
        signal: controller.signal,
      },
      controller.signal,
    );

    try {
      return await Promise.race([attempt, expired]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async send(
    url: string,
    init: RequestInit,
    signal: AbortSignal,
  ): Promise<UpstreamResult<string>> {
    try {
      const response = await this.fetchImpl(url, init);
      const text = await response.text();

      if (!response.ok) {
        return {
          ok: false,
          status: response.status,
          timedOut: false,
          error: `upstream_${response.status}`,
          body: text,
          headers: response.headers,
        };
      }

      return {
        ok: true,
        status: response.status,
        body: text,
        headers: response.headers,
      };
    } catch (error) {
      return {
        ok: false,
        status: 502,
        timedOut: signal.aborted,
        error,
        headers: new Headers(),
      };
    }
  }
}
