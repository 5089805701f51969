/**
 * Minimal HTTP client abstraction for probing the local model runtime.
 * Allows the real fetch-based implementation to be swapped for an
 * in-memory fake in unit tests.
 */

export interface HttpResponse {
  ok: boolean;
  status: number;
  text(): Promise<string>;
  json(): Promise<unknown>;
}

export interface HttpRequestOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface IHttpClient {
  get(url: string, options?: HttpRequestOptions): Promise<HttpResponse>;
}
