import type { IHttpClient, HttpResponse, HttpRequestOptions } from "./IHttpClient";

const DEFAULT_TIMEOUT_MS = 5_000;

/**
 * IHttpClient implementation using the Node.js built-in fetch API.
 */
export class FetchHttpClient implements IHttpClient {
  async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    const onAbort = (): void => controller.abort();
    options?.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const response = await fetch(url, {
        method: "GET",
        signal: controller.signal,
      });

      return {
        ok: response.ok,
        status: response.status,
        text: () => response.text(),
        json: () => response.json(),
      };
    } finally {
      clearTimeout(timer);
      options?.signal?.removeEventListener("abort", onAbort);
    }
  }
}
