import type { IHttpClient, HttpResponse, HttpRequestOptions } from "./IHttpClient";

export interface RecordedRequest {
  url: string;
  options?: HttpRequestOptions;
}

type QueuedResponse =
  | { kind: "response"; status: number; body: unknown }
  | { kind: "network-error"; message: string };

/**
 * In-memory IHttpClient for unit tests.
 * Enqueue responses in order; each get() call consumes one.
 */
export class InMemoryHttpClient implements IHttpClient {
  private readonly responses: QueuedResponse[] = [];
  private readonly requests: RecordedRequest[] = [];

  enqueueJson(body: unknown, status = 200): void {
    this.responses.push({ kind: "response", status, body });
  }

  enqueueText(body: string, status = 200): void {
    this.responses.push({ kind: "response", status, body });
  }

  enqueueNetworkError(message = "connect ECONNREFUSED 127.0.0.1"): void {
    this.responses.push({ kind: "network-error", message });
  }

  getRequests(): RecordedRequest[] {
    return [...this.requests];
  }

  reset(): void {
    this.responses.length = 0;
    this.requests.length = 0;
  }

  async get(url: string, options?: HttpRequestOptions): Promise<HttpResponse> {
    this.requests.push({ url, options });

    const queued = this.responses.shift();
    if (!queued) {
      throw new Error("InMemoryHttpClient: no more queued responses");
    }

    if (queued.kind === "network-error") {
      throw Object.assign(new Error(queued.message), { code: "ECONNREFUSED" });
    }

    const { status, body } = queued;
    const serialized = typeof body === "string" ? body : JSON.stringify(body);

    return {
      ok: status >= 200 && status < 300,
      status,
      text: async () => serialized,
      json: async (): Promise<unknown> => (typeof body === "string" ? JSON.parse(body) : body),
    };
  }
}
