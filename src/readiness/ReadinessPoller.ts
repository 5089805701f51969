import type { IClock } from "../abstractions/IClock";
import type { IHttpClient } from "../abstractions/IHttpClient";
import type { ILogger } from "../logging";
import { PipelineInterruptedError, ReadinessTimeoutError, errorMessage, throwIfAborted } from "../errors";

export type ReadinessResult =
  | { ready: true; attempts: number }
  | { ready: false; attempts: number; error: ReadinessTimeoutError };

/**
 * Fixed-interval readiness probe for a service on a local port.
 * No backoff and no jitter: the target is a single local process.
 */
export class ReadinessPoller {
  constructor(
    private readonly httpClient: IHttpClient,
    private readonly clock: IClock,
    private readonly logger: ILogger
  ) {}

  /**
   * Probe `http://localhost:{port}` up to timeoutSeconds / pollIntervalSeconds
   * times (at least once), one attempt per interval, so an unresponsive
   * server holds the poller for about timeoutSeconds. Any response below
   * 500 counts as ready.
   */
  async waitUntilReady(
    port: number,
    timeoutSeconds: number,
    pollIntervalSeconds: number,
    signal?: AbortSignal
  ): Promise<ReadinessResult> {
    if (!(pollIntervalSeconds > 0)) {
      throw new RangeError(`pollIntervalSeconds must be positive, got ${pollIntervalSeconds}`);
    }

    const intervalMs = pollIntervalSeconds * 1000;
    const maxAttempts = Math.max(1, Math.floor(timeoutSeconds / pollIntervalSeconds));
    const url = `http://localhost:${port}`;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfAborted(signal);
      const startedAt = this.clock.now().getTime();
      if (await this.probe(url, intervalMs, signal)) {
        this.logger.info(`Service on port ${port} is ready (attempt ${attempt}/${maxAttempts})`);
        return { ready: true, attempts: attempt };
      }
      // a slow probe uses up part of its interval
      const remainingMs = intervalMs - (this.clock.now().getTime() - startedAt);
      if (attempt < maxAttempts && remainingMs > 0) {
        await this.clock.sleep(remainingMs, signal);
      }
    }

    const error = new ReadinessTimeoutError(port, maxAttempts);
    this.logger.error(error.message);
    return { ready: false, attempts: maxAttempts, error };
  }

  private async probe(url: string, timeoutMs: number, signal?: AbortSignal): Promise<boolean> {
    try {
      const response = await this.httpClient.get(url, { timeoutMs, signal });
      if (response.status >= 500) {
        this.logger.verbose(`Probe ${url}: HTTP ${response.status}`);
        return false;
      }
      return true;
    } catch (err) {
      if (signal?.aborted) {
        throw new PipelineInterruptedError();
      }
      this.logger.verbose(`Probe ${url}: ${errorMessage(err)}`);
      return false;
    }
  }
}
