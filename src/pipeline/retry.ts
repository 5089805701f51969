import type { IClock } from "../abstractions/IClock";
import type { RetryPolicy } from "./types";
import { PipelineInterruptedError, RetryExhaustedError, throwIfAborted } from "../errors";

export interface RetryOptions {
  clock: IClock;
  signal?: AbortSignal;
  onAttemptFailed?: (attempt: number, error: unknown, willRetry: boolean) => void;
}

/**
 * Run `action` up to `policy.maxAttempts` times, sleeping a constant
 * `policy.delayMs` between attempts. Interruption is never retried.
 */
export async function retry<T>(
  action: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(policy.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    throwIfAborted(options.signal);
    try {
      return await action(attempt);
    } catch (err) {
      if (err instanceof PipelineInterruptedError) {
        throw err;
      }
      throwIfAborted(options.signal);

      lastError = err;
      const willRetry = attempt < maxAttempts;
      options.onAttemptFailed?.(attempt, err, willRetry);
      if (willRetry) {
        await options.clock.sleep(policy.delayMs, options.signal);
      }
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
