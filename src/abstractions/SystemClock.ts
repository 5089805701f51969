import { IClock } from "./IClock";
import { PipelineInterruptedError } from "../errors";

export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }

  sleep(ms: number, signal?: AbortSignal): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new PipelineInterruptedError());
        return;
      }

      const onAbort = (): void => {
        clearTimeout(timer);
        reject(new PipelineInterruptedError());
      };

      const timer = setTimeout(() => {
        signal?.removeEventListener("abort", onAbort);
        resolve();
      }, ms);

      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
