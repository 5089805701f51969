export interface IClock {
  now(): Date;
  /** Resolves after `ms`; rejects with PipelineInterruptedError as soon as `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}
