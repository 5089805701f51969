export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A command ran to completion but exited non-zero.
 * The message carries the last line of stderr, which is usually the useful one.
 */
export class CommandFailedError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number,
    readonly stderr: string
  ) {
    const lastLine = stderr.trim().split("\n").pop() ?? "";
    super(
      lastLine
        ? `Command "${command}" exited with code ${exitCode}: ${lastLine}`
        : `Command "${command}" exited with code ${exitCode}`
    );
    this.name = "CommandFailedError";
  }
}

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`Gave up after ${attempts} attempt(s): ${errorMessage(lastError)}`);
    this.name = "RetryExhaustedError";
  }
}

export class ReadinessTimeoutError extends Error {
  constructor(
    readonly port: number,
    readonly attempts: number
  ) {
    super(`Service on port ${port} did not become ready after ${attempts} attempt(s)`);
    this.name = "ReadinessTimeoutError";
  }
}

export class ServiceExitedError extends Error {
  constructor(
    readonly command: string,
    readonly exitCode: number | null
  ) {
    super(
      exitCode === null
        ? `Service "${command}" was killed before becoming ready`
        : `Service "${command}" exited with code ${exitCode} before becoming ready`
    );
    this.name = "ServiceExitedError";
  }
}

export class StageFailure extends Error {
  constructor(
    readonly stageId: string,
    readonly attemptsMade: number,
    readonly lastError: unknown
  ) {
    super(`Stage "${stageId}" failed after ${attemptsMade} attempt(s): ${errorMessage(lastError)}`);
    this.name = "StageFailure";
  }
}

export class PipelineInterruptedError extends Error {
  constructor(message = "Provisioning interrupted") {
    super(message);
    this.name = "PipelineInterruptedError";
  }
}

export function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new PipelineInterruptedError();
  }
}
