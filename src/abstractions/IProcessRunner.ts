export interface ProcessResult {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface ProcessRunOptions {
  cwd?: string;
  /** Merged over the current process environment. */
  env?: Record<string, string>;
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called with every stdout and stderr chunk as it arrives. */
  onOutput?: (chunk: string) => void;
}

/**
 * Interface for running subprocess commands to completion
 */
export interface IProcessRunner {
  run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult>;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args].join(" ");
}
