/**
 * A long-running child process started in the background.
 */
export interface SpawnedProcess {
  readonly pid: number;
  /** Resolves with the exit code (null when ended by a signal) once the process has exited. */
  readonly exited: Promise<number | null>;
  kill(signal: NodeJS.Signals): void;
}

export interface SpawnOptions {
  /** Merged over the current process environment. */
  env?: Record<string, string>;
  onOutput?: (chunk: string) => void;
}

export interface IProcessSpawner {
  spawn(command: string, args: string[], options?: SpawnOptions): Promise<SpawnedProcess>;
}
