import { IProcessSpawner, SpawnOptions, SpawnedProcess } from "./IProcessSpawner";

export interface FakeProcessOptions {
  /** When true the process ignores SIGTERM and only SIGKILL ends it. */
  ignoreSigterm?: boolean;
  /** Exit with this code right after starting, e.g. when the port is taken. */
  exitCodeOnStart?: number;
}

export class FakeProcess implements SpawnedProcess {
  readonly exited: Promise<number | null>;
  private readonly signals: NodeJS.Signals[] = [];
  private resolveExit: (code: number | null) => void = () => {};
  private alive = true;

  constructor(
    readonly pid: number,
    private readonly options: FakeProcessOptions = {}
  ) {
    this.exited = new Promise<number | null>((resolve) => {
      this.resolveExit = resolve;
    });
    if (options.exitCodeOnStart !== undefined) {
      this.exit(options.exitCodeOnStart);
    }
  }

  kill(signal: NodeJS.Signals): void {
    this.signals.push(signal);
    if (signal === "SIGTERM" && this.options.ignoreSigterm) {
      return;
    }
    this.exit(null);
  }

  /** Simulate the process ending on its own. */
  exit(code: number | null): void {
    if (!this.alive) {
      return;
    }
    this.alive = false;
    this.resolveExit(code);
  }

  isAlive(): boolean {
    return this.alive;
  }

  getSignals(): NodeJS.Signals[] {
    return [...this.signals];
  }
}

interface SpawnCall {
  command: string;
  args: string[];
  options?: SpawnOptions;
  process: FakeProcess;
}

/**
 * In-memory IProcessSpawner for tests. Every spawn returns a FakeProcess
 * that stays alive until it is killed or told to exit.
 */
export class InMemoryProcessSpawner implements IProcessSpawner {
  private readonly calls: SpawnCall[] = [];
  private nextPid = 4242;
  private failure: Error | null = null;

  constructor(private readonly processOptions: FakeProcessOptions = {}) {}

  async spawn(command: string, args: string[], options?: SpawnOptions): Promise<SpawnedProcess> {
    if (this.failure) {
      throw this.failure;
    }
    const fake = new FakeProcess(this.nextPid++, this.processOptions);
    this.calls.push({ command, args, options, process: fake });
    return fake;
  }

  failWith(error: Error): void {
    this.failure = error;
  }

  getCalls(): SpawnCall[] {
    return [...this.calls];
  }

  getProcesses(): FakeProcess[] {
    return this.calls.map((call) => call.process);
  }
}
