import type { IClock } from "../abstractions/IClock";
import type { SpawnedProcess } from "../abstractions/IProcessSpawner";
import type { ILogger } from "../logging";

export type ServiceState = "starting" | "ready" | "stopped";

const DEFAULT_GRACE_MS = 5_000;

/**
 * A background service process bound to a port. Stopping sends SIGTERM,
 * waits for exit and escalates to SIGKILL after the grace period.
 * stop() is idempotent: every caller gets the same termination.
 */
export class ServiceHandle {
  private state: ServiceState = "starting";
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly process: SpawnedProcess,
    readonly port: number,
    private readonly clock: IClock,
    private readonly logger: ILogger,
    private readonly graceMs: number = DEFAULT_GRACE_MS
  ) {}

  get pid(): number {
    return this.process.pid;
  }

  /** Resolves with the exit code (null when killed by a signal) once the process ends. */
  get exited(): Promise<number | null> {
    return this.process.exited;
  }

  getState(): ServiceState {
    return this.state;
  }

  markReady(): void {
    if (this.state === "starting") {
      this.state = "ready";
    }
  }

  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.terminate();
    }
    return this.stopping;
  }

  private async terminate(): Promise<void> {
    let exited = false;
    const exit = this.process.exited.then(() => {
      exited = true;
    });

    this.logger.info(`Stopping service (PID ${this.pid}) on port ${this.port}`);
    this.process.kill("SIGTERM");

    const grace = new AbortController();
    try {
      await Promise.race([exit, this.clock.sleep(this.graceMs, grace.signal)]);
    } finally {
      grace.abort();
    }

    if (!exited) {
      this.logger.warn(`Service (PID ${this.pid}) still running after ${this.graceMs}ms, sending SIGKILL`);
      this.process.kill("SIGKILL");
      await exit;
    }

    this.state = "stopped";
    this.logger.verbose(`Service (PID ${this.pid}) exited`);
  }
}

/**
 * Start a service, hand it to `use`, and stop it on every exit path:
 * success, failure or interruption.
 */
export async function withService<T>(
  start: () => Promise<ServiceHandle>,
  use: (service: ServiceHandle) => Promise<T>
): Promise<T> {
  const service = await start();
  try {
    return await use(service);
  } finally {
    await service.stop();
  }
}
