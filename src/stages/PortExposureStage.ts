import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { FailureMode, IdempotencyResult, RetryPolicy, Stage, StageContext } from "../pipeline/types";
import { runCommand } from "./commands";

export interface PortExposureOptions {
  port: number;
  hostingContextEnabled: boolean;
  environmentName?: string;
  githubEnvPath?: string;
}

/**
 * Makes the runtime port publicly reachable in a hosted dev container.
 * Outside a hosted environment there is nothing to do. A missing
 * environment name only produces a warning.
 */
export class PortExposureStage implements Stage {
  readonly id = "port-exposure";
  readonly name = "Configuring forwarded ports";
  readonly failureMode: FailureMode = "fatal";
  readonly retryPolicy: RetryPolicy = { maxAttempts: 1, delayMs: 0 };

  constructor(
    private readonly runner: IProcessRunner,
    private readonly fs: IFileSystem,
    private readonly options: PortExposureOptions
  ) {}

  async isSatisfied(): Promise<IdempotencyResult> {
    return this.options.hostingContextEnabled
      ? { satisfied: false }
      : { satisfied: true, reason: "not running in a hosted environment" };
  }

  async execute(context: StageContext): Promise<void> {
    const { port, environmentName, githubEnvPath } = this.options;

    if (githubEnvPath) {
      await this.fs.appendFile(githubEnvPath, `OLLAMA_PORT=${port}\n`);
    }

    if (!environmentName) {
      context.warn("CODESPACE_NAME is not set; skipping port visibility");
      return;
    }

    await runCommand(this.runner, context, "gh", [
      "codespace",
      "ports",
      "visibility",
      `${port}:public`,
      "-c",
      environmentName,
    ]);
  }
}
