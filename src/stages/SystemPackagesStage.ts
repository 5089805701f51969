import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { FailureMode, IdempotencyResult, RetryPolicy, Stage, StageContext } from "../pipeline/types";
import { commandExists, runCommand } from "./commands";

export const INSTALL_RETRY_POLICY: RetryPolicy = { maxAttempts: 2, delayMs: 5_000 };

/**
 * Installs OS packages with apt-get. Skipped when every required command
 * is already on PATH.
 */
export class SystemPackagesStage implements Stage {
  readonly id = "system-packages";
  readonly name = "Installing system dependencies";
  readonly failureMode: FailureMode = "recoverable";

  constructor(
    private readonly runner: IProcessRunner,
    private readonly packages: readonly string[],
    private readonly requiredCommands: readonly string[],
    readonly retryPolicy: RetryPolicy = INSTALL_RETRY_POLICY
  ) {}

  async isSatisfied(context: StageContext): Promise<IdempotencyResult> {
    const missing: string[] = [];
    for (const name of this.requiredCommands) {
      if (!(await commandExists(this.runner, name, context.signal))) {
        missing.push(name);
      }
    }
    return missing.length === 0
      ? { satisfied: true, reason: `${this.requiredCommands.join(", ")} already installed` }
      : { satisfied: false, reason: `missing ${missing.join(", ")}` };
  }

  async execute(context: StageContext): Promise<void> {
    await runCommand(this.runner, context, "sudo", ["apt-get", "update", "-y"]);
    await runCommand(this.runner, context, "sudo", [
      "apt-get",
      "install",
      "-y",
      "--no-install-recommends",
      ...this.packages,
    ]);
  }
}
