import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { FailureMode, IdempotencyResult, RetryPolicy, Stage, StageContext } from "../pipeline/types";
import { runCommand } from "./commands";
import { INSTALL_RETRY_POLICY } from "./SystemPackagesStage";

export class PythonDependenciesStage implements Stage {
  readonly id = "python-dependencies";
  readonly name = "Installing Python dependencies";
  readonly failureMode: FailureMode = "recoverable";

  constructor(
    private readonly runner: IProcessRunner,
    private readonly packages: readonly string[],
    readonly retryPolicy: RetryPolicy = INSTALL_RETRY_POLICY
  ) {}

  // pip show exits non-zero when any of the named packages is missing
  async isSatisfied(context: StageContext): Promise<IdempotencyResult> {
    const result = await this.runner.run("pip3", ["show", ...this.packages], { signal: context.signal });
    return result.exitCode === 0
      ? { satisfied: true, reason: "all packages present" }
      : { satisfied: false };
  }

  async execute(context: StageContext): Promise<void> {
    await runCommand(this.runner, context, "pip3", ["install", "--user", ...this.packages]);
  }
}
