import * as path from "node:path";
import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { FailureMode, IdempotencyResult, RetryPolicy, Stage, StageContext } from "../pipeline/types";
import { commandExists, runCommand } from "./commands";
import { INSTALL_RETRY_POLICY } from "./SystemPackagesStage";

export interface RuntimeInstallOptions {
  installUrl: string;
  binDir: string;
  shellProfile: string;
}

/**
 * Installs the Ollama runtime with its install script and puts its bin
 * directory on PATH, both for this process and in the shell profile.
 */
export class RuntimeInstallStage implements Stage {
  readonly id = "runtime-install";
  readonly name = "Installing Ollama";
  readonly failureMode: FailureMode = "recoverable";

  constructor(
    private readonly runner: IProcessRunner,
    private readonly fs: IFileSystem,
    private readonly env: Record<string, string | undefined>,
    private readonly options: RuntimeInstallOptions,
    readonly retryPolicy: RetryPolicy = INSTALL_RETRY_POLICY
  ) {}

  async isSatisfied(context: StageContext): Promise<IdempotencyResult> {
    return (await commandExists(this.runner, "ollama", context.signal))
      ? { satisfied: true, reason: "ollama already on PATH" }
      : { satisfied: false };
  }

  async execute(context: StageContext): Promise<void> {
    await runCommand(this.runner, context, "sh", ["-c", 'curl -fsSL "$1" | sh', "sh", this.options.installUrl]);
    this.addToProcessPath();
    await this.addToShellProfile(context);
  }

  private addToProcessPath(): void {
    const entries = (this.env.PATH ?? "").split(path.delimiter).filter(Boolean);
    if (!entries.includes(this.options.binDir)) {
      this.env.PATH = [...entries, this.options.binDir].join(path.delimiter);
    }
  }

  private async addToShellProfile(context: StageContext): Promise<void> {
    const line = `export PATH="$PATH:${this.options.binDir}"`;
    const profile = this.options.shellProfile;
    const current = (await this.fs.exists(profile)) ? await this.fs.readFile(profile) : "";

    if (current.split("\n").includes(line)) {
      return;
    }
    const separator = current === "" || current.endsWith("\n") ? "" : "\n";
    await this.fs.appendFile(profile, `${separator}${line}\n`);
    context.logger.verbose(`Added ${this.options.binDir} to PATH in ${profile}`);
  }
}
