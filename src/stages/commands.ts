import type { IProcessRunner, ProcessResult } from "../abstractions/IProcessRunner";
import { formatCommand } from "../abstractions/IProcessRunner";
import type { StageContext } from "../pipeline/types";
import { CommandFailedError } from "../errors";
import { logOutput } from "../logging";

export interface RunCommandOptions {
  env?: Record<string, string>;
}

/**
 * Run a command for a stage, streaming its output to the log.
 * Throws CommandFailedError on a non-zero exit.
 */
export async function runCommand(
  runner: IProcessRunner,
  context: StageContext,
  command: string,
  args: string[],
  options: RunCommandOptions = {}
): Promise<ProcessResult> {
  const commandLine = formatCommand(command, args);
  context.logger.verbose(`$ ${commandLine}`);

  const result = await runner.run(command, args, {
    env: options.env,
    signal: context.signal,
    onOutput: (chunk) => logOutput(context.logger, chunk),
  });

  if (result.exitCode !== 0) {
    throw new CommandFailedError(commandLine, result.exitCode, result.stderr);
  }
  return result;
}

export async function commandExists(runner: IProcessRunner, name: string, signal?: AbortSignal): Promise<boolean> {
  const result = await runner.run("sh", ["-c", 'command -v "$1"', "sh", name], { signal });
  return result.exitCode === 0;
}
