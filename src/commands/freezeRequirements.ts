import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import { CommandFailedError } from "../errors";

/**
 * Package names from `pip freeze` output with their version pins removed.
 */
export function unpinRequirements(freezeOutput: string): string[] {
  return freezeOutput
    .split("\n")
    .map((line) => line.split("==")[0].trim())
    .filter((name) => name !== "");
}

export interface FreezeResult {
  path: string;
  packages: string[];
}

export async function freezeRequirements(
  runner: IProcessRunner,
  fs: IFileSystem,
  outputPath: string
): Promise<FreezeResult> {
  const result = await runner.run("pip3", ["freeze"]);
  if (result.exitCode !== 0) {
    throw new CommandFailedError("pip3 freeze", result.exitCode, result.stderr);
  }

  const packages = unpinRequirements(result.stdout);
  await fs.writeFile(outputPath, packages.join("\n"));
  return { path: outputPath, packages };
}
