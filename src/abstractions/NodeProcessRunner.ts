import { spawn } from "node:child_process";
import { IProcessRunner, ProcessResult, ProcessRunOptions } from "./IProcessRunner";
import { PipelineInterruptedError } from "../errors";

const DEFAULT_TIMEOUT_MS = 30 * 60 * 1000; // model pulls of several GB are slow
const COMMAND_NOT_FOUND_EXIT_CODE = 127;

export class NodeProcessRunner implements IProcessRunner {
  async run(command: string, args: string[], options?: ProcessRunOptions): Promise<ProcessResult> {
    const timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    const signal = options?.signal;

    if (signal?.aborted) {
      throw new PipelineInterruptedError();
    }

    return new Promise<ProcessResult>((resolve, reject) => {
      const child = spawn(command, args, {
        stdio: ["ignore", "pipe", "pipe"],
        cwd: options?.cwd,
        env: options?.env ? { ...process.env, ...options.env } : process.env,
      });

      let stdout = "";
      let stderr = "";
      let settled = false;

      const settle = (finish: () => void): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(hardTimer);
        signal?.removeEventListener("abort", onAbort);
        finish();
      };

      const onAbort = (): void => {
        child.kill("SIGTERM");
        settle(() => reject(new PipelineInterruptedError()));
      };

      child.stdout.on("data", (data: Buffer) => {
        const chunk = data.toString();
        stdout += chunk;
        options?.onOutput?.(chunk);
      });

      child.stderr.on("data", (data: Buffer) => {
        const chunk = data.toString();
        stderr += chunk;
        options?.onOutput?.(chunk);
      });

      const hardTimer = setTimeout(() => {
        child.kill("SIGTERM");
        settle(() => reject(new Error(`Process timed out after ${timeoutMs}ms: ${command}`)));
      }, timeoutMs);

      signal?.addEventListener("abort", onAbort, { once: true });

      child.on("close", (code) => {
        settle(() => resolve({ stdout, stderr, exitCode: code ?? 1 }));
      });

      child.on("error", (error) => {
        // Spawn failures (ENOENT) look like a shell's "command not found"
        settle(() =>
          resolve({
            stdout,
            stderr: stderr + error.message,
            exitCode: COMMAND_NOT_FOUND_EXIT_CODE,
          })
        );
      });
    });
  }
}
