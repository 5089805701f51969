import { spawn } from "node:child_process";
import { IProcessSpawner, SpawnOptions, SpawnedProcess } from "./IProcessSpawner";

export class NodeProcessSpawner implements IProcessSpawner {
  async spawn(command: string, args: string[], options?: SpawnOptions): Promise<SpawnedProcess> {
    const child = spawn(command, args, {
      stdio: ["ignore", "pipe", "pipe"],
      env: options?.env ? { ...process.env, ...options.env } : process.env,
    });

    const exited = new Promise<number | null>((resolve) => {
      child.on("exit", (code) => resolve(code));
    });

    child.stdout.on("data", (data: Buffer) => options?.onOutput?.(data.toString()));
    child.stderr.on("data", (data: Buffer) => options?.onOutput?.(data.toString()));

    await new Promise<void>((resolve, reject) => {
      child.once("spawn", () => resolve());
      child.once("error", reject);
    });

    // Errors after a successful spawn come from kill() on an exited child
    child.on("error", (error) => options?.onOutput?.(`${command}: ${error.message}`));

    const pid = child.pid;
    if (pid === undefined) {
      throw new Error(`Failed to start ${command}: no PID assigned`);
    }

    return {
      pid,
      exited,
      kill: (signal) => {
        child.kill(signal);
      },
    };
  }
}
