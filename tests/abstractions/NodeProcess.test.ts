import { NodeProcessRunner } from "../../src/abstractions/NodeProcessRunner";
import { NodeProcessSpawner } from "../../src/abstractions/NodeProcessSpawner";
import { SystemClock } from "../../src/abstractions/SystemClock";
import { ServiceHandle } from "../../src/service/ServiceHandle";
import { InMemoryLogger } from "../../src/logging";
import { PipelineInterruptedError } from "../../src/errors";

describe("NodeProcessRunner", () => {
  const runner = new NodeProcessRunner();

  it("captures output and the exit code", async () => {
    const chunks: string[] = [];

    const result = await runner.run("sh", ["-c", "echo out; echo err >&2; exit 3"], {
      onOutput: (chunk) => chunks.push(chunk),
    });

    expect(result).toEqual({ stdout: "out\n", stderr: "err\n", exitCode: 3 });
    expect(chunks.join("")).toContain("out\n");
  });

  it("passes extra environment variables through", async () => {
    const result = await runner.run("sh", ["-c", 'printf "%s" "$OLLAMA_HOST"'], {
      env: { OLLAMA_HOST: "127.0.0.1:11434" },
    });

    expect(result.stdout).toBe("127.0.0.1:11434");
  });

  it("reports a missing command as exit code 127", async () => {
    const result = await runner.run("definitely-not-a-real-command-xyz", []);

    expect(result.exitCode).toBe(127);
    expect(result.stderr).toContain("ENOENT");
  });

  it("kills the command and rejects when aborted", async () => {
    const controller = new AbortController();
    const running = runner.run("sleep", ["30"], { signal: controller.signal });
    setTimeout(() => controller.abort(), 50);

    await expect(running).rejects.toBeInstanceOf(PipelineInterruptedError);
  });
});

describe("NodeProcessSpawner", () => {
  const spawner = new NodeProcessSpawner();

  it("starts a long-running process that ServiceHandle can stop", async () => {
    const spawned = await spawner.spawn("sleep", ["30"]);
    const handle = new ServiceHandle(spawned, 0, new SystemClock(), new InMemoryLogger(), 2000);

    expect(spawned.pid).toBeGreaterThan(0);
    await handle.stop();

    await expect(spawned.exited).resolves.toBeNull();
    expect(handle.getState()).toBe("stopped");
  });

  it("rejects when the command cannot be started", async () => {
    await expect(spawner.spawn("definitely-not-a-real-command-xyz", [])).rejects.toThrow("ENOENT");
  });

  it("forwards output", async () => {
    let received: (chunk: string) => void = () => undefined;
    const firstChunk = new Promise<string>((resolve) => {
      received = resolve;
    });

    const spawned = await spawner.spawn("sh", ["-c", "echo listening"], { onOutput: (chunk) => received(chunk) });

    await expect(firstChunk).resolves.toBe("listening\n");
    await spawned.exited;
  });
});

describe("SystemClock", () => {
  it("rejects a sleep when the signal aborts", async () => {
    const controller = new AbortController();
    const sleeping = new SystemClock().sleep(10_000, controller.signal);

    controller.abort();

    await expect(sleeping).rejects.toBeInstanceOf(PipelineInterruptedError);
  });
});
