import * as path from "node:path";
import type { IClock } from "../abstractions/IClock";
import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { IProcessSpawner } from "../abstractions/IProcessSpawner";
import type { ReadinessPoller } from "../readiness/ReadinessPoller";
import type { FailureMode, IdempotencyResult, RetryPolicy, Stage, StageContext } from "../pipeline/types";
import { ServiceHandle, withService } from "../service/ServiceHandle";
import { retry } from "../pipeline/retry";
import { PipelineInterruptedError, ServiceExitedError, errorMessage, throwIfAborted } from "../errors";
import { logOutput } from "../logging";
import { runCommand } from "./commands";

export interface ModelAcquisitionOptions {
  modelId: string;
  /** Model store of the runtime; holds one manifest per pulled model. */
  modelsDir: string;
  port: number;
  timeoutSeconds: number;
  pollIntervalSeconds: number;
  retryCount: number;
  retryDelaySeconds: number;
  serviceStopGraceMs?: number;
}

export interface ModelAcquisitionDeps {
  runner: IProcessRunner;
  spawner: IProcessSpawner;
  fs: IFileSystem;
  poller: ReadinessPoller;
  clock: IClock;
}

const DEFAULT_TAG = "latest";
const DEFAULT_REGISTRY = "registry.ollama.ai";
const DEFAULT_NAMESPACE = "library";

/**
 * Model names from `ollama list` output (first column, header skipped).
 */
export function parseModelInventory(listOutput: string): string[] {
  return listOutput
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("NAME"))
    .map((line) => line.split(/\s+/)[0]);
}

/** "llama3" and "llama3:latest" name the same model. */
export function hasModel(installed: readonly string[], modelId: string): boolean {
  const wanted = modelId.includes(":") ? modelId : `${modelId}:${DEFAULT_TAG}`;
  return installed.some((name) => name === modelId || name === wanted);
}

/**
 * Path of the manifest the runtime writes for a pulled model:
 * `{modelsDir}/manifests/{registry}/{namespace}/{name}/{tag}`.
 * "llama3" expands to registry.ollama.ai/library/llama3/latest.
 */
export function manifestPath(modelsDir: string, modelId: string): string {
  const slash = modelId.lastIndexOf("/");
  const colon = modelId.lastIndexOf(":");
  const name = colon > slash ? modelId.slice(0, colon) : modelId;
  const tag = colon > slash ? modelId.slice(colon + 1) : DEFAULT_TAG;

  const parts = name.split("/");
  const qualified =
    parts.length === 1
      ? [DEFAULT_REGISTRY, DEFAULT_NAMESPACE, ...parts]
      : parts.length === 2
        ? [DEFAULT_REGISTRY, ...parts]
        : parts;
  return path.posix.join(modelsDir, "manifests", ...qualified, tag);
}

/**
 * Ensures a model is present locally. When it is missing, spawns
 * `ollama serve`, waits for it to accept connections, pulls the model with
 * constant-delay retries, and always stops the server before returning.
 *
 * The pull retries live inside the stage (with the server up), so the stage
 * itself runs once; when the pulls run out the pipeline reports their
 * attempt count and last error.
 */
export class ModelAcquisitionStage implements Stage {
  readonly id = "model-acquisition";
  readonly name = "Setting up Ollama model";
  readonly failureMode: FailureMode = "fatal";
  readonly retryPolicy: RetryPolicy = { maxAttempts: 1, delayMs: 0 };

  constructor(
    private readonly deps: ModelAcquisitionDeps,
    private readonly options: ModelAcquisitionOptions
  ) {}

  private get runtimeEnv(): Record<string, string> {
    return { OLLAMA_HOST: `127.0.0.1:${this.options.port}`, OLLAMA_MODELS: this.options.modelsDir };
  }

  /**
   * The manifest on disk answers without a running server; `ollama list`
   * only works while one is up, e.g. a system service started outside
   * this tool.
   */
  async isSatisfied(context: StageContext): Promise<IdempotencyResult> {
    const { modelId, modelsDir } = this.options;
    if (await this.deps.fs.exists(manifestPath(modelsDir, modelId))) {
      return { satisfied: true, reason: `${modelId} already installed` };
    }

    const result = await this.deps.runner.run("ollama", ["list"], {
      env: this.runtimeEnv,
      signal: context.signal,
    });
    if (result.exitCode !== 0) {
      return { satisfied: false, reason: "model inventory unavailable" };
    }
    return hasModel(parseModelInventory(result.stdout), modelId)
      ? { satisfied: true, reason: `${modelId} already installed` }
      : { satisfied: false };
  }

  async execute(context: StageContext): Promise<void> {
    await withService(
      () => this.startService(context),
      async (service) => {
        await this.waitForRuntime(service, context);
        service.markReady();
        await this.pullWithRetries(context);
      }
    );
  }

  private async startService(context: StageContext): Promise<ServiceHandle> {
    const spawned = await this.deps.spawner.spawn("ollama", ["serve"], {
      env: this.runtimeEnv,
      onOutput: (chunk) => logOutput(context.logger, chunk),
    });
    context.logger.info(`Started ollama serve (PID ${spawned.pid}) on port ${this.options.port}`);
    return new ServiceHandle(
      spawned,
      this.options.port,
      this.deps.clock,
      context.logger,
      this.options.serviceStopGraceMs
    );
  }

  /** Poll until the runtime answers, giving up early if the process dies first. */
  private async waitForRuntime(service: ServiceHandle, context: StageContext): Promise<void> {
    throwIfAborted(context.signal);
    const poll = new AbortController();
    const forwardAbort = (): void => poll.abort();
    context.signal.addEventListener("abort", forwardAbort, { once: true });

    const exit: { code?: number | null } = {};
    const earlyExit = service.exited.then((code): never => {
      exit.code = code;
      poll.abort();
      throw new ServiceExitedError("ollama serve", code);
    });

    try {
      const readiness = await Promise.race([
        this.deps.poller.waitUntilReady(
          this.options.port,
          this.options.timeoutSeconds,
          this.options.pollIntervalSeconds,
          poll.signal
        ),
        earlyExit,
      ]);
      if (!readiness.ready) {
        throw readiness.error;
      }
    } catch (err) {
      // the poll aborted for the exit, not for an interrupt
      if (exit.code !== undefined && !context.signal.aborted) {
        throw new ServiceExitedError("ollama serve", exit.code);
      }
      throw err;
    } finally {
      context.signal.removeEventListener("abort", forwardAbort);
    }
  }

  private async pullWithRetries(context: StageContext): Promise<void> {
    const { modelId, retryCount, retryDelaySeconds } = this.options;
    try {
      await retry(
        () => runCommand(this.deps.runner, context, "ollama", ["pull", modelId], { env: this.runtimeEnv }),
        { maxAttempts: retryCount, delayMs: retryDelaySeconds * 1000 },
        {
          clock: this.deps.clock,
          signal: context.signal,
          onAttemptFailed: (attempt, err, willRetry) => {
            context.logger.warn(
              willRetry
                ? `Model pull failed (attempt ${attempt}/${retryCount}): ${errorMessage(err)}. Retrying in ${retryDelaySeconds} seconds...`
                : `Model pull failed (attempt ${attempt}/${retryCount}): ${errorMessage(err)}`
            );
          },
        }
      );
    } catch (err) {
      if (!(err instanceof PipelineInterruptedError)) {
        context.logger.error(`Failed to install model ${modelId} after ${retryCount} attempts.`);
      }
      throw err;
    }
    context.logger.success(`Model ${modelId} installed successfully!`);
  }
}
