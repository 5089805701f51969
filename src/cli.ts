#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:
 *   devbox-provision                      provision the environment
 *   devbox-provision verify               check the runtime and model
 *   devbox-provision freeze-requirements  write unpinned requirements.txt
 *   ... --config <path>                   use a specific config file
 *
 * Exit codes:
 *   0   = success
 *   1   = a stage failed, the runtime check failed, or the config is invalid
 *   130 = interrupted (SIGINT/SIGTERM)
 */

import * as os from "node:os";
import * as path from "node:path";
import { resolveConfig } from "./config";
import { ConsoleLogger, FileLogger, TeeLogger } from "./logging";
import { ConfigError, PipelineInterruptedError } from "./errors";
import { NodeFileSystem } from "./abstractions/NodeFileSystem";
import { NodeProcessRunner } from "./abstractions/NodeProcessRunner";
import { NodeProcessSpawner } from "./abstractions/NodeProcessSpawner";
import { FetchHttpClient } from "./abstractions/FetchHttpClient";
import { SystemClock } from "./abstractions/SystemClock";
import { runProvision } from "./commands/provision";
import { formatVerifyReport, verifyRuntime } from "./commands/verify";
import { freezeRequirements } from "./commands/freezeRequirements";

export type Command = "provision" | "verify" | "freeze-requirements";

export interface ParsedArgs {
  command: Command;
  configPath?: string;
}

const INTERRUPTED_EXIT_CODE = 130;

export function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  let command: Command = "provision";
  let configPath: string | undefined;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === "provision" || arg === "verify" || arg === "freeze-requirements") {
      command = arg;
    } else if (arg === "--config" && i + 1 < args.length) {
      configPath = args[++i];
    }
  }

  return { command, configPath };
}

async function main(): Promise<void> {
  const { command, configPath } = parseArgs(process.argv);
  const fs = new NodeFileSystem();
  const config = await resolveConfig(fs, {
    configPath,
    cwd: process.cwd(),
    env: process.env,
    homedir: os.homedir(),
  });

  if (command === "verify") {
    const report = await verifyRuntime(new FetchHttpClient(), config.port, config.modelId);
    console.log(formatVerifyReport(report, config.modelId));
    process.exit(report.reachable && report.modelInstalled ? 0 : 1);
  }

  if (command === "freeze-requirements") {
    const outputPath = path.resolve(config.requirementsFile);
    const result = await freezeRequirements(new NodeProcessRunner(), fs, outputPath);
    console.log(`Wrote ${result.packages.length} package(s) to ${result.path}`);
    return;
  }

  const logPath = path.resolve(config.logFile);
  const logger = new TeeLogger([
    new ConsoleLogger({ logLevel: config.logLevel }),
    new FileLogger(logPath, `Codespaces setup started (model ${config.modelId})`),
  ]);

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.error(`Received ${signal}, aborting`);
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const result = await runProvision(
      config,
      {
        runner: new NodeProcessRunner(),
        spawner: new NodeProcessSpawner(),
        httpClient: new FetchHttpClient(),
        clock: new SystemClock(),
        fs,
        logger,
        env: process.env,
      },
      controller.signal
    );
    if (!result.ok) {
      logger.error(`See ${logPath} for details`);
      process.exit(1);
    }
  } catch (err) {
    if (err instanceof PipelineInterruptedError) {
      logger.error(err.message);
      process.exit(INTERRUPTED_EXIT_CODE);
    }
    throw err;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
  }
}

// Skip main() in test runners (Jest sets JEST_WORKER_ID)
if (!process.env.JEST_WORKER_ID) {
  main().catch((err) => {
    if (err instanceof ConfigError) {
      console.error(err.message);
    } else {
      console.error("Fatal:", err);
    }
    process.exit(1);
  });
}
