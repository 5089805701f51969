import type { IClock } from "../abstractions/IClock";
import type { IFileSystem } from "../abstractions/IFileSystem";
import type { IHttpClient } from "../abstractions/IHttpClient";
import type { IProcessRunner } from "../abstractions/IProcessRunner";
import type { IProcessSpawner } from "../abstractions/IProcessSpawner";
import type { ProvisionConfig } from "../config";
import type { ILogger } from "../logging";
import type { Stage } from "../pipeline/types";
import { ReadinessPoller } from "../readiness/ReadinessPoller";
import { ModelAcquisitionStage } from "./ModelAcquisitionStage";
import { PortExposureStage } from "./PortExposureStage";
import { PythonDependenciesStage } from "./PythonDependenciesStage";
import { RuntimeInstallStage } from "./RuntimeInstallStage";
import { SystemPackagesStage } from "./SystemPackagesStage";

export interface ProvisionDeps {
  runner: IProcessRunner;
  spawner: IProcessSpawner;
  httpClient: IHttpClient;
  clock: IClock;
  fs: IFileSystem;
  logger: ILogger;
  /** Environment whose PATH the runtime install extends; process.env in production. */
  env: Record<string, string | undefined>;
}

/**
 * The provisioning stages in the order they must run.
 */
export function createDefaultStages(config: ProvisionConfig, deps: ProvisionDeps): Stage[] {
  const poller = new ReadinessPoller(deps.httpClient, deps.clock, deps.logger);

  return [
    new SystemPackagesStage(deps.runner, config.systemPackages, config.systemCommands),
    new PythonDependenciesStage(deps.runner, config.pythonPackages),
    new RuntimeInstallStage(deps.runner, deps.fs, deps.env, {
      installUrl: config.runtimeInstallUrl,
      binDir: config.runtimeBinDir,
      shellProfile: config.shellProfile,
    }),
    new ModelAcquisitionStage(
      { runner: deps.runner, spawner: deps.spawner, fs: deps.fs, poller, clock: deps.clock },
      {
        modelId: config.modelId,
        modelsDir: config.modelsDir,
        port: config.port,
        timeoutSeconds: config.timeoutSeconds,
        pollIntervalSeconds: config.pollIntervalSeconds,
        retryCount: config.retryCount,
        retryDelaySeconds: config.retryDelaySeconds,
        serviceStopGraceMs: config.serviceStopGraceMs,
      }
    ),
    new PortExposureStage(deps.runner, deps.fs, {
      port: config.port,
      hostingContextEnabled: config.hostingContextEnabled,
      environmentName: config.environmentName,
      githubEnvPath: config.githubEnvPath,
    }),
  ];
}

export { SystemPackagesStage, PythonDependenciesStage, RuntimeInstallStage, ModelAcquisitionStage, PortExposureStage };
