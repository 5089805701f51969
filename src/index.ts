export { resolveConfig, defaultConfig, parseFileConfig } from "./config";
export type { ProvisionConfig, FileConfig, ResolveConfigOptions } from "./config";
export { ConsoleLogger, FileLogger, InMemoryLogger, TeeLogger } from "./logging";
export type { ILogger, LogLevel } from "./logging";
export * from "./errors";
export { ProvisioningPipeline } from "./pipeline/ProvisioningPipeline";
export { retry } from "./pipeline/retry";
export type { Stage, StageContext, StageReport, PipelineResult, RetryPolicy, FailureMode } from "./pipeline/types";
export { ReadinessPoller } from "./readiness/ReadinessPoller";
export type { ReadinessResult } from "./readiness/ReadinessPoller";
export { ServiceHandle, withService } from "./service/ServiceHandle";
export type { ServiceState } from "./service/ServiceHandle";
export { createDefaultStages } from "./stages";
export type { ProvisionDeps } from "./stages";
export { runProvision } from "./commands/provision";
export { verifyRuntime } from "./commands/verify";
export { freezeRequirements } from "./commands/freezeRequirements";
