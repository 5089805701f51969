import type { ProvisionConfig } from "../config";
import type { PipelineResult } from "../pipeline/types";
import { ProvisioningPipeline } from "../pipeline/ProvisioningPipeline";
import { createDefaultStages, type ProvisionDeps } from "../stages";

/**
 * Run every provisioning stage and print next steps on success.
 * Rejects with PipelineInterruptedError when `signal` aborts.
 */
export async function runProvision(
  config: ProvisionConfig,
  deps: ProvisionDeps,
  signal?: AbortSignal
): Promise<PipelineResult> {
  const { logger } = deps;
  logger.success("Starting Codespaces setup...");

  const pipeline = new ProvisioningPipeline(logger, deps.clock);
  const result = await pipeline.run(createDefaultStages(config, deps), signal);

  if (!result.ok) {
    logger.error(`Setup failed: ${result.failure.message}`);
    return result;
  }

  logger.success("Setup completed successfully!");
  logger.info("Run the following commands to get started:");
  logger.info("1. ollama serve - Start Ollama server");
  logger.info(`2. Configure your application to use port ${config.port}`);
  return result;
}
