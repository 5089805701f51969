import { z } from "zod";
import type { IHttpClient } from "../abstractions/IHttpClient";
import { errorMessage } from "../errors";
import { hasModel } from "../stages/ModelAcquisitionStage";

const TagsResponseSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough()),
});

export interface VerifyReport {
  target: string;
  reachable: boolean;
  modelInstalled: boolean;
  models: string[];
  detail?: string;
}

const VERIFY_TIMEOUT_MS = 5_000;

/**
 * Check that the runtime answers on /api/tags and lists the configured model.
 */
export async function verifyRuntime(httpClient: IHttpClient, port: number, modelId: string): Promise<VerifyReport> {
  const target = `http://localhost:${port}/api/tags`;
  const unreachable = (detail: string): VerifyReport => ({
    target,
    reachable: false,
    modelInstalled: false,
    models: [],
    detail,
  });

  let body: unknown;
  try {
    const response = await httpClient.get(target, { timeoutMs: VERIFY_TIMEOUT_MS });
    if (!response.ok) {
      return unreachable(`HTTP ${response.status}`);
    }
    body = await response.json();
  } catch (err) {
    return unreachable(errorMessage(err));
  }

  const parsed = TagsResponseSchema.safeParse(body);
  if (!parsed.success) {
    return { target, reachable: true, modelInstalled: false, models: [], detail: "unexpected /api/tags response" };
  }

  const models = parsed.data.models.map((model) => model.name);
  const modelInstalled = hasModel(models, modelId);
  return {
    target,
    reachable: true,
    modelInstalled,
    models,
    detail: modelInstalled ? undefined : `${modelId} is not installed`,
  };
}

export function formatVerifyReport(report: VerifyReport, modelId: string): string {
  const lines = [`Ollama runtime: ${report.target}`];
  lines.push(`  reachable: ${report.reachable ? "yes" : "no"}`);
  if (report.reachable) {
    lines.push(`  models: ${report.models.length > 0 ? report.models.join(", ") : "(none)"}`);
    lines.push(`  ${modelId}: ${report.modelInstalled ? "installed" : "missing"}`);
  }
  if (report.detail) {
    lines.push(`  detail: ${report.detail}`);
  }
  return lines.join("\n");
}
