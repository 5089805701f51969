import type { ILogger } from "../logging";
import type { StageFailure } from "../errors";

/** "recoverable" stages retry under their policy; "fatal" stages abort on the first failure. */
export type FailureMode = "recoverable" | "fatal";

export interface RetryPolicy {
  maxAttempts: number;
  /** Constant delay between attempts. */
  delayMs: number;
}

export interface StageContext {
  readonly logger: ILogger;
  readonly signal: AbortSignal;
  /** Record a non-fatal problem; the stage keeps going. */
  warn(message: string): void;
}

export interface IdempotencyResult {
  satisfied: boolean;
  reason?: string;
}

export interface Stage {
  readonly id: string;
  readonly name: string;
  readonly failureMode: FailureMode;
  readonly retryPolicy: RetryPolicy;
  isSatisfied(context: StageContext): Promise<IdempotencyResult>;
  execute(context: StageContext, attempt: number): Promise<void>;
}

export type StageStatus = "completed" | "skipped" | "failed";

export interface StageReport {
  stageId: string;
  status: StageStatus;
  attempts: number;
  warnings: string[];
  detail?: string;
  durationMs: number;
}

export type PipelineResult =
  | { ok: true; reports: StageReport[] }
  | { ok: false; failure: StageFailure; reports: StageReport[] };
