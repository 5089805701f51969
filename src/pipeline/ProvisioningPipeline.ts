import type { IClock } from "../abstractions/IClock";
import type { ILogger } from "../logging";
import type { IdempotencyResult, PipelineResult, RetryPolicy, Stage, StageContext, StageReport } from "./types";
import { retry } from "./retry";
import {
  PipelineInterruptedError,
  RetryExhaustedError,
  StageFailure,
  errorMessage,
  throwIfAborted,
} from "../errors";

const SINGLE_ATTEMPT: RetryPolicy = { maxAttempts: 1, delayMs: 0 };

interface StageOutcome {
  report: StageReport;
  failure: StageFailure | null;
}

/**
 * Runs stages strictly in order. A stage whose idempotency check passes is
 * skipped; otherwise its action runs under the stage's retry policy. The
 * first stage that fails for good ends the run and later stages never start.
 *
 * Aborting `signal` rejects with PipelineInterruptedError instead of
 * returning a result.
 */
export class ProvisioningPipeline {
  constructor(
    private readonly logger: ILogger,
    private readonly clock: IClock
  ) {}

  async run(stages: readonly Stage[], signal: AbortSignal = new AbortController().signal): Promise<PipelineResult> {
    const reports: StageReport[] = [];

    for (const [index, stage] of stages.entries()) {
      throwIfAborted(signal);
      this.logger.info(`[${index + 1}/${stages.length}] ${stage.name}...`);

      const { report, failure } = await this.runStage(stage, signal);
      reports.push(report);

      if (failure) {
        const skipped = stages.length - index - 1;
        if (skipped > 0) {
          this.logger.error(`Aborting: ${skipped} remaining stage(s) not run`);
        }
        return { ok: false, failure, reports };
      }
    }

    return { ok: true, reports };
  }

  private async runStage(stage: Stage, signal: AbortSignal): Promise<StageOutcome> {
    const startedAt = this.clock.now().getTime();
    const warnings: string[] = [];
    const context: StageContext = {
      logger: this.logger,
      signal,
      warn: (message) => {
        warnings.push(message);
        this.logger.warn(`[${stage.id}] ${message}`);
      },
    };
    const elapsed = (): number => this.clock.now().getTime() - startedAt;

    const check = await this.checkSatisfied(stage, context);
    if (check.satisfied) {
      this.logger.success(`${stage.name}: already satisfied${check.reason ? ` (${check.reason})` : ""}`);
      return {
        report: { stageId: stage.id, status: "skipped", attempts: 0, warnings, detail: check.reason, durationMs: elapsed() },
        failure: null,
      };
    }

    const policy = stage.failureMode === "fatal" ? SINGLE_ATTEMPT : stage.retryPolicy;
    let attemptsMade = 0;

    try {
      await retry(
        async (attempt) => {
          attemptsMade = attempt;
          await stage.execute(context, attempt);
        },
        policy,
        {
          clock: this.clock,
          signal,
          onAttemptFailed: (attempt, err, willRetry) => {
            if (willRetry) {
              this.logger.warn(
                `${stage.name} failed (attempt ${attempt}/${policy.maxAttempts}): ${errorMessage(err)}. ` +
                  `Retrying in ${policy.delayMs / 1000} seconds...`
              );
            }
          },
        }
      );
    } catch (err) {
      if (err instanceof PipelineInterruptedError) {
        throw err;
      }
      let lastError = err instanceof RetryExhaustedError ? err.lastError : err;
      // A stage that retries internally reports its own attempt count
      if (lastError instanceof RetryExhaustedError) {
        attemptsMade = lastError.attempts;
        lastError = lastError.lastError;
      }
      const failure = new StageFailure(stage.id, attemptsMade, lastError);
      this.logger.error(failure.message);
      return {
        report: {
          stageId: stage.id,
          status: "failed",
          attempts: attemptsMade,
          warnings,
          detail: errorMessage(lastError),
          durationMs: elapsed(),
        },
        failure,
      };
    }

    this.logger.success(`${stage.name}: done`);
    return {
      report: { stageId: stage.id, status: "completed", attempts: attemptsMade, warnings, durationMs: elapsed() },
      failure: null,
    };
  }

  /** A check that throws counts as "not satisfied". */
  private async checkSatisfied(stage: Stage, context: StageContext): Promise<IdempotencyResult> {
    try {
      return await stage.isSatisfied(context);
    } catch (err) {
      if (err instanceof PipelineInterruptedError) {
        throw err;
      }
      this.logger.warn(`${stage.name}: idempotency check failed (${errorMessage(err)}); running stage`);
      return { satisfied: false };
    }
  }
}
