import type { IJobDispatcher, IngestJobData, IngestionJob } from "@indexloom/types";
import { isTerminalStatus } from "@indexloom/types";
import type { JobRepository } from "@indexloom/db";
import type { IngestionResult, IngestionService } from "@indexloom/core";
import { jobLogger } from "@indexloom/logger";
import type { Logger } from "@indexloom/logger";
import { decideRetry } from "@indexloom/errors";
import type { RetryPolicy } from "@indexloom/errors";

export interface IngestProcessorDeps {
  jobs: JobRepository;
  service: Pick<IngestionService, "createJob" | "execute" | "isRunning">;
  dispatcher: IJobDispatcher;
  /** Decides whether a run that failed on a transient error gets a successor job. */
  retryPolicy: RetryPolicy;
  logger?: Logger;
  now?: () => Date;
}

export type IngestOutcome =
  | { action: "ignored"; reason: "missing" | "terminal" | "in-progress" }
  | { action: "ran"; result: IngestionResult; successorJobId?: string };

/**
 * Ingest job processor.
 *
 * Redelivery is idempotent: missing and finished jobs are ignored, and so is
 * a job this process is still executing. Any other job still marked running
 * belongs to a worker that died mid-run; it is failed as interrupted and a
 * successor job runs in its place.
 */
export async function processIngest(
  data: IngestJobData,
  deps: IngestProcessorDeps,
): Promise<IngestOutcome> {
  const now = deps.now ?? (() => new Date());
  const log = jobLogger(deps.logger, { jobId: data.jobId, userId: data.userId });

  const job = await deps.jobs.get(data.jobId);
  if (!job) {
    log?.warn("ingest job not found, ignoring");
    return { action: "ignored", reason: "missing" };
  }
  if (isTerminalStatus(job.status)) {
    log?.info({ status: job.status }, "ingest job already finished, ignoring");
    return { action: "ignored", reason: "terminal" };
  }

  let target: IngestionJob = job;
  if (job.status === "running") {
    if (deps.service.isRunning(job.jobId)) {
      log?.info("ingest job still running in this worker, ignoring redelivery");
      return { action: "ignored", reason: "in-progress" };
    }
    const at = now();
    const interrupted = await deps.jobs.update(
      job.jobId,
      {
        status: "failed",
        errorSummary: "interrupted",
        finishedAt: at,
        log: [...job.log, { at: at.toISOString(), message: "Run interrupted" }],
      },
      { expectStatus: "running" },
    );
    if (!interrupted) {
      log?.info("ingest job finished during redelivery, ignoring");
      return { action: "ignored", reason: "terminal" };
    }
    target = await deps.service.createJob(job.userId, job.options, job.attempt + 1);
    log?.warn({ successorJobId: target.jobId }, "resuming interrupted ingest job");
  }

  const result = await deps.service.execute(target);
  if (result.status !== "failed" || result.failureKind === undefined) {
    return { action: "ran", result };
  }

  const decision = decideRetry(target.attempt, result.failureKind, deps.retryPolicy);
  if (decision.action === "giveup") {
    log?.error({ kind: result.failureKind, attempt: target.attempt }, "ingest job gave up");
    return { action: "ran", result };
  }

  const successor = await deps.service.createJob(target.userId, target.options, target.attempt + 1);
  await deps.dispatcher.dispatch(
    { type: "ingest", jobId: successor.jobId, userId: successor.userId },
    { delayMs: decision.delayMs },
  );
  log?.info(
    { successorJobId: successor.jobId, delayMs: decision.delayMs },
    "scheduled ingest retry",
  );
  return { action: "ran", result, successorJobId: successor.jobId };
}
