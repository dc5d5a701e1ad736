import type {
  IngestionJob,
  JobCounter,
  JobCounters,
  JobLogEntry,
  JobStatus,
  TerminalJobStatus,
} from "@indexloom/types";
import type { JobRepository } from "@indexloom/db";
import type { Logger } from "@indexloom/logger";
import { isTerminalStatus } from "@indexloom/types";
import { redactText } from "@indexloom/logger";
import { InvalidJobTransitionError, NotFoundError, ValidationError } from "@indexloom/errors";

/** Oldest entries are dropped beyond this. */
export const MAX_LOG_ENTRIES = 1000;

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  pending: ["running", "cancelled", "failed"],
  running: ["succeeded", "partial", "failed", "cancelled"],
  succeeded: [],
  partial: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function assertTransition(jobId: string, from: JobStatus, to: JobStatus): void {
  if (!canTransition(from, to)) {
    throw new InvalidJobTransitionError(jobId, from, to);
  }
}

export interface JobTrackerOptions {
  jobs: JobRepository;
  /** Persist buffered progress after this many completed pages. */
  flushEveryPages: number;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Owns one job's state during a run. Counter increments and log lines are
 * buffered and written at most once per `flushEveryPages` pages, plus on
 * {@link checkpoint} and {@link finish}. Every write re-reads the job's
 * cancel flag and aborts {@link signal} when it is set.
 *
 * Status writes are conditional on the stored status. When another worker
 * has already finished the job, the run is aborted and its final write
 * keeps the stored terminal status.
 */
export class JobTracker {
  private job: IngestionJob;
  private readonly jobs: JobRepository;
  private readonly flushEveryPages: number;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  private readonly abortController = new AbortController();
  private pagesSinceFlush = 0;
  private dirty = false;
  private lost = false;

  private constructor(job: IngestionJob, options: JobTrackerOptions) {
    this.job = job;
    this.jobs = options.jobs;
    this.flushEveryPages = Math.max(1, options.flushEveryPages);
    this.logger = options.logger;
    this.now = options.now ?? (() => new Date());
    if (job.cancelRequested) {
      this.abortController.abort();
    }
  }

  static async load(jobId: string, options: JobTrackerOptions): Promise<JobTracker> {
    const job = await options.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError(`Ingestion job ${jobId} not found`);
    }
    return new JobTracker(job, options);
  }

  get jobId(): string {
    return this.job.jobId;
  }

  get userId(): string {
    return this.job.userId;
  }

  get status(): JobStatus {
    return this.job.status;
  }

  get counters(): JobCounters {
    return { ...this.job.counters };
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get cancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /** True once the stored job was finished by someone else. */
  get superseded(): boolean {
    return this.lost;
  }

  snapshot(): IngestionJob {
    return { ...this.job, counters: this.counters, log: [...this.job.log] };
  }

  /** Cancel the run from inside this process. */
  abort(): void {
    this.abortController.abort();
  }

  /**
   * Move the job to `running`. The stored row is re-read first so a cancel
   * that landed after {@link load} is honoured.
   */
  async start(): Promise<void> {
    const current = await this.jobs.get(this.job.jobId);
    if (current) {
      this.job = current;
    }
    assertTransition(this.job.jobId, this.job.status, "running");
    if (this.job.cancelRequested) {
      this.abortController.abort();
    }

    const now = this.now();
    const started = await this.jobs.update(
      this.job.jobId,
      { status: "running", startedAt: now, updatedAt: now },
      { expectStatus: "pending" },
    );
    if (!started) {
      const stored = await this.jobs.get(this.job.jobId);
      throw new InvalidJobTransitionError(
        this.job.jobId,
        stored?.status ?? this.job.status,
        "running",
      );
    }
    this.job = { ...this.job, status: "running", startedAt: now, updatedAt: now };
  }

  increment(counter: JobCounter, by = 1): void {
    if (!Number.isInteger(by) || by < 0) {
      throw new ValidationError("Counters only move forward", {
        [counter]: `invalid increment ${String(by)}`,
      });
    }
    if (by === 0) return;
    this.job.counters = { ...this.job.counters, [counter]: this.job.counters[counter] + by };
    this.dirty = true;
  }

  log(message: string): void {
    const entry: JobLogEntry = { at: this.now().toISOString(), message: redactText(message) };
    const log = [...this.job.log, entry];
    this.job.log = log.length > MAX_LOG_ENTRIES ? log.slice(log.length - MAX_LOG_ENTRIES) : log;
    this.dirty = true;
    this.logger?.info({ jobId: this.job.jobId }, entry.message);
  }

  /** Call once per completed page; persists when the page interval is reached. */
  async pageCompleted(): Promise<void> {
    this.pagesSinceFlush += 1;
    if (this.pagesSinceFlush >= this.flushEveryPages) {
      await this.flush();
    }
  }

  /** Persist buffered progress now, regardless of the page interval. */
  async checkpoint(): Promise<void> {
    await this.flush();
  }

  /**
   * Record the final status. Resolves to the status the job is stored with,
   * which is the stored one when the job was already finished elsewhere.
   */
  async finish(
    status: TerminalJobStatus,
    errorSummary: string | null = null,
  ): Promise<TerminalJobStatus> {
    assertTransition(this.job.jobId, this.job.status, status);
    const now = this.now();
    const summary = errorSummary === null ? null : redactText(errorSummary);
    const recorded = await this.jobs.update(
      this.job.jobId,
      {
        status,
        counters: this.counters,
        log: this.job.log,
        errorSummary: summary,
        finishedAt: now,
        updatedAt: now,
      },
      { expectStatus: "running" },
    );
    this.dirty = false;
    this.pagesSinceFlush = 0;

    if (!recorded) {
      return this.adoptStored(status);
    }
    this.job = { ...this.job, status, errorSummary: summary, finishedAt: now, updatedAt: now };
    return status;
  }

  private async adoptStored(wanted: JobStatus): Promise<TerminalJobStatus> {
    const stored = await this.jobs.get(this.job.jobId);
    const status = stored?.status ?? this.job.status;
    if (!stored || !isTerminalStatus(status)) {
      throw new InvalidJobTransitionError(this.job.jobId, status, wanted);
    }
    this.lost = true;
    this.job = stored;
    this.logger?.warn(
      { jobId: stored.jobId, status },
      "job already finished elsewhere, keeping stored status",
    );
    return status;
  }

  private markLost(): void {
    this.lost = true;
    this.abortController.abort();
  }

  private async flush(): Promise<void> {
    this.pagesSinceFlush = 0;

    const stored = await this.jobs.get(this.job.jobId);
    if (stored && stored.status !== "running") {
      this.markLost();
      return;
    }
    if (stored?.cancelRequested && !this.cancelled) {
      this.job.cancelRequested = true;
      this.abortController.abort();
    }

    if (!this.dirty) return;
    const written = await this.jobs.update(
      this.job.jobId,
      { counters: this.counters, log: this.job.log, updatedAt: this.now() },
      { expectStatus: "running" },
    );
    if (!written) {
      this.markLost();
      return;
    }
    this.dirty = false;
  }
}
