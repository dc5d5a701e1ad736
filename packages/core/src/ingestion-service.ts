import { randomUUID } from "node:crypto";
import type {
  IContentSource,
  IJobDispatcher,
  IngestionJob,
  RunOptions,
  ScoredChunk,
} from "@indexloom/types";
import { emptyCounters, isTerminalStatus } from "@indexloom/types";
import type { JobRepository } from "@indexloom/db";
import type { Logger } from "@indexloom/logger";
import { ConflictError, NotFoundError } from "@indexloom/errors";
import { runIngestion } from "./ingestion-pipeline.js";
import type { IngestionDependencies, IngestionResult } from "./ingestion-pipeline.js";
import { retrieve } from "./retrieval-pipeline.js";
import { UserLock } from "./user-lock.js";

export type PipelineDependencies = Omit<IngestionDependencies, "source" | "jobs" | "logger">;

export interface IngestionServiceDependencies {
  jobs: JobRepository;
  dispatcher: IJobDispatcher;
  /** Resolves `RunOptions.source`; throws `NotFoundError` for unknown types. */
  resolveSource: (type: string) => IContentSource;
  pipeline: PipelineDependencies;
  lock?: UserLock;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Entry point for starting, running, observing and cancelling ingestion
 * jobs, and for searching what they indexed.
 */
export class IngestionService {
  private readonly jobs: JobRepository;
  private readonly dispatcher: IJobDispatcher;
  private readonly resolveSource: (type: string) => IContentSource;
  private readonly pipeline: PipelineDependencies;
  private readonly lock: UserLock;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  /** Runs executing in this process, by job id. */
  private readonly running = new Map<string, AbortController>();

  constructor(deps: IngestionServiceDependencies) {
    this.jobs = deps.jobs;
    this.dispatcher = deps.dispatcher;
    this.resolveSource = deps.resolveSource;
    this.pipeline = deps.pipeline;
    this.lock = deps.lock ?? new UserLock();
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /** Create a pending job and hand it to background execution. */
  async startRun(userId: string, options: RunOptions): Promise<string> {
    const job = await this.createJob(userId, options);
    try {
      await this.dispatcher.dispatch({ type: "ingest", jobId: job.jobId, userId });
    } catch (error: unknown) {
      const reason = error instanceof Error ? error.message : String(error);
      await this.jobs.update(
        job.jobId,
        { status: "failed", errorSummary: `Dispatch failed: ${reason}`, finishedAt: this.now() },
        { expectStatus: "pending" },
      );
      throw error;
    }
    this.logger?.info({ jobId: job.jobId, userId }, "ingestion job dispatched");
    return job.jobId;
  }

  /** Create a job and run it to completion in the caller's process. */
  async runInline(userId: string, options: RunOptions): Promise<IngestionResult> {
    const job = await this.createJob(userId, options);
    return this.execute(job);
  }

  /**
   * Create a pending job. Rejects while the user has a pending or running job
   * or a run in progress in this process.
   */
  async createJob(userId: string, options: RunOptions, attempt = 1): Promise<IngestionJob> {
    this.resolveSource(options.source);
    if (this.lock.isHeld(userId)) {
      throw new ConflictError(`An ingestion run is already in progress for user ${userId}`);
    }
    const active = await this.jobs.findActiveByUser(userId);
    if (active) {
      throw new ConflictError(`User ${userId} already has an active ingestion job`, {
        details: { jobId: active.jobId },
      });
    }

    const now = this.now();
    const job: IngestionJob = {
      jobId: randomUUID(),
      userId,
      status: "pending",
      counters: emptyCounters(),
      log: [],
      options,
      attempt,
      errorSummary: null,
      cancelRequested: false,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
    };
    await this.jobs.create(job);
    return job;
  }

  /** Run a pending job under the user's lock. */
  async execute(job: IngestionJob): Promise<IngestionResult> {
    const controller = new AbortController();
    return this.lock.withLock(job.userId, async () => {
      this.running.set(job.jobId, controller);
      try {
        return await runIngestion(
          {
            jobId: job.jobId,
            userId: job.userId,
            options: job.options,
            signal: controller.signal,
          },
          {
            ...this.pipeline,
            source: this.resolveSource(job.options.source),
            jobs: this.jobs,
            logger: this.logger,
          },
        );
      } finally {
        this.running.delete(job.jobId);
      }
    });
  }

  /** Whether the job is executing in this process. */
  isRunning(jobId: string): boolean {
    return this.running.has(jobId);
  }

  async getStatus(jobId: string): Promise<IngestionJob> {
    const job = await this.jobs.get(jobId);
    if (!job) {
      throw new NotFoundError(`Ingestion job ${jobId} not found`);
    }
    return job;
  }

  async listJobs(userId: string, limit?: number): Promise<IngestionJob[]> {
    return this.jobs.listByUser(userId, limit);
  }

  /**
   * Request cancellation. A pending job is cancelled at once; a running one
   * stops before its next document. Terminal jobs are returned unchanged.
   */
  async cancel(jobId: string): Promise<IngestionJob> {
    const job = await this.getStatus(jobId);
    if (isTerminalStatus(job.status)) {
      return job;
    }

    await this.jobs.update(
      jobId,
      { cancelRequested: true },
      { expectStatus: ["pending", "running"] },
    );
    if (job.status === "pending") {
      const now = this.now();
      await this.jobs.update(
        jobId,
        {
          status: "cancelled",
          finishedAt: now,
          log: [...job.log, { at: now.toISOString(), message: "Cancelled before start" }],
        },
        { expectStatus: "pending" },
      );
    }
    this.running.get(jobId)?.abort();

    this.logger?.info({ jobId, status: job.status }, "ingestion job cancel requested");
    return this.getStatus(jobId);
  }

  async search(userId: string, query: string, k?: number): Promise<ScoredChunk[]> {
    return retrieve(
      { userId, query, topK: k },
      {
        embeddingProvider: this.pipeline.embeddingProvider,
        documentIndex: this.pipeline.documentIndex,
      },
    );
  }
}
