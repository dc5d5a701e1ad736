import type { ContentIndexEntry, IngestionJob, JobStatus } from "@indexloom/types";

export interface ContentIndexRepository {
  get(userId: string, sourceId: string): Promise<ContentIndexEntry | null>;
  getMany(userId: string, sourceIds: string[]): Promise<ContentIndexEntry[]>;
  /** Insert or replace the whole entry in one write. */
  put(entry: ContentIndexEntry): Promise<void>;
  /** Refresh the stored version marker without touching the chunk set. */
  updateVersion(userId: string, sourceId: string, version: string | null): Promise<void>;
  /** Returns whether an entry existed. */
  delete(userId: string, sourceId: string): Promise<boolean>;
  /** Every source id with an entry for the user. */
  listSourceIds(userId: string): Promise<string[]>;
}

export type JobUpdate = Partial<Omit<IngestionJob, "jobId" | "userId" | "createdAt">>;

/** Compare-and-set condition for {@link JobRepository.update}. */
export interface JobUpdateGuard {
  expectStatus: JobStatus | readonly JobStatus[];
}

export function expectedStatuses(guard: JobUpdateGuard): JobStatus[] {
  return typeof guard.expectStatus === "string" ? [guard.expectStatus] : [...guard.expectStatus];
}

export interface JobRepository {
  /** Rejects with `ConflictError` when the user already has a pending or running job. */
  create(job: IngestionJob): Promise<void>;
  get(jobId: string): Promise<IngestionJob | null>;
  /**
   * Apply `changes` in one write. With a guard, the write only happens while
   * the stored status is one of the expected ones. Resolves to whether a row
   * was changed.
   */
  update(jobId: string, changes: JobUpdate, guard?: JobUpdateGuard): Promise<boolean>;
  findActiveByUser(userId: string): Promise<IngestionJob | null>;
  listByUser(userId: string, limit?: number): Promise<IngestionJob[]>;
}
