import type { ContentIndexEntry, IngestionJob } from "@indexloom/types";
import { ConflictError } from "@indexloom/errors";
import { expectedStatuses } from "./repository.interface.js";
import type {
  ContentIndexRepository,
  JobRepository,
  JobUpdate,
  JobUpdateGuard,
} from "./repository.interface.js";

const DEFAULT_LIST_LIMIT = 20;

function entryKey(userId: string, sourceId: string): string {
  return `${userId}\u0000${sourceId}`;
}

function cloneEntry(entry: ContentIndexEntry): ContentIndexEntry {
  return { ...entry, chunkIds: [...entry.chunkIds] };
}

function cloneJob(job: IngestionJob): IngestionJob {
  return {
    ...job,
    counters: { ...job.counters },
    log: job.log.map((entry) => ({ ...entry })),
    options: { ...job.options },
  };
}

/**
 * Process-local repositories for tests and single-process runs. Records are
 * copied in and out so callers never share mutable state with the store.
 */
export class InMemoryContentIndexRepository implements ContentIndexRepository {
  private readonly entries = new Map<string, ContentIndexEntry>();

  async get(userId: string, sourceId: string): Promise<ContentIndexEntry | null> {
    const entry = this.entries.get(entryKey(userId, sourceId));
    return entry ? cloneEntry(entry) : null;
  }

  async getMany(userId: string, sourceIds: string[]): Promise<ContentIndexEntry[]> {
    const found: ContentIndexEntry[] = [];
    for (const sourceId of new Set(sourceIds)) {
      const entry = this.entries.get(entryKey(userId, sourceId));
      if (entry) found.push(cloneEntry(entry));
    }
    return found;
  }

  async put(entry: ContentIndexEntry): Promise<void> {
    this.entries.set(entryKey(entry.userId, entry.sourceId), cloneEntry(entry));
  }

  async updateVersion(userId: string, sourceId: string, version: string | null): Promise<void> {
    const key = entryKey(userId, sourceId);
    const entry = this.entries.get(key);
    if (entry) {
      this.entries.set(key, { ...entry, version, updatedAt: new Date() });
    }
  }

  async delete(userId: string, sourceId: string): Promise<boolean> {
    return this.entries.delete(entryKey(userId, sourceId));
  }

  async listSourceIds(userId: string): Promise<string[]> {
    return [...this.entries.values()]
      .filter((entry) => entry.userId === userId)
      .map((entry) => entry.sourceId);
  }
}

export class InMemoryJobRepository implements JobRepository {
  private readonly jobs = new Map<string, IngestionJob>();

  async create(job: IngestionJob): Promise<void> {
    if (this.jobs.has(job.jobId)) {
      throw new ConflictError(`Job ${job.jobId} already exists`);
    }
    if (isActive(job) && this.activeFor(job.userId)) {
      throw new ConflictError(`User ${job.userId} already has an active ingestion job`);
    }
    this.jobs.set(job.jobId, cloneJob(job));
  }

  async get(jobId: string): Promise<IngestionJob | null> {
    const job = this.jobs.get(jobId);
    return job ? cloneJob(job) : null;
  }

  async update(jobId: string, changes: JobUpdate, guard?: JobUpdateGuard): Promise<boolean> {
    const job = this.jobs.get(jobId);
    if (!job) return false;
    if (guard && !expectedStatuses(guard).includes(job.status)) return false;
    this.jobs.set(
      jobId,
      cloneJob({ ...job, ...changes, updatedAt: changes.updatedAt ?? new Date() }),
    );
    return true;
  }

  async findActiveByUser(userId: string): Promise<IngestionJob | null> {
    const job = this.activeFor(userId);
    return job ? cloneJob(job) : null;
  }

  async listByUser(userId: string, limit = DEFAULT_LIST_LIMIT): Promise<IngestionJob[]> {
    return [...this.jobs.values()]
      .filter((job) => job.userId === userId)
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime())
      .slice(0, limit)
      .map(cloneJob);
  }

  /** Checked and written without yielding, so concurrent creates cannot both pass. */
  private activeFor(userId: string): IngestionJob | undefined {
    for (const job of this.jobs.values()) {
      if (job.userId === userId && isActive(job)) {
        return job;
      }
    }
    return undefined;
  }
}

function isActive(job: IngestionJob): boolean {
  return job.status === "pending" || job.status === "running";
}
