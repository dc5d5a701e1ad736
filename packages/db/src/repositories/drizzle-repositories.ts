import { and, desc, eq, inArray } from "drizzle-orm";
import type { ContentIndexEntry, IngestionJob } from "@indexloom/types";
import { ConflictError } from "@indexloom/errors";
import type { DbClient } from "../client.js";
import { contentIndex, ingestionJobs } from "../schema/index.js";
import { expectedStatuses } from "./repository.interface.js";
import type {
  ContentIndexRepository,
  JobRepository,
  JobUpdate,
  JobUpdateGuard,
} from "./repository.interface.js";

const UNIQUE_VIOLATION = "23505";
const DEFAULT_LIST_LIMIT = 20;

type ContentIndexRow = typeof contentIndex.$inferSelect;
type IngestionJobRow = typeof ingestionJobs.$inferSelect;

function toEntry(row: ContentIndexRow): ContentIndexEntry {
  return {
    userId: row.userId,
    sourceId: row.sourceId,
    contentHash: row.contentHash,
    version: row.version,
    chunkIds: row.chunkIds,
    title: row.title,
    mimeType: row.mimeType,
    lastIngestedAt: row.lastIngestedAt,
    updatedAt: row.updatedAt,
  };
}

function toJob(row: IngestionJobRow): IngestionJob {
  return {
    jobId: row.id,
    userId: row.userId,
    status: row.status,
    counters: row.counters,
    log: row.log,
    options: row.options,
    attempt: row.attempt,
    errorSummary: row.errorSummary,
    cancelRequested: row.cancelRequested,
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
    startedAt: row.startedAt,
    finishedAt: row.finishedAt,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" && error !== null && Reflect.get(error, "code") === UNIQUE_VIOLATION
  );
}

export class DrizzleContentIndexRepository implements ContentIndexRepository {
  constructor(private readonly db: DbClient) {}

  async get(userId: string, sourceId: string): Promise<ContentIndexEntry | null> {
    const [row] = await this.db
      .select()
      .from(contentIndex)
      .where(and(eq(contentIndex.userId, userId), eq(contentIndex.sourceId, sourceId)))
      .limit(1);
    return row ? toEntry(row) : null;
  }

  async getMany(userId: string, sourceIds: string[]): Promise<ContentIndexEntry[]> {
    if (sourceIds.length === 0) return [];
    const rows = await this.db
      .select()
      .from(contentIndex)
      .where(and(eq(contentIndex.userId, userId), inArray(contentIndex.sourceId, sourceIds)));
    return rows.map(toEntry);
  }

  async put(entry: ContentIndexEntry): Promise<void> {
    const values = {
      contentHash: entry.contentHash,
      version: entry.version,
      chunkIds: entry.chunkIds,
      title: entry.title,
      mimeType: entry.mimeType,
      lastIngestedAt: entry.lastIngestedAt,
      updatedAt: entry.updatedAt,
    };
    await this.db
      .insert(contentIndex)
      .values({ userId: entry.userId, sourceId: entry.sourceId, ...values })
      .onConflictDoUpdate({
        target: [contentIndex.userId, contentIndex.sourceId],
        set: values,
      });
  }

  async updateVersion(userId: string, sourceId: string, version: string | null): Promise<void> {
    await this.db
      .update(contentIndex)
      .set({ version, updatedAt: new Date() })
      .where(and(eq(contentIndex.userId, userId), eq(contentIndex.sourceId, sourceId)));
  }

  async delete(userId: string, sourceId: string): Promise<boolean> {
    const deleted = await this.db
      .delete(contentIndex)
      .where(and(eq(contentIndex.userId, userId), eq(contentIndex.sourceId, sourceId)))
      .returning({ sourceId: contentIndex.sourceId });
    return deleted.length > 0;
  }

  async listSourceIds(userId: string): Promise<string[]> {
    const rows = await this.db
      .select({ sourceId: contentIndex.sourceId })
      .from(contentIndex)
      .where(eq(contentIndex.userId, userId));
    return rows.map((row) => row.sourceId);
  }
}

export class DrizzleJobRepository implements JobRepository {
  constructor(private readonly db: DbClient) {}

  async create(job: IngestionJob): Promise<void> {
    try {
      await this.db.insert(ingestionJobs).values({
        id: job.jobId,
        userId: job.userId,
        status: job.status,
        counters: job.counters,
        log: job.log,
        options: job.options,
        attempt: job.attempt,
        errorSummary: job.errorSummary,
        cancelRequested: job.cancelRequested,
        createdAt: job.createdAt,
        updatedAt: job.updatedAt,
        startedAt: job.startedAt,
        finishedAt: job.finishedAt,
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`User ${job.userId} already has an active ingestion job`);
      }
      throw error;
    }
  }

  async get(jobId: string): Promise<IngestionJob | null> {
    const [row] = await this.db
      .select()
      .from(ingestionJobs)
      .where(eq(ingestionJobs.id, jobId))
      .limit(1);
    return row ? toJob(row) : null;
  }

  async update(jobId: string, changes: JobUpdate, guard?: JobUpdateGuard): Promise<boolean> {
    const byId = eq(ingestionJobs.id, jobId);
    const updated = await this.db
      .update(ingestionJobs)
      .set({ ...changes, updatedAt: changes.updatedAt ?? new Date() })
      .where(guard ? and(byId, inArray(ingestionJobs.status, expectedStatuses(guard))) : byId)
      .returning({ id: ingestionJobs.id });
    return updated.length > 0;
  }

  async findActiveByUser(userId: string): Promise<IngestionJob | null> {
    const [row] = await this.db
      .select()
      .from(ingestionJobs)
      .where(
        and(
          eq(ingestionJobs.userId, userId),
          inArray(ingestionJobs.status, ["pending", "running"]),
        ),
      )
      .limit(1);
    return row ? toJob(row) : null;
  }

  async listByUser(userId: string, limit = DEFAULT_LIST_LIMIT): Promise<IngestionJob[]> {
    const rows = await this.db
      .select()
      .from(ingestionJobs)
      .where(eq(ingestionJobs.userId, userId))
      .orderBy(desc(ingestionJobs.createdAt))
      .limit(limit);
    return rows.map(toJob);
  }
}
