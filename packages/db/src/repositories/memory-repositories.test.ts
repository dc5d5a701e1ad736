import { describe, it, expect } from "vitest";
import type { ContentIndexEntry, IngestionJob } from "@indexloom/types";
import { emptyCounters } from "@indexloom/types";
import { ConflictError } from "@indexloom/errors";
import {
  InMemoryContentIndexRepository,
  InMemoryJobRepository,
} from "./memory-repositories.js";

function makeEntry(overrides: Partial<ContentIndexEntry> = {}): ContentIndexEntry {
  return {
    userId: "user-1",
    sourceId: "doc-1",
    contentHash: "h1",
    version: "v1",
    chunkIds: ["c1", "c2"],
    title: "Doc",
    mimeType: "text/plain",
    lastIngestedAt: new Date("2026-01-01T00:00:00Z"),
    updatedAt: new Date("2026-01-01T00:00:00Z"),
    ...overrides,
  };
}

function makeJob(overrides: Partial<IngestionJob> = {}): IngestionJob {
  return {
    jobId: "job-1",
    userId: "user-1",
    status: "pending",
    counters: emptyCounters(),
    log: [],
    options: { source: "memory", forceReembed: false },
    attempt: 1,
    errorSummary: null,
    cancelRequested: false,
    createdAt: new Date("2026-01-01T00:00:00Z"),
    updatedAt: new Date("2026-01-01T00:00:00Z"),
    startedAt: null,
    finishedAt: null,
    ...overrides,
  };
}

describe("InMemoryContentIndexRepository", () => {
  it("stores and replaces entries per user and source", async () => {
    const repo = new InMemoryContentIndexRepository();
    await repo.put(makeEntry());
    await repo.put(makeEntry({ contentHash: "h2", chunkIds: ["c3"] }));

    const entry = await repo.get("user-1", "doc-1");
    expect(entry?.contentHash).toBe("h2");
    expect(entry?.chunkIds).toEqual(["c3"]);
    expect(await repo.get("user-2", "doc-1")).toBeNull();
  });

  it("hands out copies", async () => {
    const repo = new InMemoryContentIndexRepository();
    await repo.put(makeEntry());

    const entry = await repo.get("user-1", "doc-1");
    entry?.chunkIds.push("mutated");

    expect((await repo.get("user-1", "doc-1"))?.chunkIds).toEqual(["c1", "c2"]);
  });

  it("updates only the version", async () => {
    const repo = new InMemoryContentIndexRepository();
    await repo.put(makeEntry());
    await repo.updateVersion("user-1", "doc-1", "v2");

    const entry = await repo.get("user-1", "doc-1");
    expect(entry?.version).toBe("v2");
    expect(entry?.contentHash).toBe("h1");
    expect(entry?.chunkIds).toEqual(["c1", "c2"]);
  });

  it("returns entries for the requested sources only", async () => {
    const repo = new InMemoryContentIndexRepository();
    await repo.put(makeEntry({ sourceId: "a" }));
    await repo.put(makeEntry({ sourceId: "b" }));
    await repo.put(makeEntry({ sourceId: "c", userId: "user-2" }));

    const entries = await repo.getMany("user-1", ["a", "c", "a"]);
    expect(entries.map((e) => e.sourceId)).toEqual(["a"]);
  });

  it("lists the source ids of one user", async () => {
    const repo = new InMemoryContentIndexRepository();
    await repo.put(makeEntry({ sourceId: "a" }));
    await repo.put(makeEntry({ sourceId: "b" }));
    await repo.put(makeEntry({ sourceId: "c", userId: "user-2" }));

    expect((await repo.listSourceIds("user-1")).sort()).toEqual(["a", "b"]);
    expect(await repo.listSourceIds("user-3")).toEqual([]);
  });

  it("reports whether a delete removed anything", async () => {
    const repo = new InMemoryContentIndexRepository();
    await repo.put(makeEntry());
    expect(await repo.delete("user-1", "doc-1")).toBe(true);
    expect(await repo.delete("user-1", "doc-1")).toBe(false);
  });
});

describe("InMemoryJobRepository", () => {
  it("rejects a second active job for the same user", async () => {
    const repo = new InMemoryJobRepository();
    await repo.create(makeJob());

    await expect(repo.create(makeJob({ jobId: "job-2" }))).rejects.toBeInstanceOf(ConflictError);
    await repo.create(makeJob({ jobId: "job-3", userId: "user-2" }));
  });

  it("allows a new job once the previous one is terminal", async () => {
    const repo = new InMemoryJobRepository();
    await repo.create(makeJob());
    await repo.update("job-1", { status: "succeeded" });

    await repo.create(makeJob({ jobId: "job-2" }));
    expect((await repo.findActiveByUser("user-1"))?.jobId).toBe("job-2");
  });

  it("applies partial updates and keeps unspecified fields", async () => {
    const repo = new InMemoryJobRepository();
    await repo.create(makeJob());
    await repo.update("job-1", {
      status: "running",
      counters: { found: 2, processed: 1, embedded: 3, skipped: 0, errors: 0 },
    });

    const job = await repo.get("job-1");
    expect(job?.status).toBe("running");
    expect(job?.counters.embedded).toBe(3);
    expect(job?.options).toEqual({ source: "memory", forceReembed: false });
  });

  it("applies a guarded update only from the expected status", async () => {
    const repo = new InMemoryJobRepository();
    await repo.create(makeJob({ status: "running" }));

    expect(await repo.update("job-1", { status: "succeeded" }, { expectStatus: "running" })).toBe(
      true,
    );
    expect(await repo.update("job-1", { status: "failed" }, { expectStatus: "running" })).toBe(
      false,
    );
    expect(
      await repo.update("job-1", { errorSummary: "late" }, { expectStatus: ["pending", "running"] }),
    ).toBe(false);

    const job = await repo.get("job-1");
    expect(job?.status).toBe("succeeded");
    expect(job?.errorSummary).toBeNull();
  });

  it("reports a missing job as not updated", async () => {
    const repo = new InMemoryJobRepository();
    expect(await repo.update("missing", { status: "failed" })).toBe(false);
  });

  it("lists a user's jobs newest first", async () => {
    const repo = new InMemoryJobRepository();
    await repo.create(makeJob({ jobId: "old", status: "failed" }));
    await repo.create(
      makeJob({ jobId: "new", status: "succeeded", createdAt: new Date("2026-02-01T00:00:00Z") }),
    );

    const jobs = await repo.listByUser("user-1");
    expect(jobs.map((j) => j.jobId)).toEqual(["new", "old"]);
  });
});
