import { describe, it, expect, vi } from "vitest";
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { emptyCounters } from "@indexloom/types";
import { computeContentHash } from "@indexloom/parser";
import { LocalDirectorySource } from "@indexloom/connectors";
import { ConsistencyError, TransientProviderError } from "@indexloom/errors";
import { runIngestion } from "./ingestion-pipeline.js";
import { createHarness, keywordVector, paragraphs } from "./test-harness.js";

describe("runIngestion", () => {
  it("indexes new documents and records their content index entries", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", title: "Doc 1", content: paragraphs(3) });

    const result = await h.run();

    expect(result).toMatchObject({
      status: "succeeded",
      found: 1,
      processed: 1,
      embedded: 3,
      skipped: 0,
      errors: 0,
    });
    expect(h.provider.calls).toEqual([
      [
        "alpha paragraph number 0 here",
        "alpha paragraph number 1 here",
        "alpha paragraph number 2 here",
      ],
    ]);

    const entry = await h.contentIndex.get("user-1", "doc-1");
    expect(entry?.contentHash).toBe(computeContentHash(paragraphs(3)));
    expect(entry?.chunkIds).toHaveLength(3);
    expect((await h.vectorStore.listIdsBySource("user-1", "doc-1")).sort()).toEqual(
      [...(entry?.chunkIds ?? [])].sort(),
    );

    const job = await h.jobs.get(result.jobId);
    expect(job?.status).toBe("succeeded");
    expect(job?.counters.embedded).toBe(3);
    expect(job?.finishedAt).toBeInstanceOf(Date);
  });

  it("skips unchanged documents on a rerun without calling the provider", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(3) });
    await h.run();
    const idsBefore = await h.vectorStore.listIdsBySource("user-1", "doc-1");

    const result = await h.run();

    expect(result).toMatchObject({ status: "succeeded", found: 1, skipped: 1, embedded: 0 });
    expect(h.provider.calls).toHaveLength(1);
    expect(await h.vectorStore.listIdsBySource("user-1", "doc-1")).toEqual(idsBefore);
  });

  it("does not fetch a document whose version marker is unchanged", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", version: "v1", content: paragraphs(2) });
    await h.run();

    const result = await h.run();

    expect(result.skipped).toBe(1);
    expect(h.source.fetchCount).toBe(1);
  });

  it("refreshes the stored version when only the marker moved", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", version: "v1", content: paragraphs(2) });
    await h.run();
    h.source.put("user-1", { sourceId: "doc-1", version: "v2", content: paragraphs(2) });

    const result = await h.run();

    expect(result).toMatchObject({ skipped: 1, embedded: 0 });
    expect(h.source.fetchCount).toBe(2);
    expect(h.provider.calls).toHaveLength(1);
    expect((await h.contentIndex.get("user-1", "doc-1"))?.version).toBe("v2");
  });

  it("replaces every chunk of an edited document", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(3) });
    await h.run();
    const oldIds = await h.vectorStore.listIdsBySource("user-1", "doc-1");

    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(2, "beta") });
    const result = await h.run();

    expect(result).toMatchObject({ status: "succeeded", processed: 1, embedded: 2 });
    const entry = await h.contentIndex.get("user-1", "doc-1");
    const stored = await h.vectorStore.listIdsBySource("user-1", "doc-1");
    expect(stored).toHaveLength(2);
    expect(stored.sort()).toEqual([...(entry?.chunkIds ?? [])].sort());
    expect(stored.some((id) => oldIds.includes(id))).toBe(false);

    const hits = await h.documentIndex.search("user-1", [0, 1, 0, 0.01], 10);
    expect(hits.map((hit) => hit.content)).toEqual([
      "beta paragraph number 0 here",
      "beta paragraph number 1 here",
    ]);
  });

  it("re-embeds unchanged documents when forced", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(3) });
    await h.run();
    const idsBefore = await h.vectorStore.listIdsBySource("user-1", "doc-1");

    const result = await h.run({ forceReembed: true });

    expect(result).toMatchObject({ status: "succeeded", processed: 1, embedded: 3, skipped: 0 });
    expect(h.provider.calls).toHaveLength(2);
    expect((await h.vectorStore.listIdsBySource("user-1", "doc-1")).sort()).toEqual(
      [...idsBefore].sort(),
    );
  });

  it("packs chunks into provider calls of at most the count limit", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "big", content: paragraphs(130) });

    const result = await h.run();

    expect(h.provider.calls.map((texts) => texts.length)).toEqual([48, 48, 34]);
    expect(result).toMatchObject({ status: "succeeded", processed: 1, embedded: 130 });
  });

  it("fails only the documents of a batch that exhausts its retries", async () => {
    const h = createHarness({ chunkCountLimit: 2, failCalls: [2, 3] });
    for (const id of ["doc-a", "doc-b", "doc-c"]) {
      h.source.put("user-1", { sourceId: id, content: paragraphs(2) });
    }

    const result = await h.run();

    expect(result).toMatchObject({
      status: "partial",
      found: 3,
      processed: 2,
      embedded: 4,
      skipped: 0,
      errors: 1,
    });
    expect(h.provider.calls).toHaveLength(4);
    expect(await h.contentIndex.get("user-1", "doc-a")).not.toBeNull();
    expect(await h.contentIndex.get("user-1", "doc-b")).toBeNull();
    expect(await h.contentIndex.get("user-1", "doc-c")).not.toBeNull();

    const job = await h.jobs.get(result.jobId);
    expect(job?.log.map((entry) => entry.message)).toContain(
      'Failed to index "doc-b": Embedding batch failed: provider unavailable',
    );
  });

  it("counts unsupported content as processed without touching the index", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(2) });
    await h.run();
    const before = await h.contentIndex.get("user-1", "doc-1");

    h.source.put("user-1", {
      sourceId: "doc-1",
      title: "Report",
      mimeType: "application/pdf",
      content: new Uint8Array([0x25, 0x50, 0x44, 0x46]),
    });
    const result = await h.run();

    expect(result).toMatchObject({ status: "succeeded", processed: 1, embedded: 0, errors: 0 });
    expect(await h.contentIndex.get("user-1", "doc-1")).toEqual(before);
    expect(h.vectorStore.size).toBe(2);

    const job = await h.jobs.get(result.jobId);
    expect(job?.log[0]?.message).toBe('Skipped "Report": unsupported type application/pdf');
  });

  it("removes documents the source reports as deleted", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(2) });
    await h.run();

    h.source.remove("user-1", "doc-1");
    const result = await h.run();

    expect(result).toMatchObject({ status: "succeeded", found: 1, processed: 1 });
    expect(await h.contentIndex.get("user-1", "doc-1")).toBeNull();
    expect(h.vectorStore.size).toBe(0);
  });

  it("removes indexed documents that are no longer listed", async () => {
    const root = await mkdtemp(join(tmpdir(), "indexloom-pipeline-"));
    try {
      await mkdir(join(root, "user-1"));
      await writeFile(join(root, "user-1", "a.md"), paragraphs(2));
      await writeFile(join(root, "user-1", "b.md"), paragraphs(2, "beta"));
      const source = new LocalDirectorySource({ rootDir: root });
      const h = createHarness();
      await h.run({}, { source });
      expect(h.vectorStore.size).toBe(4);

      await rm(join(root, "user-1", "b.md"));
      const result = await h.run({}, { source });

      expect(result).toMatchObject({ status: "succeeded", found: 1, skipped: 1, errors: 0 });
      expect(await h.contentIndex.get("user-1", "b.md")).toBeNull();
      expect(await h.contentIndex.get("user-1", "a.md")).not.toBeNull();
      expect(await h.vectorStore.listIdsBySource("user-1", "b.md")).toEqual([]);
      expect(h.vectorStore.size).toBe(2);
      const job = await h.jobs.get(result.jobId);
      expect(job?.log[0]?.message).toBe('Removed "b.md": no longer in the source');
    } finally {
      await rm(root, { recursive: true, force: true });
    }
  });

  it("keeps an unlisted document when the run is cancelled", async () => {
    const h = createHarness({ pageSize: 1 });
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(1) });
    h.source.put("user-1", { sourceId: "doc-2", content: paragraphs(1) });
    await h.run();
    const controller = new AbortController();

    const result = await h.run(
      {},
      { signal: controller.signal, report: () => controller.abort() },
    );

    expect(result.status).toBe("cancelled");
    expect(await h.contentIndex.get("user-1", "doc-2")).not.toBeNull();
    expect(h.vectorStore.size).toBe(2);
  });

  it("keeps the old version whole when a re-ingest fails mid-document", async () => {
    const h = createHarness({ chunkCountLimit: 2, failCalls: [3, 4] });
    const everything = keywordVector("alpha beta gamma");
    const liveContents = async (): Promise<string[]> =>
      (await h.documentIndex.search("user-1", everything, 10)).map((hit) => hit.content).sort();

    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(2) });
    await h.run();
    const original = [
      "alpha paragraph number 0 here",
      "alpha paragraph number 1 here",
    ];
    expect(await liveContents()).toEqual(original);
    expect(h.vectorStore.size).toBe(2);

    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(4, "beta") });
    const failed = await h.run();

    expect(failed).toMatchObject({ status: "failed", found: 1, processed: 0, errors: 1 });
    expect(failed.failureKind).toBeUndefined();
    expect(h.provider.calls).toHaveLength(4);
    expect(h.vectorStore.size).toBe(4);
    expect(await liveContents()).toEqual(original);
    expect((await h.contentIndex.get("user-1", "doc-1"))?.contentHash).toBe(
      computeContentHash(paragraphs(2)),
    );

    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(3, "gamma") });
    const recovered = await h.run();

    expect(recovered).toMatchObject({ status: "succeeded", processed: 1, embedded: 3 });
    expect(h.vectorStore.size).toBe(3);
    expect(await liveContents()).toEqual([
      "gamma paragraph number 0 here",
      "gamma paragraph number 1 here",
      "gamma paragraph number 2 here",
    ]);
  });

  it("skips documents the source cannot deliver", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(1) });
    h.source.put("user-1", { sourceId: "doc-2", content: paragraphs(1, "gamma") });
    h.source.failFetch("doc-1");

    const result = await h.run();

    expect(result).toMatchObject({
      status: "succeeded",
      found: 2,
      processed: 1,
      skipped: 1,
      errors: 0,
    });
    const job = await h.jobs.get(result.jobId);
    expect(job?.log[0]?.message).toBe('Could not fetch "doc-1": Cannot fetch doc-1');
  });

  it("fails a document whose chunk exceeds the batch token limit", async () => {
    const h = createHarness({ tokenLimit: 5 });
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(1) });

    const result = await h.run();

    expect(result).toMatchObject({ status: "failed", found: 1, processed: 0, errors: 1 });
    expect(h.provider.calls).toHaveLength(0);
    expect(h.vectorStore.size).toBe(0);
    expect(await h.contentIndex.get("user-1", "doc-1")).toBeNull();
  });

  it("stops between pages when the signal is aborted", async () => {
    const h = createHarness({ pageSize: 1 });
    for (const id of ["doc-1", "doc-2", "doc-3"]) {
      h.source.put("user-1", { sourceId: id, content: paragraphs(1) });
    }
    const controller = new AbortController();

    const result = await h.run(
      {},
      {
        signal: controller.signal,
        report: (_done, total) => {
          if (total === 1) controller.abort();
        },
      },
    );

    expect(result).toMatchObject({ status: "cancelled", found: 1, processed: 1, embedded: 1 });
    expect(await h.contentIndex.get("user-1", "doc-1")).not.toBeNull();
    expect(await h.contentIndex.get("user-1", "doc-2")).toBeNull();
    expect((await h.jobs.get(result.jobId))?.status).toBe("cancelled");
  });

  it("stops when a cancel request is stored while running", async () => {
    const h = createHarness({ pageSize: 1 });
    for (const id of ["doc-1", "doc-2", "doc-3"]) {
      h.source.put("user-1", { sourceId: id, content: paragraphs(1) });
    }
    const job = await h.createJob();
    const options = job.options;
    let requested: Promise<boolean> | undefined;

    const result = await runIngestion(
      { jobId: job.jobId, userId: "user-1", options },
      {
        ...h.deps,
        report: () => {
          requested ??= h.jobs.update(job.jobId, { cancelRequested: true });
        },
      },
    );
    await requested;

    expect(result).toMatchObject({ status: "cancelled", found: 1, processed: 1 });
    const stored = await h.jobs.get(job.jobId);
    expect(stored?.status).toBe("cancelled");
    expect(stored?.log.map((entry) => entry.message)).toEqual(["Run cancelled"]);
  });

  it("keeps the status another worker recorded for the job", async () => {
    const h = createHarness({ pageSize: 1 });
    for (const id of ["doc-1", "doc-2", "doc-3"]) {
      h.source.put("user-1", { sourceId: id, content: paragraphs(1) });
    }
    const job = await h.createJob();
    let takenOver: Promise<boolean> | undefined;

    const result = await runIngestion(
      { jobId: job.jobId, userId: "user-1", options: job.options },
      {
        ...h.deps,
        report: () => {
          takenOver ??= h.jobs.update(
            job.jobId,
            { status: "failed", errorSummary: "interrupted" },
            { expectStatus: "running" },
          );
        },
      },
    );

    expect(await takenOver).toBe(true);
    expect(result).toMatchObject({ status: "failed", found: 1 });
    expect(result.failureKind).toBeUndefined();
    const stored = await h.jobs.get(job.jobId);
    expect(stored?.status).toBe("failed");
    expect(stored?.errorSummary).toBe("interrupted");
    expect(stored?.counters).toEqual(emptyCounters());
  });

  it("persists progress at the page interval, after the listing and on finish", async () => {
    const h = createHarness({ pageSize: 1, flushEveryPages: 2 });
    for (const id of ["doc-1", "doc-2", "doc-3"]) {
      h.source.put("user-1", { sourceId: id, content: paragraphs(1) });
    }
    const update = vi.spyOn(h.jobs, "update");

    const result = await h.run();

    expect(result.status).toBe("succeeded");
    const counterWrites = update.mock.calls
      .map(([, changes]) => changes.counters)
      .filter((counters) => counters !== undefined);
    expect(counterWrites).toEqual([
      { found: 2, processed: 2, embedded: 2, skipped: 0, errors: 0 },
      { found: 3, processed: 3, embedded: 3, skipped: 0, errors: 0 },
      { found: 3, processed: 3, embedded: 3, skipped: 0, errors: 0 },
    ]);
  });

  it("reports monotonic progress", async () => {
    const h = createHarness({ pageSize: 2 });
    for (let i = 0; i < 5; i += 1) {
      h.source.put("user-1", { sourceId: `doc-${i}`, content: paragraphs(1) });
    }
    const progress: Array<[number, number]> = [];

    await h.run({}, { report: (done, total) => progress.push([done, total]) });

    expect(progress).toEqual([
      [2, 2],
      [4, 4],
      [5, 5],
    ]);
  });

  it("ends the run as failed on a consistency violation", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(1) });
    vi.spyOn(h.documentIndex, "finalizeDocument").mockRejectedValue(
      new ConsistencyError("chunk set incomplete"),
    );

    const result = await h.run();

    expect(result).toMatchObject({ status: "failed", failureKind: "consistency" });
    const job = await h.jobs.get(result.jobId);
    expect(job?.errorSummary).toBe("chunk set incomplete");
    expect(await h.contentIndex.get("user-1", "doc-1")).toBeNull();
  });

  it("ends the run as failed when the vector store is unreachable", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(1) });
    h.source.put("user-1", { sourceId: "doc-2", content: paragraphs(1) });
    vi.spyOn(h.vectorStore, "upsert").mockRejectedValue(
      new TransientProviderError("connection refused", "unavailable", "qdrant"),
    );

    const result = await h.run();

    expect(result).toMatchObject({ status: "failed", failureKind: "unavailable" });
    expect((await h.jobs.get(result.jobId))?.errorSummary).toBe("connection refused");
  });

  it("keeps each user's documents apart", async () => {
    const h = createHarness();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(1) });
    h.source.put("user-2", { sourceId: "doc-1", content: paragraphs(1, "gamma") });

    await h.run();

    expect(await h.contentIndex.get("user-1", "doc-1")).not.toBeNull();
    expect(await h.contentIndex.get("user-2", "doc-1")).toBeNull();
    expect(await h.documentIndex.search("user-2", [0, 0, 1, 0.01], 5)).toEqual([]);
  });
});
