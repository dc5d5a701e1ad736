import { describe, it, expect, vi } from "vitest";
import type { IJobDispatcher, IngestJobData } from "@indexloom/types";
import { SourceRegistry } from "@indexloom/connectors";
import { ConflictError, NotFoundError, ValidationError } from "@indexloom/errors";
import { IngestionService } from "./ingestion-service.js";
import type { PipelineDependencies } from "./ingestion-service.js";
import { createHarness, paragraphs } from "./test-harness.js";

class RecordingDispatcher implements IJobDispatcher {
  readonly dispatched: IngestJobData[] = [];

  async dispatch(data: IngestJobData): Promise<void> {
    this.dispatched.push(data);
  }
}

const MEMORY = { source: "memory", forceReembed: false };

function setup(pageSize = 100) {
  const h = createHarness({ pageSize });
  const dispatcher = new RecordingDispatcher();
  const registry = new SourceRegistry([h.source]);
  let onReport = (): void => {};
  const pipeline: PipelineDependencies = {
    documentIndex: h.deps.documentIndex,
    embeddingProvider: h.deps.embeddingProvider,
    chunker: h.deps.chunker,
    chunkBudget: h.deps.chunkBudget,
    batchLimits: h.deps.batchLimits,
    embeddingRetry: h.deps.embeddingRetry,
    sourceRetry: h.deps.sourceRetry,
    flushEveryPages: 1,
    report: () => onReport(),
  };
  const service = new IngestionService({
    jobs: h.jobs,
    dispatcher,
    resolveSource: (type) => registry.get(type),
    pipeline,
  });
  return {
    h,
    dispatcher,
    service,
    setOnReport: (fn: () => void) => {
      onReport = fn;
    },
  };
}

describe("IngestionService", () => {
  it("creates a pending job and dispatches it", async () => {
    const { h, dispatcher, service } = setup();

    const jobId = await service.startRun("user-1", MEMORY);

    expect(dispatcher.dispatched).toEqual([{ type: "ingest", jobId, userId: "user-1" }]);
    const job = await h.jobs.get(jobId);
    expect(job?.status).toBe("pending");
    expect(job?.attempt).toBe(1);
  });

  it("rejects a second run while one is active", async () => {
    const { service } = setup();
    await service.startRun("user-1", MEMORY);

    await expect(service.startRun("user-1", MEMORY)).rejects.toBeInstanceOf(ConflictError);
    await expect(service.startRun("user-2", MEMORY)).resolves.toEqual(expect.any(String));
  });

  it("rejects an unknown source before creating a job", async () => {
    const { service } = setup();

    await expect(
      service.startRun("user-1", { source: "drive", forceReembed: false }),
    ).rejects.toBeInstanceOf(NotFoundError);
    expect(await service.listJobs("user-1")).toEqual([]);
  });

  it("marks the job failed when dispatch fails", async () => {
    const { h, dispatcher, service } = setup();
    vi.spyOn(dispatcher, "dispatch").mockRejectedValue(new Error("redis down"));

    await expect(service.startRun("user-1", MEMORY)).rejects.toThrow("redis down");

    const [job] = await h.jobs.listByUser("user-1");
    expect(job?.status).toBe("failed");
    expect(job?.errorSummary).toBe("Dispatch failed: redis down");
  });

  it("runs a job inline and returns its summary", async () => {
    const { h, service } = setup();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(2) });

    const result = await service.runInline("user-1", MEMORY);

    expect(result).toMatchObject({ status: "succeeded", found: 1, processed: 1, embedded: 2 });
    expect((await service.getStatus(result.jobId)).status).toBe("succeeded");
  });

  it("rejects a concurrent inline run for the same user", async () => {
    const { h, service } = setup();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(2) });

    const first = service.runInline("user-1", MEMORY);
    await expect(service.runInline("user-1", MEMORY)).rejects.toBeInstanceOf(ConflictError);
    expect((await first).status).toBe("succeeded");
  });

  it("reports unknown jobs as not found", async () => {
    const { service } = setup();
    await expect(service.getStatus("missing")).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.cancel("missing")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("cancels a pending job at once", async () => {
    const { service } = setup();
    const jobId = await service.startRun("user-1", MEMORY);

    const job = await service.cancel(jobId);

    expect(job.status).toBe("cancelled");
    expect(job.cancelRequested).toBe(true);
    expect(job.log.map((entry) => entry.message)).toEqual(["Cancelled before start"]);
    await expect(service.startRun("user-1", MEMORY)).resolves.toEqual(expect.any(String));
  });

  it("leaves finished jobs unchanged on cancel", async () => {
    const { h, service } = setup();
    h.source.put("user-1", { sourceId: "doc-1", content: paragraphs(1) });
    const result = await service.runInline("user-1", MEMORY);

    const job = await service.cancel(result.jobId);

    expect(job.status).toBe("succeeded");
    expect(job.cancelRequested).toBe(false);
  });

  it("stops a running job when cancelled", async () => {
    const { h, service, setOnReport } = setup(1);
    for (const id of ["doc-1", "doc-2", "doc-3"]) {
      h.source.put("user-1", { sourceId: id, content: paragraphs(1) });
    }
    const job = await service.createJob("user-1", MEMORY);
    let cancelling: Promise<unknown> | undefined;
    setOnReport(() => {
      cancelling ??= service.cancel(job.jobId);
    });

    const result = await service.execute(job);
    await cancelling;

    expect(result.status).toBe("cancelled");
    expect(result.found).toBeLessThan(3);
    expect((await service.getStatus(job.jobId)).status).toBe("cancelled");
  });

  it("searches only live chunks of the user", async () => {
    const { h, service } = setup();
    h.source.put("user-1", { sourceId: "alpha-doc", content: paragraphs(1, "alpha") });
    h.source.put("user-1", { sourceId: "beta-doc", content: paragraphs(1, "beta") });
    await service.runInline("user-1", MEMORY);

    const hits = await service.search("user-1", "beta", 1);

    expect(hits).toHaveLength(1);
    expect(hits[0]).toMatchObject({
      sourceId: "beta-doc",
      content: "beta paragraph number 0 here",
      title: "beta-doc",
      locator: "memory://beta-doc",
    });
    expect(await service.search("user-2", "beta")).toEqual([]);
  });

  it("rejects an empty query", async () => {
    const { service } = setup();
    await expect(service.search("user-1", "   ")).rejects.toBeInstanceOf(ValidationError);
  });
});
