import type {
  Chunk,
  ChunkBudget,
  EmbeddedChunk,
  FetchedContent,
  IContentSource,
  IngestionSummary,
  NormalizedDocument,
  RunOptions,
  SourceItem,
  SourcePage,
  TerminalJobStatus,
} from "@indexloom/types";
import type { JobRepository } from "@indexloom/db";
import type { IChunker } from "@indexloom/chunker";
import { chunkDocument } from "@indexloom/chunker";
import type { IEmbeddingProvider } from "@indexloom/embeddings";
import { EmbeddingBatcher } from "@indexloom/embeddings";
import { normalizeContent } from "@indexloom/parser";
import { jobLogger } from "@indexloom/logger";
import type { Logger } from "@indexloom/logger";
import {
  BatchEmbeddingError,
  SourceFetchError,
  classifyError,
  withRetry,
} from "@indexloom/errors";
import type { ErrorKind, RetryOptions } from "@indexloom/errors";
import { decide } from "./change-detector.js";
import type { DocumentIndex } from "./document-index.js";
import { JobTracker } from "./job-tracker.js";

type RetrySettings = Omit<RetryOptions, "onRetry">;

export interface IngestionRequest {
  jobId: string;
  userId: string;
  options: RunOptions;
  /** Aborting this cancels the run between documents. */
  signal?: AbortSignal;
}

export interface IngestionDependencies {
  source: IContentSource;
  jobs: JobRepository;
  documentIndex: DocumentIndex;
  embeddingProvider: IEmbeddingProvider;
  chunker: IChunker;
  chunkBudget: ChunkBudget;
  batchLimits: { tokenLimit: number; chunkCountLimit: number };
  /** Retry policy for provider calls. */
  embeddingRetry?: RetrySettings;
  /** Retry policy for source listing and fetching. */
  sourceRetry?: RetrySettings;
  /** Persist job progress after this many pages. */
  flushEveryPages: number;
  report?: (done: number, total: number, message: string) => void;
  logger?: Logger;
}

export interface IngestionResult extends IngestionSummary {
  /** Set when a run-level error ended the run. */
  failureKind?: ErrorKind;
}

interface PendingDocument {
  sourceId: string;
  title: string;
  generation: string;
  version: string | null;
  mimeType: string;
  chunkIds: string[];
  remaining: number;
  enqueueComplete: boolean;
}

/** A failure that ends the whole run rather than one document. */
class RunAbort extends Error {
  constructor(readonly failure: unknown) {
    super(failure instanceof Error ? failure.message : String(failure));
    this.name = "RunAbort";
  }
}

async function critical<T>(fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error: unknown) {
    throw error instanceof RunAbort ? error : new RunAbort(error);
  }
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function finalStatus(found: number, errors: number): TerminalJobStatus {
  if (errors === 0) return "succeeded";
  return errors < found ? "partial" : "failed";
}

/**
 * Run one ingestion job to completion: list the source page by page, and for
 * each document detect changes, normalize, chunk and feed the embedding
 * batcher. A document is finalized once all of its chunks are stored.
 * Document failures are counted and logged; storage failures and consistency
 * violations end the run as `failed`.
 *
 * Sources list their complete contents on every run, so once a listing
 * finishes, indexed documents it no longer contains are removed.
 */
export async function runIngestion(
  request: IngestionRequest,
  deps: IngestionDependencies,
): Promise<IngestionResult> {
  const { userId } = request;
  const force = request.options.forceReembed;
  const log = jobLogger(deps.logger, { jobId: request.jobId, userId });

  const tracker = await JobTracker.load(request.jobId, {
    jobs: deps.jobs,
    flushEveryPages: deps.flushEveryPages,
    logger: log,
  });
  const onAbort = (): void => tracker.abort();
  request.signal?.addEventListener("abort", onAbort, { once: true });
  if (request.signal?.aborted) tracker.abort();

  const pending = new Map<string, PendingDocument>();
  const listed = new Set<string>();

  const summary = (status: TerminalJobStatus, failureKind?: ErrorKind): IngestionResult => ({
    jobId: tracker.jobId,
    status,
    ...tracker.counters,
    ...(failureKind ? { failureKind } : {}),
  });

  const failDocument = (sourceId: string, reason: string): void => {
    const doc = pending.get(sourceId);
    if (!doc) return;
    pending.delete(sourceId);
    deps.documentIndex.discard(userId, sourceId, doc.generation);
    tracker.increment("errors");
    tracker.log(`Failed to index "${doc.title}": ${reason}`);
  };

  const maybeFinalize = async (doc: PendingDocument): Promise<void> => {
    if (!doc.enqueueComplete || doc.remaining > 0 || pending.get(doc.sourceId) !== doc) {
      return;
    }
    await critical(() =>
      deps.documentIndex.finalizeDocument(userId, {
        sourceId: doc.sourceId,
        contentHash: doc.generation,
        version: doc.version,
        chunkIds: doc.chunkIds,
        title: doc.title,
        mimeType: doc.mimeType,
      }),
    );
    pending.delete(doc.sourceId);
    tracker.increment("processed");
    tracker.increment("embedded", doc.chunkIds.length);
    log?.debug({ sourceId: doc.sourceId, chunks: doc.chunkIds.length }, "document finalized");
  };

  const onBatch = async (chunks: EmbeddedChunk[]): Promise<void> => {
    const live = chunks.filter((chunk) => {
      const doc = pending.get(chunk.sourceId);
      return doc !== undefined && doc.generation === chunk.generation;
    });
    await critical(() => deps.documentIndex.upsert(userId, live));

    const touched = new Set<PendingDocument>();
    for (const chunk of live) {
      const doc = pending.get(chunk.sourceId);
      if (!doc) continue;
      doc.remaining -= 1;
      touched.add(doc);
    }
    for (const doc of touched) {
      await maybeFinalize(doc);
    }
  };

  const batcher = new EmbeddingBatcher({
    provider: deps.embeddingProvider,
    tokenLimit: deps.batchLimits.tokenLimit,
    chunkCountLimit: deps.batchLimits.chunkCountLimit,
    onBatch,
    retry: deps.embeddingRetry,
    logger: log,
  });

  const failBatch = (error: BatchEmbeddingError): void => {
    for (const sourceId of error.sourceIds) {
      failDocument(sourceId, error.message);
    }
  };

  const flushBatcher = async (): Promise<void> => {
    try {
      await batcher.flush();
    } catch (error: unknown) {
      if (error instanceof BatchEmbeddingError) {
        failBatch(error);
        return;
      }
      throw error;
    }
  };

  const enqueueDocument = async (doc: PendingDocument, chunks: Chunk[]): Promise<void> => {
    pending.set(doc.sourceId, doc);
    for (const chunk of chunks) {
      try {
        await batcher.enqueue(chunk);
      } catch (error: unknown) {
        if (error instanceof BatchEmbeddingError) {
          failBatch(error);
        } else if (error instanceof RunAbort) {
          throw error;
        } else {
          failDocument(doc.sourceId, reasonOf(error));
        }
      }
      if (pending.get(doc.sourceId) !== doc) {
        return;
      }
    }
    doc.enqueueComplete = true;
    await maybeFinalize(doc);
  };

  const processItem = async (item: SourceItem): Promise<void> => {
    const { sourceId } = item;

    if (item.deleted) {
      const removed = await critical(() => deps.documentIndex.removeDocument(userId, sourceId));
      if (removed) tracker.log(`Removed "${item.title}"`);
      tracker.increment("processed");
      return;
    }

    const entry = await critical(() => deps.documentIndex.getEntry(userId, sourceId));
    if (decide(entry, { version: item.version }, { force }) === "skip") {
      tracker.increment("skipped");
      return;
    }

    let fetched: FetchedContent;
    try {
      fetched = await withRetry(() => deps.source.fetch(userId, item), deps.sourceRetry);
    } catch (error: unknown) {
      if (error instanceof SourceFetchError) {
        tracker.increment("skipped");
        tracker.log(`Could not fetch "${item.title}": ${error.message}`);
        return;
      }
      throw error;
    }

    const normalized = await normalizeContent(fetched.content, item.mimeType);
    if (normalized.status === "unsupported") {
      tracker.increment("processed");
      tracker.log(`Skipped "${item.title}": unsupported type ${normalized.mimeType}`);
      return;
    }
    if (normalized.status === "empty") {
      tracker.increment("processed");
      tracker.log(`Skipped "${item.title}": no text content`);
      return;
    }

    const version = item.version ?? null;
    if (decide(entry, { contentHash: normalized.contentHash }, { force }) === "skip") {
      if (entry && version !== null && version !== entry.version) {
        await critical(() => deps.documentIndex.refreshVersion(userId, sourceId, version));
      }
      tracker.increment("skipped");
      return;
    }

    const doc: NormalizedDocument = {
      sourceId,
      userId,
      text: normalized.text,
      contentHash: normalized.contentHash,
      version,
      mimeType: item.mimeType,
      title: item.title,
      locator: item.locator ?? null,
    };
    const chunks = chunkDocument(doc, deps.chunker, deps.chunkBudget, deps.source.type);
    if (chunks.length === 0) {
      tracker.increment("processed");
      tracker.log(`Skipped "${item.title}": no text content`);
      return;
    }

    await enqueueDocument(
      {
        sourceId,
        title: item.title,
        generation: doc.contentHash,
        version,
        mimeType: item.mimeType,
        chunkIds: chunks.map((chunk) => chunk.chunkId),
        remaining: chunks.length,
        enqueueComplete: false,
      },
      chunks,
    );
  };

  await tracker.start();

  try {
    log?.info({ source: deps.source.type, force }, "ingestion run started");

    let cursor: string | null = null;
    let pages = 0;
    do {
      if (tracker.cancelled) break;

      const pageCursor = cursor;
      const page: SourcePage = await critical(() =>
        withRetry(() => deps.source.listPage(userId, pageCursor), deps.sourceRetry),
      );
      pages += 1;
      tracker.increment("found", page.items.length);

      for (const item of page.items) {
        listed.add(item.sourceId);
      }
      for (const item of page.items) {
        if (tracker.cancelled) break;
        try {
          await processItem(item);
        } catch (error: unknown) {
          if (error instanceof RunAbort) throw error;
          tracker.increment("errors");
          tracker.log(`Failed to index "${item.title}": ${reasonOf(error)}`);
          log?.warn({ err: error, sourceId: item.sourceId }, "document failed");
        }
      }

      if (!tracker.cancelled) {
        await flushBatcher();
      }

      const c = tracker.counters;
      deps.report?.(
        c.processed + c.skipped + c.errors,
        c.found,
        `Page ${pages}: ${c.processed} processed, ${c.skipped} skipped, ${c.errors} errors`,
      );
      await tracker.pageCompleted();
      cursor = page.nextCursor;
    } while (cursor !== null);

    if (!tracker.cancelled) {
      await tracker.checkpoint();
    }

    if (tracker.cancelled) {
      for (const doc of pending.values()) {
        deps.documentIndex.discard(userId, doc.sourceId, doc.generation);
      }
      tracker.log("Run cancelled");
      const stored = await tracker.finish("cancelled");
      log?.info({ counters: tracker.counters, status: stored }, "ingestion run cancelled");
      return summary(stored);
    }

    await flushBatcher();
    for (const doc of [...pending.values()]) {
      failDocument(doc.sourceId, "embedding did not complete");
    }

    const indexed = await critical(() => deps.documentIndex.listSourceIds(userId));
    for (const sourceId of indexed) {
      if (listed.has(sourceId)) continue;
      await critical(() => deps.documentIndex.removeDocument(userId, sourceId));
      tracker.log(`Removed "${sourceId}": no longer in the source`);
    }

    const counters = tracker.counters;
    const status = finalStatus(counters.found, counters.errors);
    tracker.log(
      `Run ${status}: ${counters.found} found, ${counters.processed} processed, ` +
        `${counters.embedded} chunks embedded, ${counters.skipped} skipped, ${counters.errors} errors`,
    );
    const stored = await tracker.finish(status);
    log?.info({ counters, status: stored }, "ingestion run finished");
    return summary(stored);
  } catch (error: unknown) {
    const failure = error instanceof RunAbort ? error.failure : error;
    const kind = classifyError(failure);
    log?.error({ err: failure, kind }, "ingestion run aborted");

    for (const doc of pending.values()) {
      deps.documentIndex.discard(userId, doc.sourceId, doc.generation);
    }
    tracker.log(`Run aborted: ${reasonOf(failure)}`);
    const stored = await tracker.finish("failed", reasonOf(failure));
    return summary(stored, tracker.superseded ? undefined : kind);
  } finally {
    request.signal?.removeEventListener("abort", onAbort);
  }
}
