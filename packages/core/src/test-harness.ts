import { randomUUID } from "node:crypto";
import type { EmbeddingResult, IngestionJob, RunOptions } from "@indexloom/types";
import { emptyCounters } from "@indexloom/types";
import { InMemoryContentIndexRepository, InMemoryJobRepository } from "@indexloom/db";
import { MemoryVectorStore } from "@indexloom/vector-store";
import { RecursiveChunker } from "@indexloom/chunker";
import type { IEmbeddingProvider } from "@indexloom/embeddings";
import { InMemoryContentSource } from "@indexloom/connectors";
import { TransientProviderError } from "@indexloom/errors";
import { DocumentIndex } from "./document-index.js";
import { runIngestion } from "./ingestion-pipeline.js";
import type { IngestionDependencies, IngestionResult } from "./ingestion-pipeline.js";

const KEYWORDS = ["alpha", "beta", "gamma"];

/** Keyword-count vectors, so related texts land close together. */
export function keywordVector(text: string): number[] {
  const words = text.toLowerCase().split(/\W+/);
  return [...KEYWORDS.map((k) => words.filter((w) => w === k).length), 0.01];
}

/**
 * Embedding provider whose listed `batchEmbed` calls (1-based) fail with a
 * transient error.
 */
export class FakeEmbeddingProvider implements IEmbeddingProvider {
  readonly name = "fake";
  readonly dimensions = KEYWORDS.length + 1;
  readonly calls: string[][] = [];
  private readonly failCalls: Set<number>;

  constructor(failCalls: number[] = []) {
    this.failCalls = new Set(failCalls);
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return {
      embeddings: [keywordVector(text)],
      model: "fake",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    this.calls.push(texts);
    if (this.failCalls.has(this.calls.length)) {
      throw new TransientProviderError("provider unavailable", "unavailable", this.name);
    }
    return {
      embeddings: texts.map(keywordVector),
      model: "fake",
      tokensUsed: 0,
      dimensions: this.dimensions,
    };
  }

  async healthCheck(): Promise<boolean> {
    return true;
  }
}

/** `count` paragraphs of 29-30 characters; with a 10-token budget each is one chunk. */
export function paragraphs(count: number, word = "alpha"): string {
  return Array.from({ length: count }, (_, i) => `${word} paragraph number ${i} here`).join(
    "\n\n",
  );
}

export interface HarnessOptions {
  pageSize?: number;
  failCalls?: number[];
  chunkCountLimit?: number;
  tokenLimit?: number;
  flushEveryPages?: number;
}

export function createHarness(options: HarnessOptions = {}) {
  const jobs = new InMemoryJobRepository();
  const contentIndex = new InMemoryContentIndexRepository();
  const vectorStore = new MemoryVectorStore();
  const documentIndex = new DocumentIndex({ vectorStore, contentIndex });
  const provider = new FakeEmbeddingProvider(options.failCalls);
  const source = new InMemoryContentSource({ pageSize: options.pageSize ?? 100 });

  const deps: IngestionDependencies = {
    source,
    jobs,
    documentIndex,
    embeddingProvider: provider,
    chunker: new RecursiveChunker(),
    chunkBudget: { maxTokensPerChunk: 10 },
    batchLimits: {
      tokenLimit: options.tokenLimit ?? 8_000,
      chunkCountLimit: options.chunkCountLimit ?? 48,
    },
    embeddingRetry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    sourceRetry: { maxAttempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
    flushEveryPages: options.flushEveryPages ?? 1,
  };

  async function createJob(
    userId = "user-1",
    runOptions: RunOptions = { source: "memory", forceReembed: false },
  ): Promise<IngestionJob> {
    const now = new Date();
    const job: IngestionJob = {
      jobId: randomUUID(),
      userId,
      status: "pending",
      counters: emptyCounters(),
      log: [],
      options: runOptions,
      attempt: 1,
      errorSummary: null,
      cancelRequested: false,
      createdAt: now,
      updatedAt: now,
      startedAt: null,
      finishedAt: null,
    };
    await jobs.create(job);
    return job;
  }

  async function run(
    runOptions: Partial<RunOptions> = {},
    overrides: Partial<IngestionDependencies> & { signal?: AbortSignal } = {},
  ): Promise<IngestionResult> {
    const { signal, ...depOverrides } = overrides;
    const options: RunOptions = { source: "memory", forceReembed: false, ...runOptions };
    const job = await createJob("user-1", options);
    return runIngestion(
      { jobId: job.jobId, userId: "user-1", options, signal },
      { ...deps, ...depOverrides },
    );
  }

  return { jobs, contentIndex, vectorStore, documentIndex, provider, source, deps, createJob, run };
}
