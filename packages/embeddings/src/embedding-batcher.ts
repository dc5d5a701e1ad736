import type { Chunk, EmbeddedChunk } from "@indexloom/types";
import type { Logger } from "@indexloom/logger";
import { BatchEmbeddingError, PermanentProviderError, withRetry } from "@indexloom/errors";
import type { RetryOptions } from "@indexloom/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

export interface EmbeddingBatcherOptions {
  provider: IEmbeddingProvider;
  /** Upper bound on the summed token estimate of one provider call. */
  tokenLimit: number;
  /** Upper bound on the number of chunks in one provider call. */
  chunkCountLimit: number;
  /** Receives every successfully embedded batch, in enqueue order. */
  onBatch: (chunks: EmbeddedChunk[]) => Promise<void>;
  retry?: Omit<RetryOptions, "onRetry">;
  logger?: Logger;
}

/**
 * Accumulates chunks and embeds them in provider calls that stay within the
 * token and count limits. A batch is flushed before a chunk that would
 * overflow it is added, so every batch respects both limits.
 */
export class EmbeddingBatcher {
  private readonly provider: IEmbeddingProvider;
  private readonly tokenLimit: number;
  private readonly chunkCountLimit: number;
  private readonly onBatch: (chunks: EmbeddedChunk[]) => Promise<void>;
  private readonly retry: Omit<RetryOptions, "onRetry">;
  private readonly logger?: Logger;

  private pending: Chunk[] = [];
  private pendingTokens = 0;

  constructor(options: EmbeddingBatcherOptions) {
    if (options.tokenLimit < 1 || options.chunkCountLimit < 1) {
      throw new RangeError("tokenLimit and chunkCountLimit must be positive");
    }
    this.provider = options.provider;
    this.tokenLimit = options.tokenLimit;
    this.chunkCountLimit = options.chunkCountLimit;
    this.onBatch = options.onBatch;
    this.retry = options.retry ?? {};
    this.logger = options.logger;
  }

  get cumulativeTokens(): number {
    return this.pendingTokens;
  }

  get cumulativeCount(): number {
    return this.pending.length;
  }

  async enqueue(chunk: Chunk): Promise<void> {
    if (chunk.tokenEstimate > this.tokenLimit) {
      throw new PermanentProviderError(
        `Chunk ${chunk.chunkId} estimates ${chunk.tokenEstimate} tokens, over the batch limit of ${this.tokenLimit}`,
        "oversized_chunk",
        this.provider.name,
        { details: { chunkId: chunk.chunkId, sourceId: chunk.sourceId } },
      );
    }

    const overflows =
      this.pendingTokens + chunk.tokenEstimate > this.tokenLimit ||
      this.pending.length + 1 > this.chunkCountLimit;
    if (this.pending.length > 0 && overflows) {
      const full = this.takePending();
      this.push(chunk);
      await this.embedAndEmit(full.batch, full.tokens);
      return;
    }

    this.push(chunk);
  }

  /**
   * Embed the pending batch. The batch is taken out before the provider call:
   * on failure it is dropped and a {@link BatchEmbeddingError} names the
   * sources it held.
   */
  async flush(): Promise<void> {
    if (this.pending.length === 0) {
      return;
    }
    const { batch, tokens } = this.takePending();
    await this.embedAndEmit(batch, tokens);
  }

  private push(chunk: Chunk): void {
    this.pending.push(chunk);
    this.pendingTokens += chunk.tokenEstimate;
  }

  private takePending(): { batch: Chunk[]; tokens: number } {
    const taken = { batch: this.pending, tokens: this.pendingTokens };
    this.pending = [];
    this.pendingTokens = 0;
    return taken;
  }

  private async embedAndEmit(batch: Chunk[], tokens: number): Promise<void> {
    let vectors: number[][];
    try {
      vectors = await withRetry(() => this.embedBatch(batch), {
        ...this.retry,
        onRetry: ({ attempt, maxAttempts, delayMs, kind }) => {
          this.logger?.warn(
            { attempt, maxAttempts, delayMs, kind, batchSize: batch.length },
            "embedding call failed, retrying",
          );
        },
      });
    } catch (error: unknown) {
      throw new BatchEmbeddingError(uniqueSourceIds(batch), error);
    }

    this.logger?.debug({ batchSize: batch.length, tokens }, "embedded batch");

    await this.onBatch(batch.map((chunk, i) => ({ ...chunk, vector: vectors[i] ?? [] })));
  }

  private async embedBatch(batch: Chunk[]): Promise<number[][]> {
    const result = await this.provider.batchEmbed(batch.map((chunk) => chunk.text));
    if (result.embeddings.length !== batch.length) {
      throw new PermanentProviderError(
        `Provider returned ${result.embeddings.length} vectors for ${batch.length} texts`,
        "invalid_input",
        this.provider.name,
      );
    }
    return result.embeddings;
  }
}

function uniqueSourceIds(batch: Chunk[]): string[] {
  return [...new Set(batch.map((chunk) => chunk.sourceId))];
}
