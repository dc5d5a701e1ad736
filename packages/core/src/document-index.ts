import type {
  ContentIndexEntry,
  EmbeddedChunk,
  ScoredChunk,
  VectorRecord,
} from "@indexloom/types";
import type { ContentIndexRepository } from "@indexloom/db";
import type { IVectorStore } from "@indexloom/vector-store";
import type { Logger } from "@indexloom/logger";
import { ConsistencyError, ValidationError } from "@indexloom/errors";

/** Hits fetched per requested result, to leave room for filtered-out generations. */
const SEARCH_OVERFETCH = 4;

export interface DocumentFinalization {
  sourceId: string;
  contentHash: string;
  version: string | null;
  chunkIds: string[];
  title: string | null;
  mimeType: string | null;
}

export interface DocumentIndexDependencies {
  vectorStore: IVectorStore;
  contentIndex: ContentIndexRepository;
  logger?: Logger;
  now?: () => Date;
}

function passKey(userId: string, sourceId: string, generation: string): string {
  return JSON.stringify([userId, sourceId, generation]);
}

function toRecord(chunk: EmbeddedChunk): VectorRecord {
  return {
    id: chunk.chunkId,
    vector: chunk.vector,
    payload: {
      namespace: chunk.userId,
      sourceId: chunk.sourceId,
      chunkId: chunk.chunkId,
      sequenceIndex: chunk.sequenceIndex,
      generation: chunk.generation,
      title: chunk.metadata.title,
      locator: chunk.metadata.locator,
      content: chunk.text,
    },
  };
}

/**
 * Vector persistence for ingested documents.
 *
 * Chunks of a new revision are written under their own generation and stay
 * invisible until {@link finalizeDocument} replaces the document's index
 * entry. Readers only accept hits whose generation matches the live entry,
 * so a document always reads as its complete old or complete new chunk set.
 */
export class DocumentIndex {
  private readonly vectorStore: IVectorStore;
  private readonly contentIndex: ContentIndexRepository;
  private readonly logger?: Logger;
  private readonly now: () => Date;
  /** Chunk ids written in this pass, per (user, source, generation). */
  private readonly written = new Map<string, Set<string>>();

  constructor(deps: DocumentIndexDependencies) {
    this.vectorStore = deps.vectorStore;
    this.contentIndex = deps.contentIndex;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  getEntry(userId: string, sourceId: string): Promise<ContentIndexEntry | null> {
    return this.contentIndex.get(userId, sourceId);
  }

  refreshVersion(userId: string, sourceId: string, version: string | null): Promise<void> {
    return this.contentIndex.updateVersion(userId, sourceId, version);
  }

  /** Write embedded chunks. Never deletes anything. */
  async upsert(userId: string, chunks: EmbeddedChunk[]): Promise<void> {
    if (chunks.length === 0) return;

    const foreign = chunks.find((chunk) => chunk.userId !== userId);
    if (foreign) {
      throw new ValidationError("Chunk belongs to another user", {
        chunkId: foreign.chunkId,
      });
    }

    await this.vectorStore.upsert(userId, chunks.map(toRecord));

    for (const chunk of chunks) {
      const key = passKey(userId, chunk.sourceId, chunk.generation);
      const ids = this.written.get(key) ?? new Set<string>();
      ids.add(chunk.chunkId);
      this.written.set(key, ids);
    }
  }

  /**
   * Make a fully written chunk set live and delete everything else stored for
   * the source, including orphans of earlier interrupted passes.
   */
  async finalizeDocument(
    userId: string,
    finalization: DocumentFinalization,
  ): Promise<ContentIndexEntry> {
    const { sourceId, contentHash, chunkIds } = finalization;
    const key = passKey(userId, sourceId, contentHash);

    if (chunkIds.length === 0) {
      throw new ConsistencyError(`Refusing to finalize ${sourceId} without chunks`, {
        details: { sourceId },
      });
    }
    const written = this.written.get(key);
    const missing = chunkIds.filter((id) => !written?.has(id));
    if (missing.length > 0) {
      throw new ConsistencyError(
        `${missing.length} of ${chunkIds.length} chunks of ${sourceId} were not written in this pass`,
        { details: { sourceId, missing: missing.slice(0, 10) } },
      );
    }

    const stored = await this.vectorStore.listIdsBySource(userId, sourceId);

    const now = this.now();
    const entry: ContentIndexEntry = {
      userId,
      sourceId,
      contentHash,
      version: finalization.version,
      chunkIds: [...chunkIds],
      title: finalization.title,
      mimeType: finalization.mimeType,
      lastIngestedAt: now,
      updatedAt: now,
    };
    await this.contentIndex.put(entry);
    this.written.delete(key);

    const keep = new Set(chunkIds);
    const stale = stored.filter((id) => !keep.has(id));
    if (stale.length > 0) {
      try {
        await this.vectorStore.delete(userId, stale);
      } catch (error: unknown) {
        // Stale points are already invisible; the next finalize of this source retries.
        this.logger?.warn(
          { err: error, sourceId, stale: stale.length },
          "failed to delete superseded chunks",
        );
      }
    }

    return entry;
  }

  /** Drop pass bookkeeping for a document that will not be finalized. */
  discard(userId: string, sourceId: string, generation: string): void {
    this.written.delete(passKey(userId, sourceId, generation));
  }

  listSourceIds(userId: string): Promise<string[]> {
    return this.contentIndex.listSourceIds(userId);
  }

  /**
   * Remove a document: the entry goes first, so it disappears from reads
   * before its points are deleted.
   */
  async removeDocument(userId: string, sourceId: string): Promise<boolean> {
    const existed = await this.contentIndex.delete(userId, sourceId);
    const ids = await this.vectorStore.listIdsBySource(userId, sourceId);
    if (ids.length > 0) {
      await this.vectorStore.delete(userId, ids);
    }
    return existed || ids.length > 0;
  }

  async search(userId: string, vector: number[], topK: number): Promise<ScoredChunk[]> {
    if (topK < 1) return [];

    const hits = await this.vectorStore.search({
      namespace: userId,
      vector,
      topK: topK * SEARCH_OVERFETCH,
    });
    if (hits.length === 0) return [];

    const sourceIds = [...new Set(hits.map((hit) => hit.payload.sourceId))];
    const entries = await this.contentIndex.getMany(userId, sourceIds);
    const liveGeneration = new Map(entries.map((e) => [e.sourceId, e.contentHash]));

    return hits
      .filter((hit) => liveGeneration.get(hit.payload.sourceId) === hit.payload.generation)
      .slice(0, topK)
      .map((hit) => ({
        chunkId: hit.payload.chunkId || hit.id,
        sourceId: hit.payload.sourceId,
        content: hit.payload.content,
        score: hit.score,
        title: hit.payload.title,
        locator: hit.payload.locator,
      }));
  }
}
