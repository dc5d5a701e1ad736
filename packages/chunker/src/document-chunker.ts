import type { Chunk, ChunkBudget, NormalizedDocument } from "@indexloom/types";
import type { IChunker } from "./chunker.interface.js";
import { computeChunkId } from "./chunk-id.js";

/**
 * Chunk a normalized document and bind every span to a stable chunk id.
 */
export function chunkDocument(
  doc: NormalizedDocument,
  chunker: IChunker,
  budget: ChunkBudget,
  sourceType: string,
): Chunk[] {
  return chunker.chunk(doc.text, budget).map((span) => ({
    chunkId: computeChunkId({
      userId: doc.userId,
      sourceId: doc.sourceId,
      generation: doc.contentHash,
      sequenceIndex: span.index,
    }),
    sourceId: doc.sourceId,
    userId: doc.userId,
    generation: doc.contentHash,
    text: span.content,
    tokenEstimate: span.tokenCount,
    sequenceIndex: span.index,
    metadata: {
      sourceType,
      title: doc.title,
      locator: doc.locator,
      userId: doc.userId,
      startChar: span.startChar,
      endChar: span.endChar,
      ...(span.sectionTitle !== undefined ? { sectionTitle: span.sectionTitle } : {}),
    },
  }));
}
