export type ChunkStrategy = "recursive" | "fixed";

export interface ChunkBudget {
  maxTokensPerChunk: number;
}

/**
 * A span produced by a chunker before it is bound to a document.
 */
export interface TextSpan {
  content: string;
  index: number;
  tokenCount: number;
  startChar: number;
  endChar: number;
  sectionTitle?: string;
}

export interface ChunkMetadata {
  sourceType: string;
  title: string;
  locator: string | null;
  userId: string;
  startChar: number;
  endChar: number;
  sectionTitle?: string;
}

export interface Chunk {
  chunkId: string;
  sourceId: string;
  userId: string;
  /** Content hash of the document revision this chunk was cut from. */
  generation: string;
  text: string;
  tokenEstimate: number;
  sequenceIndex: number;
  metadata: ChunkMetadata;
}

export interface EmbeddedChunk extends Chunk {
  vector: number[];
}
