/**
 * Record of the last successful ingest of one source document, keyed by
 * `(userId, sourceId)`. The vector store holds exactly `chunkIds` for the
 * document's live generation (`contentHash`).
 */
export interface ContentIndexEntry {
  userId: string;
  sourceId: string;
  contentHash: string;
  version: string | null;
  chunkIds: string[];
  title: string | null;
  mimeType: string | null;
  lastIngestedAt: Date;
  updatedAt: Date;
}

/**
 * A document after fetch and normalization.
 */
export interface NormalizedDocument {
  sourceId: string;
  userId: string;
  text: string;
  contentHash: string;
  version: string | null;
  mimeType: string;
  title: string;
  locator: string | null;
}

export type ChangeDecision = "skip" | "reingest";

export interface ChangeSignal {
  contentHash?: string;
  version?: string | null;
}
