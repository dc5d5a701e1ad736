export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: {
    mimeType: string;
    charCount: number;
    wordCount: number;
  };
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}

export interface VectorRecordPayload {
  namespace: string;
  sourceId: string;
  chunkId: string;
  sequenceIndex: number;
  generation: string;
  title: string;
  locator: string | null;
  content: string;
}

export interface VectorRecord {
  id: string;
  vector: number[];
  payload: VectorRecordPayload;
}

export interface ScoredChunk {
  chunkId: string;
  sourceId: string;
  content: string;
  score: number;
  title: string;
  locator: string | null;
}
