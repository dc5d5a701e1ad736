import type { VectorRecord, VectorRecordPayload } from "@indexloom/types";

export interface VectorSearchParams {
  /** Per-user partition; every query is confined to it. */
  namespace: string;
  vector: number[];
  topK: number;
  scoreThreshold?: number;
  filter?: VectorFilter;
}

export interface VectorFilter {
  sourceIds?: string[];
}

export interface VectorSearchResult {
  id: string;
  score: number;
  payload: VectorRecordPayload;
}

export interface IVectorStore {
  /** Insert or overwrite points. The namespace is stamped on every payload. */
  upsert(namespace: string, records: VectorRecord[]): Promise<void>;
  search(params: VectorSearchParams): Promise<VectorSearchResult[]>;
  delete(namespace: string, ids: string[]): Promise<void>;
  /** Ids of every stored point of a source, whatever its generation. */
  listIdsBySource(namespace: string, sourceId: string): Promise<string[]>;
  ensureCollection(dimensions: number): Promise<void>;
  healthCheck(): Promise<boolean>;
}
