import type { VectorRecord, VectorRecordPayload } from "@indexloom/types";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";

interface StoredPoint {
  id: string;
  vector: number[];
  payload: VectorRecordPayload;
}

/**
 * In-process store with cosine ranking, for tests and local runs without Qdrant.
 */
export class MemoryVectorStore implements IVectorStore {
  private readonly points = new Map<string, StoredPoint>();

  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    for (const record of records) {
      this.points.set(record.id, {
        id: record.id,
        vector: record.vector,
        payload: { ...record.payload, namespace },
      });
    }
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    if (!params.namespace) {
      throw new Error("namespace is required for vector search");
    }
    const sourceIds = params.filter?.sourceIds;

    const matches: VectorSearchResult[] = [];
    for (const point of this.points.values()) {
      if (point.payload.namespace !== params.namespace) continue;
      if (sourceIds && sourceIds.length > 0 && !sourceIds.includes(point.payload.sourceId)) {
        continue;
      }
      const score = cosineSimilarity(params.vector, point.vector);
      if (params.scoreThreshold !== undefined && score < params.scoreThreshold) continue;
      matches.push({ id: point.id, score, payload: point.payload });
    }

    return matches.sort((a, b) => b.score - a.score).slice(0, params.topK);
  }

  async delete(namespace: string, ids: string[]): Promise<void> {
    for (const id of ids) {
      if (this.points.get(id)?.payload.namespace === namespace) {
        this.points.delete(id);
      }
    }
  }

  async listIdsBySource(namespace: string, sourceId: string): Promise<string[]> {
    const ids: string[] = [];
    for (const point of this.points.values()) {
      if (point.payload.namespace === namespace && point.payload.sourceId === sourceId) {
        ids.push(point.id);
      }
    }
    return ids;
  }

  async ensureCollection(): Promise<void> {}

  async healthCheck(): Promise<boolean> {
    return true;
  }

  /** Number of stored points across all namespaces. */
  get size(): number {
    return this.points.size;
  }

  has(id: string): boolean {
    return this.points.has(id);
  }
}

function cosineSimilarity(a: number[], b: number[]): number {
  const minLength = Math.min(a.length, b.length);
  let dot = 0;
  let magA = 0;
  let magB = 0;
  for (let i = 0; i < minLength; i += 1) {
    const valA = a[i] ?? 0;
    const valB = b[i] ?? 0;
    dot += valA * valB;
    magA += valA * valA;
    magB += valB * valB;
  }
  return dot / (Math.sqrt(magA) * Math.sqrt(magB) || 1);
}
