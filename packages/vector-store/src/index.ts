import type { IVectorStore } from "./vector-store.interface.js";
import { QdrantVectorStore } from "./qdrant-adapter.js";
import { MemoryVectorStore } from "./memory-vector-store.js";

export type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
  VectorFilter,
} from "./vector-store.interface.js";
export { QdrantVectorStore } from "./qdrant-adapter.js";
export type { QdrantVectorStoreConfig } from "./qdrant-adapter.js";
export { MemoryVectorStore } from "./memory-vector-store.js";
export { toPayload } from "./payload.js";

export type VectorStoreType = "qdrant" | "memory";

export interface VectorStoreConfig {
  type: VectorStoreType;
  qdrantUrl?: string;
  qdrantApiKey?: string;
  collection?: string;
}

export function createVectorStore(config: VectorStoreConfig): IVectorStore {
  switch (config.type) {
    case "qdrant":
      if (!config.qdrantUrl) {
        throw new Error("qdrantUrl is required for Qdrant vector store");
      }
      if (!config.collection) {
        throw new Error("collection is required for Qdrant vector store");
      }
      return new QdrantVectorStore({
        url: config.qdrantUrl,
        apiKey: config.qdrantApiKey,
        collection: config.collection,
      });
    case "memory":
      return new MemoryVectorStore();
    default:
      throw new Error(`Unknown vector store type: ${String(config.type)}`);
  }
}
