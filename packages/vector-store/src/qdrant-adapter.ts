import { QdrantClient } from "@qdrant/js-client-rest";
import type { Schemas } from "@qdrant/js-client-rest";
import type { VectorRecord } from "@indexloom/types";
import type {
  IVectorStore,
  VectorSearchParams,
  VectorSearchResult,
} from "./vector-store.interface.js";
import { toPayload } from "./payload.js";

const BATCH_SIZE = 100;
const SCROLL_PAGE_SIZE = 256;

type Condition = Schemas["FieldCondition"];

function matchValue(key: string, value: string): Condition {
  return { key, match: { value } };
}

export interface QdrantVectorStoreConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

/**
 * One Qdrant collection shared by all users; every point carries its
 * namespace in the payload and every read and delete filters on it.
 */
export class QdrantVectorStore implements IVectorStore {
  private client: QdrantClient;
  private collection: string;

  constructor(config: QdrantVectorStoreConfig) {
    this.client = new QdrantClient({ url: config.url, apiKey: config.apiKey });
    this.collection = config.collection;
  }

  async upsert(namespace: string, records: VectorRecord[]): Promise<void> {
    for (let i = 0; i < records.length; i += BATCH_SIZE) {
      const batch = records.slice(i, i + BATCH_SIZE);

      await this.client.upsert(this.collection, {
        wait: true,
        points: batch.map((r) => ({
          id: r.id,
          vector: r.vector,
          payload: { ...r.payload, namespace },
        })),
      });
    }
  }

  async search(params: VectorSearchParams): Promise<VectorSearchResult[]> {
    if (!params.namespace) {
      throw new Error("namespace is required for vector search");
    }

    const must: Condition[] = [matchValue("namespace", params.namespace)];
    if (params.filter?.sourceIds && params.filter.sourceIds.length > 0) {
      must.push({ key: "sourceId", match: { any: params.filter.sourceIds } });
    }

    const results = await this.client.search(this.collection, {
      vector: params.vector,
      limit: params.topK,
      score_threshold: params.scoreThreshold,
      filter: { must },
      with_payload: true,
    });

    return results.map((r) => ({
      id: typeof r.id === "string" ? r.id : String(r.id),
      score: r.score,
      payload: toPayload(r.payload),
    }));
  }

  async delete(namespace: string, ids: string[]): Promise<void> {
    if (ids.length === 0) return;

    await this.client.delete(this.collection, {
      wait: true,
      filter: {
        must: [matchValue("namespace", namespace), { has_id: ids }],
      },
    });
  }

  async listIdsBySource(namespace: string, sourceId: string): Promise<string[]> {
    const ids: string[] = [];
    let offset: Schemas["ScrollRequest"]["offset"];

    do {
      const page = await this.client.scroll(this.collection, {
        filter: {
          must: [matchValue("namespace", namespace), matchValue("sourceId", sourceId)],
        },
        limit: SCROLL_PAGE_SIZE,
        offset,
        with_payload: false,
        with_vector: false,
      });
      for (const point of page.points) {
        ids.push(typeof point.id === "string" ? point.id : String(point.id));
      }
      offset = page.next_page_offset ?? undefined;
    } while (offset !== undefined);

    return ids;
  }

  async ensureCollection(dimensions: number): Promise<void> {
    const collections = await this.client.getCollections();
    const exists = collections.collections.some((c) => c.name === this.collection);

    if (!exists) {
      await this.client.createCollection(this.collection, {
        vectors: {
          size: dimensions,
          distance: "Cosine",
        },
        optimizers_config: {
          indexing_threshold: 20000,
        },
      });

      // Payload indexes for filtering
      for (const field of ["namespace", "sourceId", "generation"]) {
        await this.client.createPayloadIndex(this.collection, {
          field_name: field,
          field_schema: "keyword",
        });
      }
    }
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.client.getCollections();
      return true;
    } catch {
      return false;
    }
  }
}
