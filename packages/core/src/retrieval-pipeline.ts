import type { ScoredChunk } from "@indexloom/types";
import type { IEmbeddingProvider } from "@indexloom/embeddings";
import { ValidationError } from "@indexloom/errors";
import type { DocumentIndex } from "./document-index.js";

const DEFAULT_TOP_K = 10;
const MAX_TOP_K = 100;

export interface RetrievalRequest {
  userId: string;
  query: string;
  topK?: number;
}

export interface RetrievalDependencies {
  embeddingProvider: IEmbeddingProvider;
  documentIndex: DocumentIndex;
}

/**
 * Query -> Embed -> Search the user's live chunks.
 */
export async function retrieve(
  request: RetrievalRequest,
  deps: RetrievalDependencies,
): Promise<ScoredChunk[]> {
  const query = request.query.trim();
  if (query.length === 0) {
    throw new ValidationError("Query must not be empty", { query: "required" });
  }
  const topK = request.topK ?? DEFAULT_TOP_K;
  if (!Number.isInteger(topK) || topK < 1 || topK > MAX_TOP_K) {
    throw new ValidationError("Invalid topK", { topK: `must be between 1 and ${MAX_TOP_K}` });
  }

  const embeddingResult = await deps.embeddingProvider.embed(query);
  const queryVector = embeddingResult.embeddings[0];
  if (!queryVector) {
    throw new Error("Failed to generate embedding for query");
  }

  return deps.documentIndex.search(request.userId, queryVector, topK);
}
