import { CohereClient, CohereError, CohereTimeoutError } from "cohere-ai";
import type { EmbeddingResult } from "@indexloom/types";
import { PermanentProviderError, TransientProviderError } from "@indexloom/errors";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

const DEFAULT_MODEL = "embed-v4.0";
const DEFAULT_DIMENSIONS = 1024;
const BATCH_SIZE = 96; // Cohere limit
const PROVIDER = "cohere";

export interface CohereProviderConfig {
  apiKey: string;
  model?: string;
  dimensions?: number;
}

type CohereInputType = "search_document" | "search_query";

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = PROVIDER;
  readonly dimensions: number;
  private client: CohereClient;
  private model: string;

  constructor(config: CohereProviderConfig) {
    this.client = new CohereClient({ token: config.apiKey });
    this.model = config.model ?? DEFAULT_MODEL;
    this.dimensions = config.dimensions ?? DEFAULT_DIMENSIONS;
  }

  async embed(text: string): Promise<EmbeddingResult> {
    return this.embedAll([text], "search_query");
  }

  async batchEmbed(texts: string[]): Promise<EmbeddingResult> {
    return this.embedAll(texts, "search_document");
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.embed("health check");
      return true;
    } catch {
      return false;
    }
  }

  private async embedAll(texts: string[], inputType: CohereInputType): Promise<EmbeddingResult> {
    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await this.client.v2
        .embed({
          texts: batch,
          model: this.model,
          inputType,
          embeddingTypes: ["float"],
          outputDimension: this.dimensions,
        })
        .catch((error: unknown) => {
          throw toProviderError(error);
        });

      if (response.embeddings.float) {
        allEmbeddings.push(...response.embeddings.float);
      }

      if (response.meta?.billedUnits?.inputTokens) {
        totalTokens += response.meta.billedUnits.inputTokens;
      }
    }

    return {
      embeddings: allEmbeddings,
      model: this.model,
      tokensUsed: totalTokens,
      dimensions: this.dimensions,
    };
  }
}

/**
 * Translate Cohere SDK failures into the pipeline's provider errors.
 * Anything unrecognised is returned unchanged for `classifyError` to inspect.
 */
export function toProviderError(error: unknown): unknown {
  if (error instanceof CohereTimeoutError) {
    return new TransientProviderError(error.message, "timeout", PROVIDER, { cause: error });
  }
  if (error instanceof CohereError && error.statusCode !== undefined) {
    const status = error.statusCode;
    if (status === 429) {
      return new TransientProviderError(error.message, "rate_limited", PROVIDER, { cause: error });
    }
    if (status === 408) {
      return new TransientProviderError(error.message, "timeout", PROVIDER, { cause: error });
    }
    if (status >= 500) {
      return new TransientProviderError(error.message, "unavailable", PROVIDER, { cause: error });
    }
    if (status >= 400) {
      return new PermanentProviderError(error.message, "invalid_input", PROVIDER, {
        details: { statusCode: status },
        cause: error,
      });
    }
  }
  return error;
}
