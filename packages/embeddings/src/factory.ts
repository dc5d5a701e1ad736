import type { Logger } from "@indexloom/logger";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { CohereEmbeddingProvider } from "./cohere-provider.js";
import type { CohereProviderConfig } from "./cohere-provider.js";
import { GuardedEmbeddingProvider } from "./guarded-provider.js";

export type EmbeddingProviderType = "cohere";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderType;
  cohere?: CohereProviderConfig;
  /** When set, the provider is wrapped with a timeout and circuit breaker. */
  timeoutMs?: number;
  logger?: Logger;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  let provider: IEmbeddingProvider;
  switch (config.provider) {
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      provider = new CohereEmbeddingProvider(config.cohere);
      break;
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }

  if (config.timeoutMs === undefined) {
    return provider;
  }
  return new GuardedEmbeddingProvider(provider, {
    timeoutMs: config.timeoutMs,
    logger: config.logger,
  });
}
