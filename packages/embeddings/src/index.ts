export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { CohereEmbeddingProvider, toProviderError } from "./cohere-provider.js";
export type { CohereProviderConfig } from "./cohere-provider.js";
export { GuardedEmbeddingProvider } from "./guarded-provider.js";
export type { GuardOptions } from "./guarded-provider.js";
export { EmbeddingBatcher } from "./embedding-batcher.js";
export type { EmbeddingBatcherOptions } from "./embedding-batcher.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig, EmbeddingProviderType } from "./factory.js";
