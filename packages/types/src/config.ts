export interface AppConfig {
  nodeEnv: "development" | "test" | "production";
  logLevel: "debug" | "info" | "warn" | "error";
  database: DatabaseConfig;
  redis: RedisConfig;
  qdrant: QdrantConfig;
  cohere: CohereConfig;
  embedding: EmbeddingConfig;
  chunking: ChunkingLimits;
  ingestion: IngestionConfig;
  worker: WorkerConfig;
}

export interface DatabaseConfig {
  url: string;
  poolMax: number;
}

export interface RedisConfig {
  url: string;
}

export interface QdrantConfig {
  url: string;
  apiKey?: string;
  collection: string;
}

export interface CohereConfig {
  apiKey: string;
  embedModel: string;
}

export interface EmbeddingConfig {
  dimensions: number;
  tokenLimit: number;
  chunkCountLimit: number;
  timeoutMs: number;
  maxRetries: number;
  baseBackoffMs: number;
  maxBackoffMs: number;
}

export interface ChunkingLimits {
  maxTokensPerChunk: number;
}

export interface IngestionConfig {
  progressFlushIntervalPages: number;
  maxAttempts: number;
}

export interface WorkerConfig {
  concurrency: number;
  sourceRootDir: string;
}
