import { z } from "zod";
import type { AppConfig } from "@indexloom/types";

const intFromString = (fallback: string) =>
  z.string().default(fallback).transform(Number).pipe(z.number().int().positive());

/**
 * Zod schema for every environment variable the worker and pipeline read.
 * Validates, transforms, and provides defaults so that the resulting
 * object is a strongly-typed AppConfig.
 */
export const envSchema = z
  .object({
    // ---------- Core ----------
    NODE_ENV: z.enum(["development", "test", "production"]),
    LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),

    // ---------- Database ----------
    DATABASE_URL: z
      .string()
      .min(1, "DATABASE_URL is required")
      .refine((url) => url.startsWith("postgresql://"), {
        message: "DATABASE_URL must start with postgresql://",
      }),
    DATABASE_POOL_MAX: intFromString("10"),

    // ---------- Redis ----------
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),

    // ---------- Qdrant ----------
    QDRANT_URL: z.string().min(1, "QDRANT_URL is required"),
    QDRANT_API_KEY: z.string().optional(),
    QDRANT_COLLECTION: z.string().min(1).default("indexloom-chunks"),

    // ---------- Cohere ----------
    COHERE_API_KEY: z.string().min(1, "COHERE_API_KEY is required"),
    COHERE_EMBED_MODEL: z.string().default("embed-v4.0"),

    // ---------- Embedding ----------
    EMBED_DIMENSIONS: intFromString("1024"),
    EMBED_TOKEN_LIMIT: intFromString("8000"),
    EMBED_BATCH_SIZE: intFromString("48"),
    EMBED_TIMEOUT_MS: intFromString("30000"),
    EMBED_MAX_RETRIES: intFromString("6"),
    EMBED_BASE_BACKOFF_MS: intFromString("600"),
    EMBED_MAX_BACKOFF_MS: intFromString("20000"),

    // ---------- Chunking ----------
    CHUNK_MAX_TOKENS: intFromString("350"),

    // ---------- Ingestion ----------
    INGEST_PROGRESS_FLUSH_INTERVAL: intFromString("1"),
    INGEST_MAX_ATTEMPTS: intFromString("3"),

    // ---------- Worker ----------
    WORKER_CONCURRENCY: intFromString("2"),
    SOURCE_ROOT_DIR: z.string().default("./data/sources"),
  })
  .refine((env) => env.CHUNK_MAX_TOKENS <= env.EMBED_TOKEN_LIMIT, {
    message: "CHUNK_MAX_TOKENS must not exceed EMBED_TOKEN_LIMIT",
    path: ["CHUNK_MAX_TOKENS"],
  });

/**
 * Parse and validate process.env (or any compatible record) against
 * the envSchema and return a strongly-typed {@link AppConfig}.
 *
 * Throws a ZodError with detailed messages when validation fails.
 */
export function parseEnv(env: Record<string, string | undefined> = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,

    database: {
      url: parsed.DATABASE_URL,
      poolMax: parsed.DATABASE_POOL_MAX,
    },

    redis: {
      url: parsed.REDIS_URL,
    },

    qdrant: {
      url: parsed.QDRANT_URL,
      apiKey: parsed.QDRANT_API_KEY,
      collection: parsed.QDRANT_COLLECTION,
    },

    cohere: {
      apiKey: parsed.COHERE_API_KEY,
      embedModel: parsed.COHERE_EMBED_MODEL,
    },

    embedding: {
      dimensions: parsed.EMBED_DIMENSIONS,
      tokenLimit: parsed.EMBED_TOKEN_LIMIT,
      chunkCountLimit: parsed.EMBED_BATCH_SIZE,
      timeoutMs: parsed.EMBED_TIMEOUT_MS,
      maxRetries: parsed.EMBED_MAX_RETRIES,
      baseBackoffMs: parsed.EMBED_BASE_BACKOFF_MS,
      maxBackoffMs: parsed.EMBED_MAX_BACKOFF_MS,
    },

    chunking: {
      maxTokensPerChunk: parsed.CHUNK_MAX_TOKENS,
    },

    ingestion: {
      progressFlushIntervalPages: parsed.INGEST_PROGRESS_FLUSH_INTERVAL,
      maxAttempts: parsed.INGEST_MAX_ATTEMPTS,
    },

    worker: {
      concurrency: parsed.WORKER_CONCURRENCY,
      sourceRootDir: parsed.SOURCE_ROOT_DIR,
    },
  };
}
