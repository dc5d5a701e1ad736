import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import { parseEnv } from "@indexloom/config";
import { createLogger } from "@indexloom/logger";
import type { Logger } from "@indexloom/logger";
import {
  DrizzleContentIndexRepository,
  DrizzleJobRepository,
  bootstrapSchema,
  closeDbClient,
  createDbClient,
} from "@indexloom/db";
import { createVectorStore } from "@indexloom/vector-store";
import { GuardedEmbeddingProvider, createEmbeddingProvider } from "@indexloom/embeddings";
import { createChunker } from "@indexloom/chunker";
import { LocalDirectorySource, SourceRegistry } from "@indexloom/connectors";
import { DocumentIndex, IngestionService } from "@indexloom/core";
import {
  BullMqJobDispatcher,
  QUEUE_NAMES,
  createDeadLetterQueue,
  createQueues,
  parseRedisConnection,
  toDeadLetter,
} from "@indexloom/queue";
import type { DeadLetterQueue } from "@indexloom/queue";
import type { AppConfig, IngestJobData } from "@indexloom/types";
import { processIngest } from "./processors/ingest.js";
import type { IngestProcessorDeps } from "./processors/ingest.js";

/** Backoff between successor jobs of a run that failed on a transient error. */
const RUN_RETRY_BASE_DELAY_MS = 5_000;
const RUN_RETRY_MAX_DELAY_MS = 120_000;

function createIngestWorker(
  connection: ConnectionOptions,
  config: AppConfig,
  deps: IngestProcessorDeps,
  deadLetters: DeadLetterQueue,
  logger: Logger,
): Worker<IngestJobData> {
  const worker = new Worker<IngestJobData>(
    QUEUE_NAMES.INGEST,
    async (job) => {
      await processIngest(job.data, deps);
    },
    { connection, concurrency: config.worker.concurrency },
  );

  worker.on("failed", (job, error) => {
    if (!job) return;
    const attempts = job.opts.attempts ?? 1;
    logger.error(
      { err: error, jobId: job.data.jobId, attempt: job.attemptsMade, attempts },
      "ingest delivery failed",
    );
    if (job.attemptsMade < attempts) return;

    void deadLetters
      .add("dead-letter", toDeadLetter(job.data, error, job.attemptsMade))
      .catch((dlqError: unknown) => {
        logger.error({ err: dlqError, jobId: job.data.jobId }, "failed to dead-letter job");
      });
  });

  return worker;
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "worker" });

  const db = createDbClient({ url: config.database.url, maxConnections: config.database.poolMax });
  await bootstrapSchema(db);
  const jobs = new DrizzleJobRepository(db);
  const contentIndex = new DrizzleContentIndexRepository(db);

  const vectorStore = createVectorStore({
    type: "qdrant",
    qdrantUrl: config.qdrant.url,
    qdrantApiKey: config.qdrant.apiKey,
    collection: config.qdrant.collection,
  });
  await vectorStore.ensureCollection(config.embedding.dimensions);

  const embeddingProvider = createEmbeddingProvider({
    provider: "cohere",
    cohere: {
      apiKey: config.cohere.apiKey,
      model: config.cohere.embedModel,
      dimensions: config.embedding.dimensions,
    },
    timeoutMs: config.embedding.timeoutMs,
    logger,
  });

  const connection = parseRedisConnection(config.redis.url);
  const { ingestQueue } = createQueues({ connection });
  const deadLetters = createDeadLetterQueue(connection);
  const dispatcher = new BullMqJobDispatcher(ingestQueue);

  const sources = new SourceRegistry([
    new LocalDirectorySource({ rootDir: config.worker.sourceRootDir }),
  ]);

  const embeddingRetry = {
    maxAttempts: config.embedding.maxRetries + 1,
    baseDelayMs: config.embedding.baseBackoffMs,
    maxDelayMs: config.embedding.maxBackoffMs,
  };

  const service = new IngestionService({
    jobs,
    dispatcher,
    resolveSource: (type) => sources.get(type),
    pipeline: {
      documentIndex: new DocumentIndex({ vectorStore, contentIndex, logger }),
      embeddingProvider,
      chunker: createChunker("recursive"),
      chunkBudget: config.chunking,
      batchLimits: {
        tokenLimit: config.embedding.tokenLimit,
        chunkCountLimit: config.embedding.chunkCountLimit,
      },
      embeddingRetry,
      sourceRetry: embeddingRetry,
      flushEveryPages: config.ingestion.progressFlushIntervalPages,
    },
    logger,
  });

  const worker = createIngestWorker(
    connection,
    config,
    {
      jobs,
      service,
      dispatcher,
      retryPolicy: {
        maxAttempts: config.ingestion.maxAttempts,
        baseDelayMs: RUN_RETRY_BASE_DELAY_MS,
        maxDelayMs: RUN_RETRY_MAX_DELAY_MS,
      },
      logger,
    },
    deadLetters,
    logger,
  );

  logger.info(
    { queue: QUEUE_NAMES.INGEST, concurrency: config.worker.concurrency },
    "worker started",
  );

  let stopping = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info({ signal }, "shutting down");

    await worker.close();
    await Promise.all([ingestQueue.close(), deadLetters.close()]);
    if (embeddingProvider instanceof GuardedEmbeddingProvider) {
      embeddingProvider.shutdown();
    }
    await closeDbClient(db);

    logger.info("worker stopped");
    process.exit(0);
  };

  const onSignal = (signal: string): void => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  const logger = createLogger({ service: "worker" });
  logger.fatal({ err }, "worker failed to start");
  process.exit(1);
});
