import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData } from "@indexloom/types";

export const QUEUE_NAMES = {
  INGEST: "indexloom-ingest",
} as const;

export interface QueueConfig {
  connection: ConnectionOptions;
}

/** Delivery attempts for a crashed worker before the job is dead-lettered. */
export const INGEST_ATTEMPTS = 3;

export function createQueues(config: QueueConfig) {
  const ingestQueue = new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    connection: config.connection,
    defaultJobOptions: {
      attempts: INGEST_ATTEMPTS,
      backoff: {
        type: "exponential",
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  });

  return { ingestQueue };
}

export type Queues = ReturnType<typeof createQueues>;

export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    // Required by BullMQ workers for blocking commands.
    maxRetriesPerRequest: null,
  };
}
