import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { IngestJobData } from "@indexloom/types";
import { QUEUE_NAMES } from "./queues.js";

export const DLQ_NAME = "indexloom-dead-letter";

/** An ingest delivery that exhausted its attempts, kept for inspection. */
export interface DeadLetterData extends IngestJobData {
  originalQueue: string;
  failureReason: string;
  attemptsMade: number;
  failedAt: string;
}

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;

export function toDeadLetter(
  data: IngestJobData,
  error: Error,
  attemptsMade: number,
  failedAt: Date = new Date(),
): DeadLetterData {
  return {
    type: data.type,
    jobId: data.jobId,
    userId: data.userId,
    originalQueue: QUEUE_NAMES.INGEST,
    failureReason: error.message,
    attemptsMade,
    failedAt: failedAt.toISOString(),
  };
}
