import type { JobsOptions } from "bullmq";
import type { IJobDispatcher, IngestJobData } from "@indexloom/types";

/** The part of a BullMQ queue the dispatcher needs. */
export interface IngestQueueLike {
  add(name: string, data: IngestJobData, opts?: JobsOptions): Promise<unknown>;
}

/**
 * Enqueues ingestion jobs under their own job id, so dispatching the same
 * job twice leaves a single queue entry.
 */
export class BullMqJobDispatcher implements IJobDispatcher {
  constructor(private readonly queue: IngestQueueLike) {}

  async dispatch(data: IngestJobData, options?: { delayMs?: number }): Promise<void> {
    await this.queue.add(data.type, data, {
      jobId: data.jobId,
      ...(options?.delayMs ? { delay: options.delayMs } : {}),
    });
  }
}
