export { QUEUE_NAMES, INGEST_ATTEMPTS, createQueues, parseRedisConnection } from "./queues.js";
export type { QueueConfig, Queues } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, toDeadLetter } from "./dlq.js";
export type { DeadLetterData, DeadLetterQueue } from "./dlq.js";
export { BullMqJobDispatcher } from "./dispatcher.js";
export type { IngestQueueLike } from "./dispatcher.js";
