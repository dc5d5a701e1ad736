export const JOB_STATUSES = [
  "pending",
  "running",
  "succeeded",
  "failed",
  "partial",
  "cancelled",
] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export type TerminalJobStatus = Exclude<JobStatus, "pending" | "running">;

export const TERMINAL_JOB_STATUSES: readonly TerminalJobStatus[] = [
  "succeeded",
  "failed",
  "partial",
  "cancelled",
];

export function isTerminalStatus(status: JobStatus): status is TerminalJobStatus {
  return (TERMINAL_JOB_STATUSES as readonly JobStatus[]).includes(status);
}

export interface JobCounters {
  found: number;
  processed: number;
  embedded: number;
  skipped: number;
  errors: number;
}

export type JobCounter = keyof JobCounters;

export interface JobLogEntry {
  at: string;
  message: string;
}

export interface RunOptions {
  /** Source adapter type registered with the runner. */
  source: string;
  /** Bypass change detection and re-embed every document. */
  forceReembed: boolean;
}

export interface IngestionJob {
  jobId: string;
  userId: string;
  status: JobStatus;
  counters: JobCounters;
  log: JobLogEntry[];
  options: RunOptions;
  attempt: number;
  errorSummary: string | null;
  cancelRequested: boolean;
  createdAt: Date;
  updatedAt: Date;
  startedAt: Date | null;
  finishedAt: Date | null;
}

export interface IngestionSummary extends JobCounters {
  jobId: string;
  status: TerminalJobStatus;
}

export interface IngestJobData {
  type: "ingest";
  jobId: string;
  userId: string;
}

export function emptyCounters(): JobCounters {
  return { found: 0, processed: 0, embedded: 0, skipped: 0, errors: 0 };
}

/**
 * Hands a pending job to background execution.
 */
export interface IJobDispatcher {
  dispatch(data: IngestJobData, options?: { delayMs?: number }): Promise<void>;
}
