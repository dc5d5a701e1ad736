export { decide } from "./change-detector.js";
export type { ChangeOptions } from "./change-detector.js";

export { DocumentIndex } from "./document-index.js";
export type { DocumentFinalization, DocumentIndexDependencies } from "./document-index.js";

export { JobTracker, assertTransition, canTransition, MAX_LOG_ENTRIES } from "./job-tracker.js";
export type { JobTrackerOptions } from "./job-tracker.js";

export { runIngestion } from "./ingestion-pipeline.js";
export type {
  IngestionDependencies,
  IngestionRequest,
  IngestionResult,
} from "./ingestion-pipeline.js";

export { retrieve } from "./retrieval-pipeline.js";
export type { RetrievalDependencies, RetrievalRequest } from "./retrieval-pipeline.js";

export { IngestionService } from "./ingestion-service.js";
export type {
  IngestionServiceDependencies,
  PipelineDependencies,
} from "./ingestion-service.js";

export { UserLock } from "./user-lock.js";
