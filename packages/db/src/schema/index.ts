export * from "./content-index.js";
export * from "./ingestion-jobs.js";
