export * from "./schema/index.js";
export { createDbClient, closeDbClient, type DbClient, type DbClientOptions } from "./client.js";
export type {
  ContentIndexRepository,
  JobRepository,
  JobUpdate,
  JobUpdateGuard,
} from "./repositories/repository.interface.js";
export {
  DrizzleContentIndexRepository,
  DrizzleJobRepository,
} from "./repositories/drizzle-repositories.js";
export {
  InMemoryContentIndexRepository,
  InMemoryJobRepository,
} from "./repositories/memory-repositories.js";
export { bootstrapSchema, getBootstrapSql } from "./bootstrap.js";
