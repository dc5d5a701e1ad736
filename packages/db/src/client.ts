import { drizzle } from "drizzle-orm/postgres-js";
import postgres from "postgres";
import * as schema from "./schema/index.js";

export interface DbClientOptions {
  url: string;
  maxConnections?: number;
}

const DEFAULT_POOL_MAX = 10;

export function createDbClient(options: DbClientOptions) {
  const connection = postgres(options.url, {
    max: options.maxConnections ?? DEFAULT_POOL_MAX,
    idle_timeout: 30,
    connect_timeout: 10,
  });

  return drizzle(connection, { schema });
}

export type DbClient = ReturnType<typeof createDbClient>;

/** Close the underlying connection pool, waiting for in-flight queries. */
export async function closeDbClient(db: DbClient): Promise<void> {
  await db.$client.end({ timeout: 5 });
}
