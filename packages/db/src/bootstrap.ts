import { sql } from "drizzle-orm";
import type { DbClient } from "./client.js";

/**
 * DDL for the two pipeline tables. Every statement is idempotent so the
 * worker can run it on each start.
 */
export function getBootstrapSql(): string[] {
  return [
    `DO $$ BEGIN
       CREATE TYPE job_status AS ENUM ('pending', 'running', 'succeeded', 'failed', 'partial', 'cancelled');
     EXCEPTION WHEN duplicate_object THEN NULL;
     END $$;`,
    `CREATE TABLE IF NOT EXISTS content_index (
       user_id text NOT NULL,
       source_id text NOT NULL,
       content_hash text NOT NULL,
       version text,
       chunk_ids text[] NOT NULL,
       title text,
       mime_type text,
       last_ingested_at timestamptz NOT NULL DEFAULT now(),
       updated_at timestamptz NOT NULL DEFAULT now(),
       PRIMARY KEY (user_id, source_id)
     );`,
    `CREATE TABLE IF NOT EXISTS ingestion_jobs (
       id text PRIMARY KEY,
       user_id text NOT NULL,
       status job_status NOT NULL DEFAULT 'pending',
       counters jsonb NOT NULL,
       log jsonb NOT NULL DEFAULT '[]'::jsonb,
       options jsonb NOT NULL,
       attempt integer NOT NULL DEFAULT 1,
       error_summary text,
       cancel_requested boolean NOT NULL DEFAULT false,
       created_at timestamptz NOT NULL DEFAULT now(),
       updated_at timestamptz NOT NULL DEFAULT now(),
       started_at timestamptz,
       finished_at timestamptz
     );`,
    `CREATE INDEX IF NOT EXISTS ingestion_jobs_user_created_idx
       ON ingestion_jobs (user_id, created_at);`,
    `CREATE UNIQUE INDEX IF NOT EXISTS ingestion_jobs_active_user_idx
       ON ingestion_jobs (user_id) WHERE status in ('pending', 'running');`,
  ];
}

export async function bootstrapSchema(db: DbClient): Promise<void> {
  for (const statement of getBootstrapSql()) {
    await db.execute(sql.raw(statement));
  }
}
