import { randomUUID } from "node:crypto";
import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  timestamp,
  jsonb,
  integer,
  boolean,
  pgEnum,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { JOB_STATUSES } from "@indexloom/types";
import type { JobCounters, JobLogEntry, RunOptions } from "@indexloom/types";

export const jobStatusEnum = pgEnum("job_status", JOB_STATUSES);

export const ingestionJobs = pgTable(
  "ingestion_jobs",
  {
    id: text("id")
      .primaryKey()
      .$defaultFn(() => randomUUID()),
    userId: text("user_id").notNull(),
    status: jobStatusEnum("status").notNull().default("pending"),
    counters: jsonb("counters").$type<JobCounters>().notNull(),
    log: jsonb("log").$type<JobLogEntry[]>().notNull().default([]),
    options: jsonb("options").$type<RunOptions>().notNull(),
    attempt: integer("attempt").notNull().default(1),
    errorSummary: text("error_summary"),
    cancelRequested: boolean("cancel_requested").notNull().default(false),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
    startedAt: timestamp("started_at", { withTimezone: true }),
    finishedAt: timestamp("finished_at", { withTimezone: true }),
  },
  (table) => ({
    userCreatedIdx: index("ingestion_jobs_user_created_idx").on(table.userId, table.createdAt),
    // At most one live job per user.
    activeUserIdx: uniqueIndex("ingestion_jobs_active_user_idx")
      .on(table.userId)
      .where(sql`${table.status} in ('pending', 'running')`),
  }),
);
