import { pgTable, text, timestamp, primaryKey } from "drizzle-orm/pg-core";

/**
 * One row per ingested source document. Replacing the row is the switch
 * that makes a new generation of chunks visible.
 */
export const contentIndex = pgTable(
  "content_index",
  {
    userId: text("user_id").notNull(),
    sourceId: text("source_id").notNull(),
    contentHash: text("content_hash").notNull(),
    version: text("version"),
    chunkIds: text("chunk_ids").array().notNull(),
    title: text("title"),
    mimeType: text("mime_type"),
    lastIngestedAt: timestamp("last_ingested_at", { withTimezone: true }).notNull().defaultNow(),
    updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.userId, table.sourceId] }),
  }),
);
