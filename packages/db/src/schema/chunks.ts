import { pgTable, text, timestamp, jsonb, integer, unique } from "drizzle-orm/pg-core";
import type { ChunkMetadata } from "@indexflow/types";

export const ragChunks = pgTable(
  "rag_chunks",
  {
    chunkId: text("chunk_id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    fileId: text("file_id").notNull(),
    chunkIndex: integer("chunk_index").notNull(),
    chunkText: text("chunk_text").notNull(),
    tokenCount: integer("token_count").notNull(),
    sourcePageStart: integer("source_page_start"),
    sourcePageEnd: integer("source_page_end"),
    metadata: jsonb("metadata").notNull().$type<ChunkMetadata>().default({}),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
  },
  (table) => [unique("uq_rag_chunks_file_index").on(table.fileId, table.chunkIndex)],
);
