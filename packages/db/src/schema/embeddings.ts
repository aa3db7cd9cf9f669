import { sql } from "drizzle-orm";
import {
  pgTable,
  text,
  timestamp,
  integer,
  boolean,
  vector,
  index,
  uniqueIndex,
} from "drizzle-orm/pg-core";
import { STORED_VECTOR_DIMENSION } from "@indexflow/types";
import { ragChunks } from "./chunks.js";

export const ragEmbeddings = pgTable(
  "rag_embeddings",
  {
    embeddingId: text("embedding_id")
      .primaryKey()
      .$defaultFn(() => crypto.randomUUID()),
    fileId: text("file_id").notNull(),
    // Rechunking deletes chunks; vectors outlive them and are only deactivated.
    chunkId: text("chunk_id").references(() => ragChunks.chunkId, { onDelete: "set null" }),
    chunkIndex: integer("chunk_index").notNull(),
    embedding: vector("embedding", { dimensions: STORED_VECTOR_DIMENSION }).notNull(),
    embeddingModel: text("embedding_model").notNull(),
    isActive: boolean("is_active").notNull().default(true),
    createdAt: timestamp("created_at", { withTimezone: true }).notNull().defaultNow(),
    deactivatedAt: timestamp("deactivated_at", { withTimezone: true }),
  },
  (table) => [
    index("idx_rag_embeddings_file").on(table.fileId),
    uniqueIndex("uq_rag_embeddings_active")
      .on(table.fileId, table.chunkIndex, table.embeddingModel)
      .where(sql`${table.isActive}`),
  ],
);
