import { asc, count, eq, inArray } from "drizzle-orm";
import { ConflictError } from "@indexflow/errors";
import type { Chunk, NewChunk } from "@indexflow/types";
import { isUniqueViolation, type Database } from "../client.js";
import { ragChunks } from "../schema/index.js";
import type { ChunkStore } from "./interfaces.js";

type ChunkRow = typeof ragChunks.$inferSelect;

function toChunk(row: ChunkRow): Chunk {
  return {
    chunkId: row.chunkId,
    fileId: row.fileId,
    chunkIndex: row.chunkIndex,
    chunkText: row.chunkText,
    tokenCount: row.tokenCount,
    sourcePageStart: row.sourcePageStart,
    sourcePageEnd: row.sourcePageEnd,
    metadata: row.metadata,
    createdAt: row.createdAt,
  };
}

export class DrizzleChunkStore implements ChunkStore {
  constructor(private readonly db: Database) {}

  async replaceForFile(fileId: string, chunks: NewChunk[]): Promise<Chunk[]> {
    try {
      return await this.db.transaction(async (tx) => {
        await tx.delete(ragChunks).where(eq(ragChunks.fileId, fileId));
        if (chunks.length === 0) {
          return [];
        }

        const rows = await tx
          .insert(ragChunks)
          .values(
            chunks.map((chunk) => ({
              fileId,
              chunkIndex: chunk.chunkIndex,
              chunkText: chunk.chunkText,
              tokenCount: chunk.tokenCount,
              sourcePageStart: chunk.sourcePageStart ?? null,
              sourcePageEnd: chunk.sourcePageEnd ?? null,
              metadata: chunk.metadata ?? {},
            })),
          )
          .returning();
        return rows.map(toChunk).sort((a, b) => a.chunkIndex - b.chunkIndex);
      });
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`Duplicate chunk index for file ${fileId}`, { cause: error });
      }
      throw error;
    }
  }

  async listByFile(fileId: string): Promise<Chunk[]> {
    const rows = await this.db
      .select()
      .from(ragChunks)
      .where(eq(ragChunks.fileId, fileId))
      .orderBy(asc(ragChunks.chunkIndex));
    return rows.map(toChunk);
  }

  async getByIds(chunkIds: string[]): Promise<Chunk[]> {
    if (chunkIds.length === 0) {
      return [];
    }
    const rows = await this.db
      .select()
      .from(ragChunks)
      .where(inArray(ragChunks.chunkId, chunkIds))
      .orderBy(asc(ragChunks.chunkIndex));
    return rows.map(toChunk);
  }

  async countByFile(fileId: string): Promise<number> {
    const [row] = await this.db
      .select({ total: count() })
      .from(ragChunks)
      .where(eq(ragChunks.fileId, fileId));
    return row?.total ?? 0;
  }

  async deleteByFile(fileId: string): Promise<number> {
    const rows = await this.db
      .delete(ragChunks)
      .where(eq(ragChunks.fileId, fileId))
      .returning({ chunkId: ragChunks.chunkId });
    return rows.length;
  }
}
