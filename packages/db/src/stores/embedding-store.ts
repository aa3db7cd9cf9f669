import { and, count, eq, inArray } from "drizzle-orm";
import { ConflictError } from "@indexflow/errors";
import type { NewEmbedding } from "@indexflow/types";
import { isUniqueViolation, type Database } from "../client.js";
import { ragEmbeddings } from "../schema/index.js";
import type { ChunkLinkResult, EmbeddingCountOptions, EmbeddingStore } from "./interfaces.js";

export class DrizzleEmbeddingStore implements EmbeddingStore {
  constructor(private readonly db: Database) {}

  async insertMany(embeddings: NewEmbedding[]): Promise<number> {
    if (embeddings.length === 0) {
      return 0;
    }
    try {
      const rows = await this.db
        .insert(ragEmbeddings)
        .values(
          embeddings.map((e) => ({
            fileId: e.fileId,
            chunkId: e.chunkId,
            chunkIndex: e.chunkIndex,
            embedding: e.vector,
            embeddingModel: e.embeddingModel,
          })),
        )
        .returning({ embeddingId: ragEmbeddings.embeddingId });
      return rows.length;
    } catch (error: unknown) {
      if (isUniqueViolation(error)) {
        throw new ConflictError("An active embedding already exists for one of the chunks", {
          cause: error,
        });
      }
      throw error;
    }
  }

  async activeChunkIndexes(fileId: string, model: string): Promise<Set<number>> {
    const rows = await this.db
      .select({ chunkIndex: ragEmbeddings.chunkIndex })
      .from(ragEmbeddings)
      .where(this.activeFor(fileId, model));
    return new Set(rows.map((r) => r.chunkIndex));
  }

  async activeLinks(fileId: string, model: string): Promise<Map<number, string | null>> {
    const rows = await this.db
      .select({ chunkIndex: ragEmbeddings.chunkIndex, chunkId: ragEmbeddings.chunkId })
      .from(ragEmbeddings)
      .where(this.activeFor(fileId, model));
    return new Map(rows.map((r): [number, string | null] => [r.chunkIndex, r.chunkId]));
  }

  async relinkChunks(
    fileId: string,
    model: string,
    chunkIdsByIndex: ReadonlyMap<number, string>,
  ): Promise<ChunkLinkResult> {
    const rows = await this.db
      .select({
        embeddingId: ragEmbeddings.embeddingId,
        chunkIndex: ragEmbeddings.chunkIndex,
        chunkId: ragEmbeddings.chunkId,
      })
      .from(ragEmbeddings)
      .where(this.activeFor(fileId, model));

    let relinked = 0;
    const orphaned: string[] = [];
    for (const row of rows) {
      const chunkId = chunkIdsByIndex.get(row.chunkIndex);
      if (chunkId === undefined) {
        orphaned.push(row.embeddingId);
      } else if (chunkId !== row.chunkId) {
        await this.db
          .update(ragEmbeddings)
          .set({ chunkId })
          .where(eq(ragEmbeddings.embeddingId, row.embeddingId));
        relinked += 1;
      }
    }

    if (orphaned.length > 0) {
      await this.db
        .update(ragEmbeddings)
        .set({ isActive: false, deactivatedAt: new Date() })
        .where(inArray(ragEmbeddings.embeddingId, orphaned));
    }
    return { relinked, deactivated: orphaned.length };
  }

  async countByFile(fileId: string, options?: EmbeddingCountOptions): Promise<number> {
    const onlyActive = options?.onlyActive ?? true;
    const where = onlyActive
      ? and(eq(ragEmbeddings.fileId, fileId), eq(ragEmbeddings.isActive, true))
      : eq(ragEmbeddings.fileId, fileId);
    const [row] = await this.db.select({ total: count() }).from(ragEmbeddings).where(where);
    return row?.total ?? 0;
  }

  async deactivateByFile(fileId: string): Promise<number> {
    const rows = await this.db
      .update(ragEmbeddings)
      .set({ isActive: false, deactivatedAt: new Date() })
      .where(and(eq(ragEmbeddings.fileId, fileId), eq(ragEmbeddings.isActive, true)))
      .returning({ embeddingId: ragEmbeddings.embeddingId });
    return rows.length;
  }

  private activeFor(fileId: string, model: string) {
    return and(
      eq(ragEmbeddings.fileId, fileId),
      eq(ragEmbeddings.embeddingModel, model),
      eq(ragEmbeddings.isActive, true),
    );
  }
}
