import { ExternalServiceError, ValidationError } from "@indexflow/errors";
import type { ChunkStore, EmbeddingStore } from "@indexflow/db";
import { assertModelDimension, type IEmbeddingProvider } from "@indexflow/embeddings";
import {
  STORED_VECTOR_DIMENSION,
  assertNever,
  type Chunk,
  type ChunkSelector,
  type EmbedPhaseResult,
  type NewEmbedding,
} from "@indexflow/types";
import { runPhase, type PhaseContext } from "./phase-runner.js";

export interface EmbedInput {
  model: string;
  selector: ChunkSelector;
  dimension: number;
}

export interface EmbedDeps extends PhaseContext {
  chunks: ChunkStore;
  embeddings: EmbeddingStore;
  provider: IEmbeddingProvider;
}

async function selectChunks(
  fileId: string,
  selector: ChunkSelector,
  fileChunks: Chunk[],
  store: ChunkStore,
): Promise<Chunk[]> {
  switch (selector.kind) {
    case "all":
      return fileChunks;
    case "ids": {
      const found = await store.getByIds(selector.chunkIds);
      return found
        .filter((chunk) => chunk.fileId === fileId)
        .sort((a, b) => a.chunkIndex - b.chunkIndex);
    }
    case "range":
      if (!Number.isInteger(selector.start) || !Number.isInteger(selector.end)) {
        throw new ValidationError("Chunk range bounds must be integers", { selector: "range" });
      }
      if (selector.start < 0 || selector.end < selector.start) {
        throw new ValidationError(
          `Invalid chunk range ${String(selector.start)}..${String(selector.end)}`,
          { selector: "range" },
        );
      }
      return fileChunks.filter(
        (chunk) => chunk.chunkIndex >= selector.start && chunk.chunkIndex <= selector.end,
      );
    default:
      return assertNever(selector);
  }
}

/**
 * Embeds the selected chunks that have no active vector for the model yet.
 * All pending chunks go to the provider in one call and are stored together.
 *
 * Existing vectors are first re-pointed at the file's current chunks, so a
 * re-chunked file keeps its links; vectors whose index no longer has a chunk
 * are switched off.
 */
export async function generateEmbeddings(
  input: EmbedInput,
  deps: EmbedDeps,
): Promise<EmbedPhaseResult> {
  const { result } = await runPhase(
    "embed",
    deps,
    async () => {
      if (input.dimension !== STORED_VECTOR_DIMENSION) {
        throw new ValidationError(
          `Embedding dimension ${String(input.dimension)} does not match the stored dimension ${String(STORED_VECTOR_DIMENSION)}`,
          { dimension: String(input.dimension) },
        );
      }
      assertModelDimension(input.model, input.dimension);

      const fileChunks = await deps.chunks.listByFile(deps.fileId);
      const totalChunks = fileChunks.length;
      const links = await deps.embeddings.relinkChunks(
        deps.fileId,
        input.model,
        new Map(fileChunks.map((chunk): [number, string] => [chunk.chunkIndex, chunk.chunkId])),
      );
      if (links.relinked > 0 || links.deactivated > 0) {
        deps.logger.info({ ...links, model: input.model }, "re-linked existing vectors to current chunks");
      }

      const selected = await selectChunks(deps.fileId, input.selector, fileChunks, deps.chunks);
      const active = await deps.embeddings.activeChunkIndexes(deps.fileId, input.model);
      const pending = selected.filter((chunk) => !active.has(chunk.chunkIndex));

      if (pending.length === 0) {
        return { result: { totalChunks, embedded: 0, skipped: totalChunks }, links };
      }

      const response = await deps.provider.generateEmbeddings(
        pending.map((chunk) => chunk.chunkText),
        input.model,
        input.dimension,
      );

      const rows: NewEmbedding[] = [];
      for (const [i, chunk] of pending.entries()) {
        const vector = response.embeddings[i];
        if (!vector || vector.length !== input.dimension) {
          throw new ExternalServiceError(
            `${deps.provider.name} returned no ${String(input.dimension)}-dimension vector for chunk ${String(chunk.chunkIndex)}`,
            deps.provider.name,
          );
        }
        rows.push({
          fileId: deps.fileId,
          chunkId: chunk.chunkId,
          chunkIndex: chunk.chunkIndex,
          vector,
          embeddingModel: input.model,
        });
      }

      const embedded = await deps.embeddings.insertMany(rows);
      return { result: { totalChunks, embedded, skipped: totalChunks - embedded }, links };
    },
    ({ result: summary, links }) => ({
      message: `Embedding completed: ${String(summary.embedded)} embedded, ${String(summary.skipped)} skipped`,
      payload: { ...summary, ...links, model: input.model, selector: input.selector.kind },
    }),
  );
  return result;
}
