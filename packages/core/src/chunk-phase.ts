import { ValidationError } from "@indexflow/errors";
import type { ChunkStore } from "@indexflow/db";
import type { IChunker } from "@indexflow/chunker";
import { decodeText } from "@indexflow/parser";
import type { IStorage } from "@indexflow/storage";
import type { ChunkingConfig, ChunkingResult, NewChunk } from "@indexflow/types";
import { runPhase, type PhaseContext } from "./phase-runner.js";

export interface ChunkInput {
  textUri: string;
  params: ChunkingConfig;
}

export interface ChunkDeps extends PhaseContext {
  storage: IStorage;
  chunks: ChunkStore;
  chunker: IChunker;
}

/**
 * Splits the cached text into overlapping windows and replaces the file's
 * chunk set with them.
 */
export async function chunkText(input: ChunkInput, deps: ChunkDeps): Promise<ChunkingResult> {
  return runPhase(
    "chunk",
    deps,
    async () => {
      const { text } = decodeText(await deps.storage.read(input.textUri));
      const content = text.trim();
      if (content.length === 0) {
        throw new ValidationError(`Empty text content at ${input.textUri}`, {
          textUri: "is empty",
        });
      }

      const rows: NewChunk[] = deps.chunker.chunk(content, input.params).map((window) => ({
        chunkIndex: window.index,
        chunkText: window.content,
        tokenCount: window.tokenCount,
        metadata: { startToken: window.startToken, endToken: window.endToken },
      }));
      const saved = await deps.chunks.replaceForFile(deps.fileId, rows);

      return { totalChunks: saved.length, chunkIds: saved.map((c) => c.chunkId) };
    },
    (result) => ({
      message: `Chunking completed: ${String(result.totalChunks)} chunks created`,
      payload: {
        totalChunks: result.totalChunks,
        maxTokens: input.params.maxTokens,
        overlap: input.params.overlap,
      },
    }),
  );
}
