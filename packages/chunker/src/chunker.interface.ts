import type { ChunkWindow, ChunkingConfig } from "@indexflow/types";

export interface IChunker {
  readonly strategy: string;
  chunk(content: string, config: ChunkingConfig): ChunkWindow[];
}
