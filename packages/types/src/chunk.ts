export interface Chunk {
  chunkId: string;
  fileId: string;
  chunkIndex: number;
  chunkText: string;
  tokenCount: number;
  sourcePageStart: number | null;
  sourcePageEnd: number | null;
  metadata: ChunkMetadata;
  createdAt: Date;
}

export interface ChunkMetadata {
  startToken?: number;
  endToken?: number;
  [key: string]: unknown;
}

export interface NewChunk {
  chunkIndex: number;
  chunkText: string;
  tokenCount: number;
  sourcePageStart?: number | null;
  sourcePageEnd?: number | null;
  metadata?: ChunkMetadata;
}

export interface ChunkingConfig {
  maxTokens: number;
  overlap: number;
}

/** A window produced by a chunker before it is persisted. */
export interface ChunkWindow {
  content: string;
  index: number;
  tokenCount: number;
  startToken: number;
  endToken: number;
}
