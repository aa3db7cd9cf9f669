/** Width of the `vector` column; every persisted embedding has exactly this many components. */
export const STORED_VECTOR_DIMENSION = 1536;

export interface Embedding {
  embeddingId: string;
  fileId: string;
  chunkId: string | null;
  chunkIndex: number;
  vector: number[];
  embeddingModel: string;
  isActive: boolean;
  createdAt: Date;
  deactivatedAt: Date | null;
}

export interface NewEmbedding {
  fileId: string;
  chunkId: string;
  chunkIndex: number;
  vector: number[];
  embeddingModel: string;
}

export interface EmbeddingResult {
  embeddings: number[][];
  model: string;
  tokensUsed: number;
  dimensions: number;
}
