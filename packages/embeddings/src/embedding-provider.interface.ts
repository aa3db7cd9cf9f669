import type { EmbeddingResult } from "@indexflow/types";

export interface IEmbeddingProvider {
  readonly name: string;

  /**
   * Embed `texts` in order. Resolves only when the response holds exactly one
   * vector of `dimension` components per input text.
   */
  generateEmbeddings(texts: string[], model: string, dimension: number): Promise<EmbeddingResult>;
  healthCheck(): Promise<boolean>;
}
