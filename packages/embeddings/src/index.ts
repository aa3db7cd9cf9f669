export type { IEmbeddingProvider } from "./embedding-provider.interface.js";
export { OpenAIEmbeddingProvider } from "./openai-provider.js";
export type { OpenAIProviderConfig, OpenAIEmbeddingsClient } from "./openai-provider.js";
export { CohereEmbeddingProvider } from "./cohere-provider.js";
export type { CohereProviderConfig, CohereEmbedClient } from "./cohere-provider.js";
export { CircuitBreakingEmbeddingProvider } from "./circuit-breaker-provider.js";
export { createEmbeddingProvider } from "./factory.js";
export type { EmbeddingFactoryConfig } from "./factory.js";
export {
  EMBEDDING_MODELS,
  getModelInfo,
  assertModelDimension,
  assertEmbeddingShape,
  type EmbeddingModelInfo,
} from "./models.js";
export { toProviderError } from "./provider-errors.js";
