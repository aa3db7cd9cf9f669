import type { CircuitBreakerOptions } from "@indexflow/errors";
import type { EmbeddingProviderName } from "@indexflow/types";
import { CircuitBreakingEmbeddingProvider } from "./circuit-breaker-provider.js";
import { CohereEmbeddingProvider, type CohereProviderConfig } from "./cohere-provider.js";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { OpenAIEmbeddingProvider, type OpenAIProviderConfig } from "./openai-provider.js";

export interface EmbeddingFactoryConfig {
  provider: EmbeddingProviderName;
  openai?: OpenAIProviderConfig;
  cohere?: CohereProviderConfig;
  /** Wrap the provider in a circuit breaker. */
  circuitBreaker?: CircuitBreakerOptions | false;
}

export function createEmbeddingProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  const provider = selectProvider(config);
  return config.circuitBreaker
    ? new CircuitBreakingEmbeddingProvider(provider, config.circuitBreaker)
    : provider;
}

function selectProvider(config: EmbeddingFactoryConfig): IEmbeddingProvider {
  switch (config.provider) {
    case "openai":
      if (!config.openai) {
        throw new Error("OpenAI config is required when provider is 'openai'");
      }
      return new OpenAIEmbeddingProvider(config.openai);
    case "cohere":
      if (!config.cohere) {
        throw new Error("Cohere config is required when provider is 'cohere'");
      }
      return new CohereEmbeddingProvider(config.cohere);
    default:
      throw new Error(`Unknown embedding provider: ${String(config.provider)}`);
  }
}
