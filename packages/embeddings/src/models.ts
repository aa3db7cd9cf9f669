import { ExternalServiceError, ValidationError } from "@indexflow/errors";
import type { EmbeddingProviderName, EmbeddingResult } from "@indexflow/types";

export interface EmbeddingModelInfo {
  provider: EmbeddingProviderName;
  dimensions: readonly number[];
  /** The API accepts an explicit output dimension. */
  configurableDimensions: boolean;
}

export const EMBEDDING_MODELS: Readonly<Record<string, EmbeddingModelInfo>> = {
  "text-embedding-3-large": {
    provider: "openai",
    dimensions: [256, 1024, 1536, 3072],
    configurableDimensions: true,
  },
  "text-embedding-3-small": {
    provider: "openai",
    dimensions: [256, 512, 1536],
    configurableDimensions: true,
  },
  "text-embedding-ada-002": { provider: "openai", dimensions: [1536], configurableDimensions: false },
  "embed-v4.0": { provider: "cohere", dimensions: [1536], configurableDimensions: false },
  "embed-english-v3.0": { provider: "cohere", dimensions: [1024], configurableDimensions: false },
  "embed-multilingual-v3.0": { provider: "cohere", dimensions: [1024], configurableDimensions: false },
};

export function getModelInfo(model: string): EmbeddingModelInfo | undefined {
  return Object.hasOwn(EMBEDDING_MODELS, model) ? EMBEDDING_MODELS[model] : undefined;
}

/**
 * Throws ValidationError unless `model` is known, served by `provider` (when
 * given) and can emit `dimension`-component vectors.
 */
export function assertModelDimension(
  model: string,
  dimension: number,
  provider?: EmbeddingProviderName,
): EmbeddingModelInfo {
  const info = getModelInfo(model);
  if (!info) {
    throw new ValidationError(`Unknown embedding model: ${model}`, { model });
  }
  if (provider && info.provider !== provider) {
    throw new ValidationError(`Model ${model} is not served by ${provider}`, { model });
  }
  if (!info.dimensions.includes(dimension)) {
    throw new ValidationError(
      `Dimension ${String(dimension)} is not supported by ${model} (allowed: ${info.dimensions.join(", ")})`,
      { dimension: String(dimension) },
    );
  }
  return info;
}

/**
 * Reject responses that do not line up with the request.
 */
export function assertEmbeddingShape(
  service: string,
  result: EmbeddingResult,
  expectedCount: number,
  dimension: number,
): EmbeddingResult {
  if (result.embeddings.length !== expectedCount) {
    throw new ExternalServiceError(
      `${service} returned ${String(result.embeddings.length)} embeddings for ${String(expectedCount)} texts`,
      service,
      { details: { expectedCount, received: result.embeddings.length } },
    );
  }
  const wrong = result.embeddings.findIndex((v) => v.length !== dimension);
  if (wrong !== -1) {
    throw new ExternalServiceError(
      `${service} returned a vector of ${String(result.embeddings[wrong]?.length)} dimensions, expected ${String(dimension)}`,
      service,
      { details: { index: wrong, dimension } },
    );
  }
  return result;
}
