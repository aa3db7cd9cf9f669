import { CohereClient } from "cohere-ai";
import { withRetry, type RetryOptions } from "@indexflow/errors";
import type { EmbeddingResult } from "@indexflow/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { assertEmbeddingShape, assertModelDimension } from "./models.js";
import { toProviderError } from "./provider-errors.js";

const SERVICE = "cohere";
const BATCH_SIZE = 96; // Cohere limit
const DEFAULT_TIMEOUT_MS = 60_000;

/** The slice of the Cohere SDK this provider calls. */
export interface CohereEmbedClient {
  v2: {
    embed(
      request: {
        texts: string[];
        model: string;
        inputType: "search_document";
        embeddingTypes: "float"[];
      },
      requestOptions?: { timeoutInSeconds?: number; maxRetries?: number },
    ): Promise<{
      embeddings: { float?: number[][] };
      meta?: { billedUnits?: { inputTokens?: number } };
    }>;
  };
}

export interface CohereProviderConfig {
  apiKey: string;
  timeoutMs?: number;
  retry?: RetryOptions;
  client?: CohereEmbedClient;
}

export class CohereEmbeddingProvider implements IEmbeddingProvider {
  readonly name = SERVICE;
  private readonly client: CohereEmbedClient;
  private readonly timeoutInSeconds: number;
  private readonly retry: RetryOptions | undefined;

  constructor(config: CohereProviderConfig) {
    this.client = config.client ?? new CohereClient({ token: config.apiKey });
    this.timeoutInSeconds = Math.ceil((config.timeoutMs ?? DEFAULT_TIMEOUT_MS) / 1000);
    this.retry = config.retry;
  }

  async generateEmbeddings(
    texts: string[],
    model: string,
    dimension: number,
  ): Promise<EmbeddingResult> {
    assertModelDimension(model, dimension, "cohere");

    const allEmbeddings: number[][] = [];
    let totalTokens = 0;

    // Process in batches of BATCH_SIZE
    for (let i = 0; i < texts.length; i += BATCH_SIZE) {
      const batch = texts.slice(i, i + BATCH_SIZE);

      const response = await withRetry(async () => {
        try {
          return await this.client.v2.embed(
            {
              texts: batch,
              model,
              inputType: "search_document",
              embeddingTypes: ["float"],
            },
            { timeoutInSeconds: this.timeoutInSeconds, maxRetries: 0 },
          );
        } catch (error: unknown) {
          throw toProviderError(SERVICE, error);
        }
      }, this.retry);

      allEmbeddings.push(...(response.embeddings.float ?? []));

      // Use actual tokensUsed from Cohere response for billing accuracy
      totalTokens += response.meta?.billedUnits?.inputTokens ?? 0;
    }

    return assertEmbeddingShape(
      SERVICE,
      { embeddings: allEmbeddings, model, tokensUsed: totalTokens, dimensions: dimension },
      texts.length,
      dimension,
    );
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generateEmbeddings(["health check"], "embed-english-v3.0", 1024);
      return true;
    } catch {
      return false;
    }
  }
}
