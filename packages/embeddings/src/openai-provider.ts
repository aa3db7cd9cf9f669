import OpenAI from "openai";
import { withRetry, type RetryOptions } from "@indexflow/errors";
import type { EmbeddingResult } from "@indexflow/types";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";
import { assertEmbeddingShape, assertModelDimension } from "./models.js";
import { toProviderError } from "./provider-errors.js";

const SERVICE = "openai";
const DEFAULT_TIMEOUT_MS = 60_000;
// OpenAI limits: 2048 inputs and 300k tokens per request. Whitespace words
// undercount model tokens, so the word budget stays well below that.
const MAX_INPUTS_PER_REQUEST = 2048;
const MAX_WORDS_PER_REQUEST = 150_000;

function wordCount(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

/** Splits `texts` into consecutive request-sized batches. */
export function planOpenAIBatches(
  texts: string[],
  maxInputs = MAX_INPUTS_PER_REQUEST,
  maxWords = MAX_WORDS_PER_REQUEST,
): string[][] {
  const batches: string[][] = [];
  let current: string[] = [];
  let words = 0;
  for (const text of texts) {
    const size = wordCount(text);
    if (current.length > 0 && (current.length >= maxInputs || words + size > maxWords)) {
      batches.push(current);
      current = [];
      words = 0;
    }
    current.push(text);
    words += size;
  }
  if (current.length > 0) {
    batches.push(current);
  }
  return batches;
}

/** The slice of the OpenAI SDK this provider calls. */
export interface OpenAIEmbeddingsClient {
  embeddings: {
    create(body: { model: string; input: string[]; dimensions?: number }): Promise<{
      data: { embedding: number[]; index: number }[];
      model: string;
      usage: { prompt_tokens: number; total_tokens: number };
    }>;
  };
}

export interface OpenAIProviderConfig {
  apiKey: string;
  timeoutMs?: number;
  retry?: RetryOptions;
  /** Defaults to the official SDK client with its own retries disabled. */
  client?: OpenAIEmbeddingsClient;
}

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  readonly name = SERVICE;
  private readonly client: OpenAIEmbeddingsClient;
  private readonly retry: RetryOptions | undefined;

  constructor(config: OpenAIProviderConfig) {
    this.client =
      config.client ??
      new OpenAI({
        apiKey: config.apiKey,
        maxRetries: 0,
        timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      });
    this.retry = config.retry;
  }

  async generateEmbeddings(
    texts: string[],
    model: string,
    dimension: number,
  ): Promise<EmbeddingResult> {
    const info = assertModelDimension(model, dimension, "openai");
    if (texts.length === 0) {
      return { embeddings: [], model, tokensUsed: 0, dimensions: dimension };
    }

    const embeddings: number[][] = [];
    let tokensUsed = 0;
    let responseModel = model;

    // Results are only returned once every batch has succeeded.
    for (const batch of planOpenAIBatches(texts)) {
      const response = await withRetry(async () => {
        try {
          return await this.client.embeddings.create({
            model,
            input: batch,
            ...(info.configurableDimensions ? { dimensions: dimension } : {}),
          });
        } catch (error: unknown) {
          throw toProviderError(SERVICE, error);
        }
      }, this.retry);

      // The API documents `index`; order by it rather than trusting array order.
      const ordered = [...response.data].sort((a, b) => a.index - b.index);
      assertEmbeddingShape(
        SERVICE,
        {
          embeddings: ordered.map((item) => item.embedding),
          model: response.model,
          tokensUsed: response.usage.total_tokens,
          dimensions: dimension,
        },
        batch.length,
        dimension,
      );
      embeddings.push(...ordered.map((item) => item.embedding));
      tokensUsed += response.usage.total_tokens;
      responseModel = response.model;
    }

    return { embeddings, model: responseModel, tokensUsed, dimensions: dimension };
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.generateEmbeddings(["health check"], "text-embedding-3-small", 256);
      return true;
    } catch {
      return false;
    }
  }
}
