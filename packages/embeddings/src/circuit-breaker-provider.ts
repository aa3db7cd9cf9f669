import {
  AppError,
  ExternalServiceError,
  createCircuitBreaker,
  type CircuitBreakerOptions,
} from "@indexflow/errors";
import type { EmbeddingResult } from "@indexflow/types";
import type CircuitBreaker from "opossum";
import type { IEmbeddingProvider } from "./embedding-provider.interface.js";

/** Requests the upstream refused (4xx other than 429) say nothing about its health. */
function isCallerFault(err: unknown): boolean {
  return (
    AppError.isAppError(err) &&
    err.statusCode >= 400 &&
    err.statusCode < 500 &&
    err.statusCode !== 429
  );
}

/**
 * Short-circuits provider calls after repeated failures so a degraded
 * upstream fails jobs fast instead of tying up workers.
 */
export class CircuitBreakingEmbeddingProvider implements IEmbeddingProvider {
  readonly name: string;
  private readonly breaker: CircuitBreaker<[string[], string, number], EmbeddingResult>;

  constructor(
    private readonly inner: IEmbeddingProvider,
    options?: CircuitBreakerOptions,
  ) {
    this.name = inner.name;
    this.breaker = createCircuitBreaker(
      `embeddings:${inner.name}`,
      (texts: string[], model: string, dimension: number) =>
        inner.generateEmbeddings(texts, model, dimension),
      { timeout: false, errorFilter: isCallerFault, ...options },
    );
  }

  async generateEmbeddings(
    texts: string[],
    model: string,
    dimension: number,
  ): Promise<EmbeddingResult> {
    if (this.breaker.opened) {
      throw new ExternalServiceError(
        `${this.name}: circuit open, provider calls suspended`,
        this.name,
      );
    }
    return this.breaker.fire(texts, model, dimension);
  }

  async healthCheck(): Promise<boolean> {
    return this.inner.healthCheck();
  }
}
