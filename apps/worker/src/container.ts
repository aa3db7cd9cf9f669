import type { OrchestratorSettings } from "@indexflow/core";
import { createWorkerDbClient, type DbClient } from "@indexflow/db";
import { createEmbeddingProvider, type IEmbeddingProvider } from "@indexflow/embeddings";
import type { RetryOptions } from "@indexflow/errors";
import type { Logger } from "@indexflow/logger";
import { AzureDocumentIntelligenceProvider, type IOcrProvider } from "@indexflow/ocr";
import { LocalFileStorage, type IStorage } from "@indexflow/storage";
import type { AppConfig } from "@indexflow/types";
import { drizzleTransactionRunner, type RunInTransaction } from "./transaction.js";

export interface WorkerDependencies {
  dbClient: DbClient;
  runInTransaction: RunInTransaction;
  storage: IStorage;
  embeddingProvider: IEmbeddingProvider;
  ocrProvider?: IOcrProvider;
  settings: OrchestratorSettings;
}

export function buildDependencies(config: AppConfig, logger: Logger): WorkerDependencies {
  const dbClient = createWorkerDbClient({
    url: config.database.url,
    maxConnections: config.database.poolMax,
  });
  const storage = new LocalFileStorage(config.storage.root);

  const providerLog = logger.child({ component: "providers" });
  const retry: RetryOptions = {
    maxRetries: config.providers.maxRetries,
    onRetry: ({ attempt, maxRetries, delayMs, error }) =>
      providerLog.warn({ attempt, maxRetries, delayMs, err: error }, "provider call failed, retrying"),
  };

  const embeddingProvider = createEmbeddingProvider({
    provider: config.embeddings.provider,
    openai: {
      apiKey: config.embeddings.openaiApiKey,
      timeoutMs: config.providers.timeoutMs,
      retry,
    },
    cohere: {
      apiKey: config.embeddings.cohereApiKey,
      timeoutMs: config.providers.timeoutMs,
      retry,
    },
    circuitBreaker: { logger: providerLog },
  });

  const { endpoint, apiKey, apiVersion } = config.ocr;
  const ocrProvider =
    endpoint && apiKey
      ? new AzureDocumentIntelligenceProvider({
          endpoint,
          apiKey,
          apiVersion,
          storage,
          requestTimeoutMs: config.providers.timeoutMs,
          retry,
        })
      : undefined;
  if (!ocrProvider) {
    logger.warn("OCR is not configured; jobs that need OCR will be rejected");
  }

  return {
    dbClient,
    runInTransaction: drizzleTransactionRunner(dbClient.db),
    storage,
    embeddingProvider,
    ocrProvider,
    settings: {
      embeddingModel: config.embeddings.model,
      embeddingDimension: config.embeddings.dimension,
      chunking: config.chunking,
      reservationTtlMinutes: config.credits.reservationTtlMinutes,
    },
  };
}
