import { UnrecoverableError } from "bullmq";
import { runIndexingJob, type IndexingOutcome, type OrchestratorSettings } from "@indexflow/core";
import type { IEmbeddingProvider } from "@indexflow/embeddings";
import { AppError } from "@indexflow/errors";
import type { Logger } from "@indexflow/logger";
import type { IOcrProvider } from "@indexflow/ocr";
import { QUEUE_NAMES, type DeadLetterSink } from "@indexflow/queue";
import type { IStorage } from "@indexflow/storage";
import type { IndexFileJobData } from "@indexflow/types";
import type { RunInTransaction } from "../transaction.js";

export interface IndexFileProcessorDeps {
  runInTransaction: RunInTransaction;
  storage: IStorage;
  embeddingProvider: IEmbeddingProvider;
  ocrProvider?: IOcrProvider;
  settings: OrchestratorSettings;
  deadLetter: DeadLetterSink;
  logger: Logger;
}

/**
 * Index job processor.
 *
 * The orchestration runs inside one transaction. A failed pipeline is still
 * committed (the job row, its timeline and the released reservation are the
 * record of the failure) and the request goes to the dead-letter queue.
 * Errors thrown before a job exists roll back; client errors among them are
 * not retried.
 */
export async function processIndexFile(
  data: IndexFileJobData,
  deps: IndexFileProcessorDeps,
): Promise<IndexingOutcome> {
  const log = deps.logger.child({ queue: QUEUE_NAMES.INDEX, fileId: data.fileId });

  let outcome: IndexingOutcome;
  try {
    outcome = await deps.runInTransaction(({ stores, ledger }) =>
      runIndexingJob(
        {
          projectId: data.projectId,
          fileId: data.fileId,
          userId: data.userId,
          mimeType: data.mimeType,
          needsOcr: data.needsOcr,
          ocrStrategy: data.ocrStrategy,
          sourceUri: data.sourceUri,
          estimatedPages: data.estimatedPages,
          estimatedChunks: data.estimatedChunks,
        },
        {
          stores,
          ledger,
          storage: deps.storage,
          embeddingProvider: deps.embeddingProvider,
          ocrProvider: deps.ocrProvider,
          logger: log,
          settings: deps.settings,
        },
      ),
    );
  } catch (error: unknown) {
    if (AppError.isAppError(error) && error.statusCode >= 400 && error.statusCode < 500) {
      log.warn({ err: error }, "index request rejected");
      throw new UnrecoverableError(error.message);
    }
    throw error;
  }

  if (!outcome.ok) {
    await deps.deadLetter.add(QUEUE_NAMES.INDEX, {
      ...data,
      originalQueue: QUEUE_NAMES.INDEX,
      failureReason: outcome.error.message,
      failure: outcome.error,
    });
    log.warn(
      { jobId: outcome.error.summary.jobId, failedPhase: outcome.error.failedPhase },
      "indexing failed; request moved to the dead-letter queue",
    );
  }
  return outcome;
}
