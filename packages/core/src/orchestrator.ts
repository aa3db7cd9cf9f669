import { WhitespaceWindowChunker, type IChunker } from "@indexflow/chunker";
import type { CreditLedger } from "@indexflow/credits";
import type { IndexStores } from "@indexflow/db";
import type { IEmbeddingProvider } from "@indexflow/embeddings";
import { ValidationError, describeError } from "@indexflow/errors";
import type { Logger } from "@indexflow/logger";
import type { IOcrProvider } from "@indexflow/ocr";
import type { IStorage } from "@indexflow/storage";
import {
  err,
  isTerminalStatus,
  ok,
  type ChunkingConfig,
  type IndexingJobFailure,
  type IndexingRequest,
  type JobStatus,
  type OrchestrationSummary,
  type PipelinePhase,
  type Result,
} from "@indexflow/types";
import { chunkText } from "./chunk-phase.js";
import { convertToText } from "./convert-phase.js";
import {
  actualCredits,
  consumeOperationId,
  estimateCredits,
  reservationOperationId,
} from "./cost.js";
import { generateEmbeddings } from "./embed-phase.js";
import { integrateVectorIndex } from "./integrate-phase.js";
import { runOcr } from "./ocr-phase.js";
import type { PhaseContext } from "./phase-runner.js";
import { validateIndexingRequest } from "./request-validator.js";

export interface OrchestratorSettings {
  embeddingModel: string;
  embeddingDimension: number;
  chunking: ChunkingConfig;
  reservationTtlMinutes: number;
}

export interface OrchestratorDeps {
  stores: IndexStores;
  ledger: CreditLedger;
  storage: IStorage;
  embeddingProvider: IEmbeddingProvider;
  /** Required for requests that need OCR. */
  ocrProvider?: IOcrProvider;
  /** Default: whitespace window chunker. */
  chunker?: IChunker;
  logger: Logger;
  settings: OrchestratorSettings;
}

export type IndexingOutcome = Result<OrchestrationSummary, IndexingJobFailure>;

/** Mutable bookkeeping for one run; read when building the summary. */
interface RunState {
  jobId: string;
  phasesDone: PipelinePhase[];
  current: PipelinePhase | null;
  totalChunks: number;
  totalEmbeddings: number;
  skippedEmbeddings: number;
  reservationId: string | null;
  creditsCharged: number;
  /** Set before the consume call so a failure never also cancels. */
  settlementAttempted: boolean;
}

function summarize(state: RunState, jobStatus: JobStatus): OrchestrationSummary {
  return {
    jobId: state.jobId,
    phasesDone: [...state.phasesDone],
    jobStatus,
    totalChunks: state.totalChunks,
    totalEmbeddings: state.totalEmbeddings,
    skippedEmbeddings: state.skippedEmbeddings,
    creditsUsed: state.creditsCharged,
    reservationId: state.reservationId,
  };
}

/**
 * Drives one file through convert, optional OCR, chunk, embed and integrate
 * under a credit reservation.
 *
 * Invalid requests and job creation failures (including a second submission
 * for a file that already has an active job) throw before anything else is
 * written. Once the job exists every failure is returned as an `ok: false`
 * result after the job is marked failed and its reservation released.
 *
 * Nothing here commits; the caller owns the transaction around the run.
 */
export async function runIndexingJob(
  request: IndexingRequest,
  deps: OrchestratorDeps,
): Promise<IndexingOutcome> {
  const input = validateIndexingRequest(request);
  if (input.needsOcr && !deps.ocrProvider) {
    throw new ValidationError("OCR was requested but no OCR provider is configured", {
      needsOcr: "requires an OCR provider",
    });
  }

  const { stores, ledger, settings } = deps;
  const job = await stores.jobs.create({
    projectId: input.projectId,
    fileId: input.fileId,
    userId: input.userId,
    needsOcr: input.needsOcr,
  });

  const log = deps.logger.child({ jobId: job.jobId, fileId: input.fileId });
  const state: RunState = {
    jobId: job.jobId,
    phasesDone: [],
    current: null,
    totalChunks: 0,
    totalEmbeddings: 0,
    skippedEmbeddings: 0,
    reservationId: null,
    creditsCharged: 0,
    settlementAttempted: false,
  };
  const ctx: PhaseContext = {
    jobId: job.jobId,
    fileId: input.fileId,
    events: stores.events,
    logger: log,
  };
  const operationId = reservationOperationId(job.jobId);

  const advance = async (phase: PipelinePhase): Promise<void> => {
    state.phasesDone.push(phase);
    await stores.jobs.updatePhase(job.jobId, phase);
  };

  try {
    await stores.events.append({
      jobId: job.jobId,
      eventType: "job_queued",
      phase: "convert",
      progressPct: 0,
      message: `Job queued for file ${input.fileId}`,
    });

    const estimate = estimateCredits(input);
    log.info({ ...estimate }, "credits estimated");
    const reservation = await ledger.createReservation({
      userId: input.userId,
      credits: estimate.total,
      operationId,
      ttlMinutes: settings.reservationTtlMinutes,
    });
    state.reservationId = reservation.reservationId;

    await stores.jobs.updateStatus(job.jobId, "running");
    await stores.events.append({
      jobId: job.jobId,
      eventType: "job_running",
      phase: "convert",
      progressPct: 0,
      message: `Reserved ${String(reservation.creditsReserved)} credits`,
      payload: { reservationId: reservation.reservationId, creditsReserved: reservation.creditsReserved },
    });

    state.current = "convert";
    const converted = await convertToText(
      { sourceUri: input.sourceUri, mimeType: input.mimeType, needsOcr: input.needsOcr },
      { ...ctx, storage: deps.storage },
    );
    await advance("convert");
    let textUri = converted.resultUri;

    let ocrPages: number | null = null;
    if (input.needsOcr && deps.ocrProvider) {
      state.current = "ocr";
      const ocr = await runOcr(
        { sourceUri: input.sourceUri, strategy: input.ocrStrategy },
        { ...ctx, storage: deps.storage, ocr: deps.ocrProvider },
      );
      await advance("ocr");
      textUri = ocr.resultUri;
      ocrPages = ocr.totalPages;
    }

    state.current = "chunk";
    const chunked = await chunkText(
      { textUri, params: settings.chunking },
      {
        ...ctx,
        storage: deps.storage,
        chunks: stores.chunks,
        chunker: deps.chunker ?? new WhitespaceWindowChunker(),
      },
    );
    await advance("chunk");
    state.totalChunks = chunked.totalChunks;

    state.current = "embed";
    const embedded = await generateEmbeddings(
      {
        model: settings.embeddingModel,
        selector: { kind: "all" },
        dimension: settings.embeddingDimension,
      },
      {
        ...ctx,
        chunks: stores.chunks,
        embeddings: stores.embeddings,
        provider: deps.embeddingProvider,
      },
    );
    await advance("embed");
    state.totalEmbeddings = embedded.embedded;
    state.skippedEmbeddings = embedded.skipped;

    state.current = "integrate";
    const integration = await integrateVectorIndex({
      ...ctx,
      chunks: stores.chunks,
      embeddings: stores.embeddings,
    });
    await advance("integrate");
    if (!integration.ready) {
      log.warn({ ...integration }, "integration reported the file not ready; completing anyway");
    }

    state.current = "ready";
    const used = actualCredits({ ocrPages, embedded: embedded.embedded });
    const charge = Math.min(used, reservation.creditsReserved);
    if (charge < used) {
      log.warn({ used, reserved: reservation.creditsReserved }, "usage exceeded the reservation; charge capped");
    }
    state.settlementAttempted = true;
    await ledger.consumeReservation({
      operationId,
      ledgerOperationId: consumeOperationId(job.jobId),
      credits: charge,
    });
    state.creditsCharged = charge;

    await advance("ready");
    await stores.jobs.updateStatus(job.jobId, "completed");
    const summary = summarize(state, "completed");
    await stores.events.append({
      jobId: job.jobId,
      eventType: "job_completed",
      phase: "ready",
      progressPct: 100,
      message: `Indexed ${String(summary.totalChunks)} chunks, ${String(summary.totalEmbeddings)} embeddings, ${String(summary.creditsUsed)} credits`,
      payload: {
        totalChunks: summary.totalChunks,
        totalEmbeddings: summary.totalEmbeddings,
        skippedEmbeddings: summary.skippedEmbeddings,
        creditsUsed: summary.creditsUsed,
        integrityValid: integration.integrityValid,
      },
    });
    log.info({ ...summary }, "indexing job completed");
    return ok(summary);
  } catch (error: unknown) {
    return err(await failJob(error, state, deps, log));
  }
}

/**
 * Records the failure, marks the job failed and releases the hold. Each step
 * is attempted even when an earlier one fails; none of them throws.
 */
async function failJob(
  error: unknown,
  state: RunState,
  deps: OrchestratorDeps,
  log: Logger,
): Promise<IndexingJobFailure> {
  const { stores, ledger } = deps;
  const { code, message } = describeError(error);
  const failedPhase = state.current;
  log.error({ err: error, failedPhase, phasesDone: state.phasesDone }, "indexing job failed");

  try {
    await stores.events.append({
      jobId: state.jobId,
      eventType: "job_failed",
      ...(failedPhase ? { phase: failedPhase } : {}),
      message: failedPhase ? `Job failed during ${failedPhase}: ${message}` : `Job failed: ${message}`,
      payload: { code, failedPhase, phasesDone: state.phasesDone },
    });
  } catch (logError: unknown) {
    log.error({ err: logError }, "could not record job failure event");
  }

  try {
    const job = await stores.jobs.getById(state.jobId);
    if (job && !isTerminalStatus(job.status)) {
      await stores.jobs.updateStatus(state.jobId, "failed");
    }
  } catch (statusError: unknown) {
    log.error({ err: statusError }, "could not mark job failed");
  }

  if (state.reservationId !== null && !state.settlementAttempted) {
    state.settlementAttempted = true;
    try {
      await ledger.cancelReservation(reservationOperationId(state.jobId));
    } catch (cancelError: unknown) {
      log.error({ err: cancelError }, "could not release credit reservation");
    }
  }

  return {
    summary: summarize(state, "failed"),
    failedPhase,
    code,
    message,
  };
}
