export {
  runIndexingJob,
  type IndexingOutcome,
  type OrchestratorDeps,
  type OrchestratorSettings,
} from "./orchestrator.js";
export { getJobProgress, listProjectJobs, type ProgressDeps } from "./progress.js";
export { deindexFile, type DeindexDeps } from "./deindex.js";
export { convertToText, convertedTextUri, type ConvertInput, type ConvertDeps } from "./convert-phase.js";
export { runOcr, ocrTextUri, type OcrInput, type OcrDeps } from "./ocr-phase.js";
export { chunkText, type ChunkInput, type ChunkDeps } from "./chunk-phase.js";
export { generateEmbeddings, type EmbedInput, type EmbedDeps } from "./embed-phase.js";
export { integrateVectorIndex, type IntegrateDeps } from "./integrate-phase.js";
export { runPhase, type PhaseContext, type PhaseOutcome, type ExecutablePhase } from "./phase-runner.js";
export {
  CREDIT_COSTS,
  estimateCredits,
  actualCredits,
  reservationOperationId,
  consumeOperationId,
  type CreditEstimate,
} from "./cost.js";
export { validateIndexingRequest } from "./request-validator.js";
