import type { JobStatus, OcrStrategy, PipelinePhase } from "./job.js";

export interface ParseResult {
  text: string;
  pageCount: number;
  metadata: Record<string, unknown>;
}

export interface OcrPage {
  pageNumber: number;
  width: number | null;
  height: number | null;
  unit: string;
  lines: number;
  words: number;
}

export interface OcrResult {
  text: string;
  pages: OcrPage[];
  confidence: number | null;
  lang: string | null;
  modelUsed: string;
}

export interface ConvertedText {
  resultUri: string;
  byteSize: number;
  checksum: string;
}

export interface OcrText {
  resultUri: string;
  totalPages: number;
  lang: string | null;
  confidence: number | null;
}

export interface ChunkingResult {
  totalChunks: number;
  chunkIds: string[];
}

export type ChunkSelector =
  | { kind: "all" }
  | { kind: "ids"; chunkIds: string[] }
  | { kind: "range"; start: number; end: number };

export interface EmbedPhaseResult {
  /** Chunk population of the whole file, independent of the selector. */
  totalChunks: number;
  embedded: number;
  skipped: number;
}

export interface IntegrationResult {
  activated: number;
  deactivated: number;
  ready: boolean;
  integrityValid: boolean;
}

export interface IndexingRequest {
  projectId: string;
  fileId: string;
  userId: string;
  mimeType: string;
  needsOcr: boolean;
  ocrStrategy: OcrStrategy;
  sourceUri: string;
  estimatedPages?: number;
  estimatedChunks?: number;
}

export interface OrchestrationSummary {
  jobId: string;
  phasesDone: PipelinePhase[];
  jobStatus: JobStatus;
  totalChunks: number;
  totalEmbeddings: number;
  skippedEmbeddings: number;
  creditsUsed: number;
  reservationId: string | null;
}

export interface IndexingJobFailure {
  summary: OrchestrationSummary;
  /** Phase that was executing when the job failed; null when it failed before the first phase. */
  failedPhase: PipelinePhase | null;
  code: string;
  message: string;
}

export interface JobTimelineEntry {
  sequence: number;
  eventType: string;
  phase: PipelinePhase | null;
  progressPct: number | null;
  message: string | null;
  createdAt: Date;
}

export interface JobProgress {
  jobId: string;
  projectId: string;
  fileId: string;
  phase: PipelinePhase;
  status: JobStatus;
  progressPct: number;
  startedAt: Date | null;
  finishedAt: Date | null;
  updatedAt: Date;
  eventCount: number;
  timeline: JobTimelineEntry[];
}
