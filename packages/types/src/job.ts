export const JOB_STATUSES = ["queued", "running", "completed", "failed", "cancelled"] as const;

export type JobStatus = (typeof JOB_STATUSES)[number];

export const PIPELINE_PHASES = ["convert", "ocr", "chunk", "embed", "integrate", "ready"] as const;

export type PipelinePhase = (typeof PIPELINE_PHASES)[number];

export const JOB_EVENT_TYPES = [
  "job_queued",
  "job_running",
  "phase_started",
  "phase_completed",
  "phase_failed",
  "job_completed",
  "job_failed",
] as const;

export type JobEventType = (typeof JOB_EVENT_TYPES)[number];

export interface IndexingJob {
  jobId: string;
  projectId: string;
  fileId: string;
  userId: string;
  status: JobStatus;
  phaseCurrent: PipelinePhase;
  needsOcr: boolean;
  progressPct: number;
  createdAt: Date;
  startedAt: Date | null;
  completedAt: Date | null;
  failedAt: Date | null;
  cancelledAt: Date | null;
  updatedAt: Date;
}

export interface NewIndexingJob {
  projectId: string;
  fileId: string;
  userId: string;
  needsOcr: boolean;
}

export interface JobEvent {
  eventId: string;
  jobId: string;
  sequence: number;
  eventType: JobEventType;
  phase: PipelinePhase | null;
  progressPct: number | null;
  message: string | null;
  payload: Record<string, unknown>;
  createdAt: Date;
}

export interface NewJobEvent {
  jobId: string;
  eventType: JobEventType;
  phase?: PipelinePhase;
  progressPct?: number;
  message?: string;
  payload?: Record<string, unknown>;
}

export interface JobListOptions {
  limit?: number;
  offset?: number;
}

export type QueueJobType = "index" | "deindex" | "expire-reservations";

export interface IndexFileJobData {
  type: "index";
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

export interface DeindexFileJobData {
  type: "deindex";
  projectId: string;
  fileId: string;
  reason: string;
}

export interface ExpireReservationsJobData {
  type: "expire-reservations";
}

export type AnyQueueJobData = IndexFileJobData | DeindexFileJobData | ExpireReservationsJobData;

export const OCR_STRATEGIES = ["fast", "accurate", "balanced"] as const;

export type OcrStrategy = (typeof OCR_STRATEGIES)[number];
