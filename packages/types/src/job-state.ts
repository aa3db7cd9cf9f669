import type { JobStatus, PipelinePhase } from "./job.js";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  queued: ["running", "failed", "cancelled"],
  running: ["completed", "failed", "cancelled"],
  completed: [],
  failed: [],
  cancelled: [],
};

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalStatus(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

export function isActiveStatus(status: JobStatus): boolean {
  return status === "queued" || status === "running";
}

/**
 * Progress reported for a job whose last persisted phase is `phase`.
 */
export function progressForPhase(phase: PipelinePhase): number {
  switch (phase) {
    case "convert":
      return 15;
    case "ocr":
      return 35;
    case "chunk":
      return 55;
    case "embed":
      return 75;
    case "integrate":
      return 90;
    case "ready":
      return 100;
    default:
      return assertNever(phase);
  }
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled value: ${String(value)}`);
}
