import type { JobStatus } from "@indexflow/types";
import { assertNever } from "@indexflow/types";

export interface StatusStamp {
  startedAt?: Date;
  completedAt?: Date;
  failedAt?: Date;
  cancelledAt?: Date;
}

/** Timestamp column set when a job enters `status`. */
export function stampForStatus(status: JobStatus, now: Date): StatusStamp {
  switch (status) {
    case "queued":
      return {};
    case "running":
      return { startedAt: now };
    case "completed":
      return { completedAt: now };
    case "failed":
      return { failedAt: now };
    case "cancelled":
      return { cancelledAt: now };
    default:
      return assertNever(status);
  }
}

export function activeJobConflictMessage(fileId: string): string {
  return `File ${fileId} already has a queued or running indexing job`;
}
