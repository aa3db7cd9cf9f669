import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyQueueJobData, IndexingJobFailure } from "@indexflow/types";

export const DLQ_NAME = "indexflow:dead-letter";

export type DeadLetterEntry = AnyQueueJobData & {
  originalQueue: string;
  failureReason: string;
  /** Present when the orchestrator recorded the failure on a job. */
  failure?: IndexingJobFailure;
};

/** The part of the dead-letter queue producers use. */
export interface DeadLetterSink {
  add(name: string, data: DeadLetterEntry): Promise<unknown>;
}

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterEntry>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;
