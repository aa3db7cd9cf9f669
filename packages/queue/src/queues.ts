import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type {
  DeindexFileJobData,
  ExpireReservationsJobData,
  IndexFileJobData,
} from "@indexflow/types";

export const QUEUE_NAMES = {
  INDEX: "indexflow:index",
  DEINDEX: "indexflow:deindex",
  MAINTENANCE: "indexflow:maintenance",
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

export const EXPIRE_RESERVATIONS_JOB = "expire-reservations";

export interface QueueConfig {
  connection: ConnectionOptions;
}

export function createQueues(config: QueueConfig) {
  const defaultOpts = {
    connection: config.connection,
    defaultJobOptions: {
      attempts: 3,
      backoff: {
        type: "exponential" as const,
        delay: 1000,
      },
      removeOnComplete: { count: 1000 },
      removeOnFail: { count: 5000 },
    },
  };

  const indexQueue = new Queue<IndexFileJobData>(QUEUE_NAMES.INDEX, defaultOpts);

  const deindexQueue = new Queue<DeindexFileJobData>(QUEUE_NAMES.DEINDEX, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      priority: 1, // ahead of new indexing work
    },
  });

  const maintenanceQueue = new Queue<ExpireReservationsJobData>(QUEUE_NAMES.MAINTENANCE, {
    ...defaultOpts,
    defaultJobOptions: {
      ...defaultOpts.defaultJobOptions,
      attempts: 1,
    },
  });

  return { indexQueue, deindexQueue, maintenanceQueue };
}

export type Queues = ReturnType<typeof createQueues>;

/**
 * Registers the repeating sweep that releases reservations past their TTL.
 * Re-registering with the same interval is a no-op.
 */
export async function scheduleReservationExpiry(
  queue: Queues["maintenanceQueue"],
  everyMs: number,
): Promise<void> {
  await queue.add(
    EXPIRE_RESERVATIONS_JOB,
    { type: "expire-reservations" },
    { repeat: { every: everyMs }, jobId: EXPIRE_RESERVATIONS_JOB },
  );
}
