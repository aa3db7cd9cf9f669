import { Worker } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import { parseEnv } from "@indexflow/config";
import { createLogger, type Logger } from "@indexflow/logger";
import {
  QUEUE_NAMES,
  createDeadLetterQueue,
  createQueues,
  parseRedisConnection,
  scheduleReservationExpiry,
  type DeadLetterQueue,
} from "@indexflow/queue";
import type {
  DeindexFileJobData,
  ExpireReservationsJobData,
  IndexFileJobData,
} from "@indexflow/types";
import { buildDependencies, type WorkerDependencies } from "./container.js";
import { processDeindexFile } from "./processors/deindex-file.js";
import { processExpireReservations } from "./processors/expire-reservations.js";
import { processIndexFile } from "./processors/index-file.js";

const RESERVATION_SWEEP_INTERVAL_MS = 5 * 60_000;

function createWorkers(
  connection: ConnectionOptions,
  deps: WorkerDependencies,
  deadLetter: DeadLetterQueue,
  concurrency: number,
  logger: Logger,
): Worker[] {
  const indexWorker = new Worker<IndexFileJobData>(
    QUEUE_NAMES.INDEX,
    async (job) => {
      const outcome = await processIndexFile(job.data, { ...deps, deadLetter, logger });
      return outcome.ok ? outcome.value : outcome.error.summary;
    },
    { connection, concurrency },
  );

  const deindexWorker = new Worker<DeindexFileJobData>(
    QUEUE_NAMES.DEINDEX,
    async (job) => processDeindexFile(job.data, { runInTransaction: deps.runInTransaction, logger }),
    { connection, concurrency: 2 },
  );

  const maintenanceWorker = new Worker<ExpireReservationsJobData>(
    QUEUE_NAMES.MAINTENANCE,
    async () => processExpireReservations({ runInTransaction: deps.runInTransaction, logger }),
    { connection, concurrency: 1 },
  );

  const workers = [indexWorker, deindexWorker, maintenanceWorker];
  for (const worker of workers) {
    worker.on("failed", (job, err) => {
      logger.error({ queue: worker.name, queueJobId: job?.id, err }, "queue job failed");
    });
  }
  return workers;
}

async function main(): Promise<void> {
  const config = parseEnv();
  const logger = createLogger({ level: config.logLevel, service: "indexflow-worker" });
  const connection = parseRedisConnection(config.redis.url);

  const deps = buildDependencies(config, logger);
  const deadLetter = createDeadLetterQueue(connection);
  const queues = createQueues({ connection });
  await scheduleReservationExpiry(queues.maintenanceQueue, RESERVATION_SWEEP_INTERVAL_MS);

  const workers = createWorkers(connection, deps, deadLetter, config.worker.concurrency, logger);

  logger.info(
    { queues: Object.values(QUEUE_NAMES), concurrency: config.worker.concurrency },
    `started ${String(workers.length)} workers`,
  );

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "shutting down");
    await Promise.all(workers.map((w) => w.close()));
    await Promise.all([
      deadLetter.close(),
      queues.indexQueue.close(),
      queues.deindexQueue.close(),
      queues.maintenanceQueue.close(),
    ]);
    await deps.dbClient.close();
    logger.info("all workers closed");
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((err: unknown) => {
      logger.error({ err }, "shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGTERM", () => onSignal("SIGTERM"));
  process.on("SIGINT", () => onSignal("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("[worker] Fatal error:", err);
  process.exit(1);
});
