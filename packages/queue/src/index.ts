export {
  QUEUE_NAMES,
  EXPIRE_RESERVATIONS_JOB,
  createQueues,
  scheduleReservationExpiry,
  type QueueConfig,
  type QueueName,
  type Queues,
} from "./queues.js";
export {
  DLQ_NAME,
  createDeadLetterQueue,
  type DeadLetterEntry,
  type DeadLetterQueue,
  type DeadLetterSink,
} from "./dlq.js";
export { parseRedisConnection } from "./connection.js";
