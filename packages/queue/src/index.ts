export {
  QUEUE_NAMES,
  INGEST_JOB_OPTIONS,
  createIngestQueue,
  parseRedisConnection,
} from "./queues.js";
export type { IngestQueue } from "./queues.js";
export { DLQ_NAME, createDeadLetterQueue, isFinalAttempt } from "./dlq.js";
export type { DeadLetterJobData, DeadLetterQueue } from "./dlq.js";
