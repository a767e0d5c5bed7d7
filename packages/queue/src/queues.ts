import { Queue } from "bullmq";
import type { ConnectionOptions, JobsOptions } from "bullmq";
import type { IngestJobData } from "@profile-rag/types";

export const QUEUE_NAMES = {
  INGEST: "profile-rag:ingest",
} as const;

export const INGEST_JOB_OPTIONS: JobsOptions = {
  attempts: 3,
  backoff: {
    type: "exponential",
    delay: 1000,
  },
  removeOnComplete: { count: 1000 },
  removeOnFail: { count: 5000 },
};

export function createIngestQueue(connection: ConnectionOptions) {
  return new Queue<IngestJobData>(QUEUE_NAMES.INGEST, {
    connection,
    defaultJobOptions: INGEST_JOB_OPTIONS,
  });
}

export type IngestQueue = ReturnType<typeof createIngestQueue>;

/** `redis://[:password@]host[:port]` to BullMQ connection options. */
export function parseRedisConnection(url: string): ConnectionOptions {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port) || 6379,
    password: parsed.password ? decodeURIComponent(parsed.password) : undefined,
    username: parsed.username ? decodeURIComponent(parsed.username) : undefined,
  };
}
