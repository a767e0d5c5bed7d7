import { Queue } from "bullmq";
import type { ConnectionOptions } from "bullmq";
import type { AnyJobData } from "@profile-rag/types";

export const DLQ_NAME = "profile-rag:dead-letter";

export type DeadLetterJobData = AnyJobData & {
  originalQueue: string;
  originalJobId?: string;
  failureReason: string;
  failedAt: string;
};

export function createDeadLetterQueue(connection: ConnectionOptions) {
  return new Queue<DeadLetterJobData>(DLQ_NAME, {
    connection,
    defaultJobOptions: {
      removeOnComplete: false,
      removeOnFail: false,
    },
  });
}

export type DeadLetterQueue = ReturnType<typeof createDeadLetterQueue>;

/** True once BullMQ will not schedule another attempt for the job. */
export function isFinalAttempt(attemptsMade: number, attempts: number | undefined): boolean {
  return attemptsMade >= (attempts ?? 1);
}
