import "dotenv/config";
import { UnrecoverableError, Worker } from "bullmq";
import type { IngestJobData, JobResult } from "@profile-rag/types";
import { AppError, errorMessage } from "@profile-rag/errors";
import { createLogger } from "@profile-rag/logger";
import {
  QUEUE_NAMES,
  createDeadLetterQueue,
  isFinalAttempt,
  parseRedisConnection,
} from "@profile-rag/queue";
import { createContainer, loadConfig } from "./container.js";
import { processIngest } from "./processors/ingest.js";

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel, service: "profile-rag-worker" });
  const container = createContainer(config, logger);
  const connection = parseRedisConnection(config.redis.url);
  const deadLetters = createDeadLetterQueue(connection);

  // One job at a time: concurrent runs on one collection are not coordinated
  const worker = new Worker<IngestJobData, JobResult>(
    QUEUE_NAMES.INGEST,
    async (job) => {
      try {
        return await processIngest(job.data, container, job.id);
      } catch (err) {
        if (AppError.isAppError(err) && !err.isOperational) {
          throw new UnrecoverableError(err.message);
        }
        throw err;
      }
    },
    { connection, concurrency: 1 },
  );

  worker.on("completed", (job, result) => {
    logger.info({ jobId: job.id, metrics: result.metrics }, "Ingest job completed");
  });

  worker.on("failed", (job, err) => {
    if (!job) {
      logger.error({ err: err.message }, "Ingest job failed");
      return;
    }

    const final = isFinalAttempt(job.attemptsMade, job.opts.attempts) || err instanceof UnrecoverableError;
    logger.error(
      { jobId: job.id, attemptsMade: job.attemptsMade, final, err: err.message },
      "Ingest job failed",
    );
    if (!final) return;

    deadLetters
      .add("dead-letter", {
        ...job.data,
        originalQueue: QUEUE_NAMES.INGEST,
        originalJobId: job.id,
        failureReason: err.message,
        failedAt: new Date().toISOString(),
      })
      .catch((dlqErr: unknown) => {
        logger.error({ jobId: job.id, err: errorMessage(dlqErr) }, "Could not move job to dead-letter queue");
      });
  });

  logger.info({ queue: QUEUE_NAMES.INGEST }, "Worker started");

  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await worker.close();
    await deadLetters.close();
    logger.info("Worker closed");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown());
  process.on("SIGINT", () => void shutdown());
}

main().catch((err: unknown) => {
  console.error("[worker] Fatal error:", errorMessage(err));
  process.exit(1);
});
