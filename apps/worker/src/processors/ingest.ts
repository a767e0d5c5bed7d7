import type { IngestJobData, JobResult } from "@profile-rag/types";
import { ValidationError } from "@profile-rag/errors";
import { runIngestion, type Container } from "../container.js";

/**
 * Ingest job processor.
 *
 * Runs one ingestion over the configured (or job-supplied) directories. A failed
 * run is thrown as its PipelineStageError so BullMQ records and retries it; an
 * empty run completes normally.
 */
export async function processIngest(
  data: IngestJobData,
  container: Container,
  jobId?: string,
): Promise<JobResult> {
  if (data.type !== "ingest") {
    throw new ValidationError(`Unsupported job type: ${String(data.type)}`, { type: "must be 'ingest'" });
  }

  container.logger.info(
    { jobId, requestedBy: data.requestedBy, sourceDirs: data.sourceDirs },
    "Processing ingest job",
  );

  const outcome = await runIngestion(
    container,
    { sourceDirs: data.sourceDirs, collectionName: data.collectionName },
    jobId,
  );

  if (outcome.status === "failed") {
    throw outcome.error;
  }

  return {
    success: true,
    processedAt: new Date(),
    duration: outcome.durationMs,
    metrics:
      outcome.status === "success"
        ? {
            documents: outcome.documentCount,
            chunks: outcome.chunkCount,
            points: outcome.pointCount,
            vectorSize: outcome.vectorSize,
          }
        : { documents: outcome.documentCount, chunks: 0, points: 0 },
  };
}
