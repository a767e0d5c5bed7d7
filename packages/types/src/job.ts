export type JobType = "ingest";

export interface JobData {
  type: JobType;
}

export interface IngestJobData extends JobData {
  type: "ingest";
  /** Overrides the configured source directories for this run. */
  sourceDirs?: string[];
  collectionName?: string;
  requestedBy?: string;
}

export type AnyJobData = IngestJobData;

export interface JobResult {
  success: boolean;
  processedAt: Date;
  duration: number;
  error?: string;
  metrics?: Record<string, number>;
}
