import type { IngestionStage } from "@profile-rag/types";
import { AppError, errorMessage } from "./app-error.js";

interface ErrorExtras {
  details?: Record<string, unknown>;
  cause?: unknown;
}

export class NotFoundError extends AppError {
  constructor(message = "Resource not found", options?: ErrorExtras) {
    super({ message, statusCode: 404, code: "NOT_FOUND", ...options });
  }
}

export class ConflictError extends AppError {
  constructor(message = "Conflict", code = "CONFLICT", options?: ErrorExtras) {
    super({ message, statusCode: 409, code, ...options });
  }
}

export class ValidationError extends AppError {
  public readonly fields: Record<string, string>;

  constructor(message = "Validation error", fields: Record<string, string> = {}, options?: ErrorExtras) {
    super({ message, statusCode: 400, code: "VALIDATION_ERROR", ...options });
    this.fields = fields;
  }
}

export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", options?: ErrorExtras) {
    super({ message, statusCode: 500, code: "CONFIGURATION_ERROR", isOperational: false, ...options });
  }
}

/** A single file could not be turned into text (corrupt, binary, unsupported encoding). */
export class ExtractionError extends AppError {
  public readonly filePath: string;

  constructor(filePath: string, message = "Extraction failed", options?: ErrorExtras) {
    super({ message, statusCode: 422, code: "EXTRACTION_FAILED", ...options });
    this.filePath = filePath;
  }
}

/**
 * A remote provider call failed (network, auth, quota, server error).
 * `upstreamStatus` carries the HTTP status reported by the provider, when known.
 */
export class ProviderError extends AppError {
  public readonly service: string;
  public readonly upstreamStatus?: number;

  constructor(
    message = "Provider call failed",
    service: string,
    options?: ErrorExtras & { upstreamStatus?: number },
  ) {
    super({
      message,
      statusCode: 502,
      code: "PROVIDER_ERROR",
      details: { service, ...options?.details, upstreamStatus: options?.upstreamStatus },
      cause: options?.cause,
    });
    this.service = service;
    this.upstreamStatus = options?.upstreamStatus;
  }

  /** Wrap an arbitrary thrown value, keeping AppErrors untouched. */
  static wrap(err: unknown, service: string, action: string): AppError {
    if (AppError.isAppError(err)) return err;
    return new ProviderError(`${service} ${action} failed: ${errorMessage(err)}`, service, {
      cause: err,
      upstreamStatus: extractStatus(err),
    });
  }
}

/** The provider answered, but with data that breaks its contract. Never retried. */
export class ContractViolationError extends AppError {
  public readonly service: string;

  constructor(message: string, service: string, options?: ErrorExtras) {
    super({
      message,
      statusCode: 502,
      code: "CONTRACT_VIOLATION",
      isOperational: false,
      details: { service, ...options?.details },
      cause: options?.cause,
    });
    this.service = service;
  }
}

export class PipelineStageError extends AppError {
  public readonly stage: IngestionStage;

  constructor(stage: IngestionStage, cause: unknown) {
    const inner = AppError.isAppError(cause) ? cause : undefined;
    super({
      message: `${stage} stage failed: ${errorMessage(cause)}`,
      statusCode: 500,
      code: "PIPELINE_STAGE_FAILED",
      isOperational: inner?.isOperational ?? true,
      details: { stage, causeCode: inner?.code },
      cause,
    });
    this.stage = stage;
  }
}

function extractStatus(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  for (const key of ["status", "statusCode"]) {
    const value: unknown = Reflect.get(err, key);
    if (typeof value === "number") return value;
  }
  return undefined;
}
