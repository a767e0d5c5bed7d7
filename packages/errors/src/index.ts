export { AppError, errorMessage } from "./app-error.js";
export type { AppErrorOptions } from "./app-error.js";

export {
  NotFoundError,
  ConflictError,
  ValidationError,
  ConfigurationError,
  ExtractionError,
  ProviderError,
  ContractViolationError,
  PipelineStageError,
} from "./errors.js";

export { withRetry, isRetryable } from "./retry.js";
export type { RetryOptions } from "./retry.js";
