import { AppError } from "./app-error.js";
import { ProviderError } from "./errors.js";

export interface RetryOptions {
  /** Maximum number of retry attempts. Default: 3 */
  maxRetries?: number;
  /** Base delay in milliseconds before the first retry. Default: 1000 */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds between retries. Default: 10000 */
  maxDelayMs?: number;
  /** Error codes that should be retried. If omitted, all retryable errors are retried. */
  retryableErrors?: string[];
  /** Called before each retry. Defaults to a console warning. */
  onRetry?: (info: { attempt: number; maxRetries: number; delayMs: number; error: unknown }) => void;
}

const DEFAULT_RETRY_OPTIONS: Required<
  Pick<RetryOptions, "maxRetries" | "baseDelayMs" | "maxDelayMs">
> = {
  maxRetries: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 10_000,
};

/** Upstream statuses that are worth another attempt even though they are 4xx. */
const TRANSIENT_UPSTREAM_STATUSES = new Set([408, 429]);

/**
 * Determines whether an error is retryable.
 * Non-operational errors (contract violations, misconfiguration) and client errors (4xx)
 * are NOT retried; provider outages, server errors (5xx) and network errors ARE retried.
 */
export function isRetryable(error: unknown, retryableErrors?: string[]): boolean {
  if (AppError.isAppError(error)) {
    if (!error.isOperational) {
      return false;
    }

    // Never retry client errors (4xx)
    if (error.statusCode >= 400 && error.statusCode < 500) {
      return false;
    }

    // Auth failures and bad requests reported by the provider will not heal on their own
    if (
      error instanceof ProviderError &&
      error.upstreamStatus !== undefined &&
      error.upstreamStatus >= 400 &&
      error.upstreamStatus < 500 &&
      !TRANSIENT_UPSTREAM_STATUSES.has(error.upstreamStatus)
    ) {
      return false;
    }

    // If retryableErrors list is specified, only retry matching codes
    if (retryableErrors && retryableErrors.length > 0) {
      return retryableErrors.includes(error.code);
    }

    return error.statusCode >= 500;
  }

  // Non-AppError errors (e.g. network failures, unexpected errors) are retryable
  // unless a retryableErrors filter is specified
  if (retryableErrors && retryableErrors.length > 0) {
    const code: unknown =
      typeof error === "object" && error !== null ? Reflect.get(error, "code") : undefined;
    return typeof code === "string" && retryableErrors.includes(code);
  }

  return true;
}

/**
 * Calculate delay with exponential backoff and jitter.
 * delay = min(maxDelay, baseDelay * 2^attempt) * random(0.5, 1.0)
 */
function calculateDelay(attempt: number, baseDelayMs: number, maxDelayMs: number): number {
  const exponentialDelay = baseDelayMs * Math.pow(2, attempt);
  const cappedDelay = Math.min(maxDelayMs, exponentialDelay);
  const jitter = 0.5 + Math.random() * 0.5;
  return Math.floor(cappedDelay * jitter);
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function warnRetry(info: { attempt: number; maxRetries: number; delayMs: number }): void {
  console.warn(
    `[retry] Attempt ${String(info.attempt)}/${String(info.maxRetries)} failed, retrying in ${String(info.delayMs)}ms...`,
  );
}

/**
 * Execute a function with retry logic using exponential backoff and jitter.
 * The first failure that is not retryable is rethrown immediately.
 */
export async function withRetry<T>(fn: () => Promise<T>, options?: RetryOptions): Promise<T> {
  const maxRetries = options?.maxRetries ?? DEFAULT_RETRY_OPTIONS.maxRetries;
  const baseDelayMs = options?.baseDelayMs ?? DEFAULT_RETRY_OPTIONS.baseDelayMs;
  const maxDelayMs = options?.maxDelayMs ?? DEFAULT_RETRY_OPTIONS.maxDelayMs;
  const retryableErrors = options?.retryableErrors;
  const onRetry = options?.onRetry ?? warnRetry;

  let lastError: unknown;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      lastError = error;

      if (attempt >= maxRetries) {
        break;
      }

      if (!isRetryable(error, retryableErrors)) {
        break;
      }

      const delayMs = calculateDelay(attempt, baseDelayMs, maxDelayMs);
      onRetry({ attempt: attempt + 1, maxRetries, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw lastError;
}
