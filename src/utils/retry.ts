import { emit, TelemetryEvents } from "./telemetry.js";
import { describeError } from "./errors.js";

/**
 * Retry configuration options
 */
export interface RetryConfig {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffFactor: number;
  jitterPercent: number;
}

/**
 * Default retry configuration
 * - 3 attempts total (1 initial + 2 retries)
 * - Exponential backoff: 250ms, 500ms, 1000ms (with jitter)
 * - ±20% jitter to prevent thundering herd
 */
export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  backoffFactor: 2,
  jitterPercent: 20,
};

const RETRYABLE_ERROR_PATTERNS = [
  // Network/timeout errors
  /timeout/i,
  /ETIMEDOUT/i,
  /ECONNRESET/i,
  /ECONNREFUSED/i,
  /socket hang up/i,

  // Rate limit errors
  /rate.?limit/i,
  /too many requests/i,

  // Server overload errors
  /overloaded/i,
  /service unavailable/i,
  /temporarily unavailable/i,
];

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

function statusOf(error: object): number | undefined {
  for (const field of ["status", "statusCode"]) {
    const value: unknown = Reflect.get(error, field);
    if (typeof value === "number") {
      return value;
    }
  }
  return undefined;
}

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  if (typeof error === "object") {
    const status = statusOf(error);
    if (status !== undefined && RETRYABLE_STATUS_CODES.has(status)) {
      return true;
    }
  }

  const message = describeError(error);
  return RETRYABLE_ERROR_PATTERNS.some((pattern) => pattern.test(message));
}

/**
 * Calculate delay with exponential backoff and jitter
 */
export function calculateBackoffDelay(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(config.backoffFactor, attempt - 1);
  const cappedDelay = Math.min(exponentialDelay, config.maxDelayMs);

  const jitterRange = (cappedDelay * config.jitterPercent) / 100;
  const jitter = Math.random() * jitterRange * 2 - jitterRange;

  return Math.max(0, Math.floor(cappedDelay + jitter));
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface RetryContext {
  adapter: string;
  model: string;
  operation: string;
}

/**
 * Execute a function with automatic retries
 *
 * Non-retryable errors are rethrown immediately; the last error is rethrown
 * once attempts are exhausted.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  context: RetryContext,
  config: RetryConfig = DEFAULT_RETRY_CONFIG
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      const result = await fn();

      if (attempt > 1) {
        emit(TelemetryEvents.LlmRetrySuccess, {
          ...context,
          attempt,
          total_attempts: attempt,
        });
      }

      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt >= config.maxAttempts) {
        emit(TelemetryEvents.LlmRetryExhausted, {
          ...context,
          total_attempts: attempt,
          error_message: describeError(error),
        });
        throw error;
      }

      const delay = calculateBackoffDelay(attempt, config);

      emit(TelemetryEvents.LlmRetry, {
        ...context,
        attempt,
        max_attempts: config.maxAttempts,
        delay_ms: delay,
        reason: describeError(error).substring(0, 100),
      });

      await sleep(delay);
    }
  }

  throw lastError;
}
