/**
 * Shared error types for LLM adapter failures
 */

export type LLMProviderName = "anthropic" | "openai" | "fixtures";

/**
 * Thrown when an LLM call exceeds its per-call budget.
 */
export class UpstreamTimeoutError extends Error {
  readonly name = "UpstreamTimeoutError";

  constructor(
    message: string,
    public readonly provider: LLMProviderName,
    public readonly operation: string,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
  }
}

/**
 * Thrown when a provider API answers with a non-2xx status.
 *
 * `status` is read by the retry classifier.
 */
export class UpstreamHTTPError extends Error {
  readonly name = "UpstreamHTTPError";

  constructor(
    message: string,
    public readonly provider: LLMProviderName,
    public readonly status: number,
    public readonly code: string | undefined,
    public readonly elapsedMs: number,
    public readonly cause?: unknown
  ) {
    super(message);
  }
}

/**
 * Thrown when a provider answers but the content is empty or unusable.
 */
export class UpstreamContentError extends Error {
  readonly name = "UpstreamContentError";

  constructor(
    message: string,
    public readonly provider: LLMProviderName,
    public readonly operation: string
  ) {
    super(message);
  }
}

function numericField(error: object, field: string): number | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "number" ? value : undefined;
}

function stringField(error: object, field: string): string | undefined {
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}

/**
 * Map an SDK failure onto the shared upstream error types.
 *
 * Both provider SDKs raise an `APIError` carrying `status`, and an abort
 * from our own timer surfaces as `AbortError` or `APIUserAbortError`.
 */
export function classifyUpstreamError(
  error: unknown,
  provider: LLMProviderName,
  operation: string,
  elapsedMs: number
): Error {
  if (!(error instanceof Error)) {
    return new Error(`${provider} ${operation} failed: ${String(error)}`);
  }

  const isAbort =
    error.name === "AbortError" ||
    error.name === "APIUserAbortError" ||
    error.name === "APIConnectionTimeoutError";
  if (isAbort) {
    return new UpstreamTimeoutError(
      `${provider} ${operation} timed out after ${elapsedMs}ms`,
      provider,
      operation,
      elapsedMs,
      error
    );
  }

  const status = numericField(error, "status");
  if (status !== undefined && status >= 400) {
    return new UpstreamHTTPError(
      `${provider} ${operation} failed: ${error.message || "unknown error"}`,
      provider,
      status,
      stringField(error, "code") ?? stringField(error, "type"),
      elapsedMs,
      error
    );
  }

  return error;
}
