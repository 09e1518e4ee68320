/**
 * Retry with exponential backoff for flaky HTTP dependencies
 *
 * Only transient failures are retried: network error codes, the usual
 * gateway/rate-limit status codes, and timeout messages. Anything else
 * fails on the first attempt.
 */

export interface RetryConfig {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Base delay for exponential backoff */
  baseDelayMs: number;
  maxDelayMs: number;
  /** Jitter factor (0-1) */
  jitterFactor: number;
}

export const DEFAULT_RETRY_CONFIG: Readonly<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.3,
};

const RETRYABLE_ERROR_CODES = new Set([
  "ECONNRESET",
  "ETIMEDOUT",
  "ECONNREFUSED",
  "ENOTFOUND",
  "ENETUNREACH",
  "EPIPE",
  "EAI_AGAIN",
]);

const RETRYABLE_STATUS_CODES = new Set([
  408, // Request Timeout
  429, // Too Many Requests
  500, // Internal Server Error
  502, // Bad Gateway
  503, // Service Unavailable
  504, // Gateway Timeout
]);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null;

function statusOf(error: Record<string, unknown>): number | undefined {
  const response = error.response;
  if (isRecord(response) && typeof response.status === "number") {
    return response.status;
  }
  if (typeof error.statusCode === "number") return error.statusCode;
  if (typeof error.status === "number") return error.status;
  return undefined;
}

export function isRetryableError(error: unknown): boolean {
  if (!error) return false;

  if (isRecord(error)) {
    if (typeof error.code === "string" && RETRYABLE_ERROR_CODES.has(error.code)) {
      return true;
    }
    const status = statusOf(error);
    if (status !== undefined) {
      return RETRYABLE_STATUS_CODES.has(status);
    }
  }

  const message = (error instanceof Error ? error.message : String(error)).toLowerCase();
  return (
    message.includes("timeout") ||
    message.includes("econnreset") ||
    message.includes("network")
  );
}

/**
 * base * 2^attempt, capped, plus up to jitterFactor of itself
 */
export function calculateBackoff(
  attempt: number,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
): number {
  const { baseDelayMs, maxDelayMs, jitterFactor } = config;
  const exponentialDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  const jitter = exponentialDelay * jitterFactor * Math.random();
  return Math.round(exponentialDelay + jitter);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type RetryResult<T> =
  | { success: true; data: T; attempts: number }
  | { success: false; error: Error; attempts: number };

export async function withRetry<T>(
  fn: () => Promise<T>,
  config: Partial<RetryConfig> = {},
  onRetry?: (attempt: number, error: Error, delayMs: number) => void,
): Promise<RetryResult<T>> {
  const fullConfig: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let attempts = 0;

  for (;;) {
    attempts++;
    try {
      const data = await fn();
      return { success: true, data, attempts };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (!isRetryableError(err) || attempts > fullConfig.maxRetries) {
        return { success: false, error, attempts };
      }

      const delayMs = calculateBackoff(attempts - 1, fullConfig);
      onRetry?.(attempts, error, delayMs);
      await sleep(delayMs);
    }
  }
}
