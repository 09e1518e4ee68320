/**
 * Base application error class
 */
export class AppError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Configuration error - thrown once at startup with every invalid field.
 * The process must not proceed past it.
 */
export class ConfigInvalidError extends AppError {
  constructor(public readonly errors: string[]) {
    super(
      `Invalid configuration (${errors.length} problem${errors.length === 1 ? "" : "s"}): ${errors.join("; ")}`,
      "CONFIG_INVALID",
    );
  }
}

/**
 * Circuit open - the dependency is cooling down, the call was never made
 */
export class CircuitOpenError extends AppError {
  constructor(
    public readonly dependency: string,
    public readonly retryAt: number,
  ) {
    super(
      `Circuit open for ${dependency} until ${new Date(retryAt).toISOString()}`,
      "CIRCUIT_OPEN",
    );
  }
}

/**
 * Executor reported a failed order
 */
export class ExecutionFailedError extends AppError {
  constructor(
    message: string,
    public readonly marketId?: string,
    cause?: Error,
  ) {
    super(message, "EXECUTION_FAILED", cause);
  }
}

/**
 * External call did not settle within its time budget
 */
export class DependencyTimeoutError extends AppError {
  constructor(
    public readonly dependency: string,
    public readonly timeoutMs: number,
  ) {
    super(`${dependency} timed out after ${timeoutMs}ms`, "DEPENDENCY_TIMEOUT");
  }
}

/**
 * Ledger refused to commit a position that would break a hard cap
 */
export class LimitExceededError extends AppError {
  constructor(
    message: string,
    public readonly limit:
      | "MAX_POSITIONS"
      | "PER_MARKET_LIMIT"
      | "CONCENTRATION"
      | "INVALID_ORDER",
  ) {
    super(message, "LIMIT_EXCEEDED");
  }
}

/**
 * A price, amount or estimate that is not a usable finite number
 */
export class InvalidValueError extends AppError {
  constructor(
    public readonly field: string,
    public readonly value: number,
    detail?: string,
  ) {
    super(`Invalid ${field}: ${value}${detail ? ` (${detail})` : ""}`, "INVALID_VALUE");
  }
}

export class PositionNotFoundError extends AppError {
  constructor(public readonly positionId: string) {
    super(`No open position ${positionId}`, "POSITION_NOT_FOUND");
  }
}

/**
 * Render any thrown value for a log line
 */
export function formatError(err: unknown): string {
  if (err instanceof AppError && err.code) {
    return `${err.code}: ${err.message}`;
  }
  return err instanceof Error ? err.message : String(err);
}
