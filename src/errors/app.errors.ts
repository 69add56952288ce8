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
 * Configuration error - the only error class that is fatal at startup
 */
export class ConfigurationError extends AppError {
  constructor(
    message: string,
    public readonly key?: string,
    cause?: Error,
  ) {
    super(message, "CONFIG_ERROR", cause);
  }
}

/**
 * Network error - thrown when an HTTP or CLOB call fails in transit
 */
export class NetworkError extends AppError {
  constructor(
    message: string,
    public readonly endpoint?: string,
    cause?: Error,
  ) {
    super(message, "NETWORK_ERROR", cause);
  }
}

/**
 * Timeout error - an attempt exceeded its per-attempt deadline
 */
export class TimeoutError extends NetworkError {
  constructor(
    label: string,
    public readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`, label);
  }
}

/**
 * Market data error - a record could not be parsed (data-quality skip)
 */
export class MarketDataError extends AppError {
  constructor(
    message: string,
    public readonly marketId?: string,
    cause?: Error,
  ) {
    super(message, "MARKET_DATA_ERROR", cause);
  }
}

/**
 * Position state error - an illegal hedge state machine transition
 */
export class PositionStateError extends AppError {
  constructor(
    message: string,
    public readonly marketId: string,
  ) {
    super(message, "POSITION_STATE_ERROR");
  }
}
