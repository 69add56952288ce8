/**
 * Error Handling - classification of failures seen by the scan pipeline
 *
 * Error Taxonomy:
 * - RATE_LIMITED: 429 / "too many requests" (transient, retried)
 * - TIMEOUT: an attempt exceeded its deadline (transient, retried)
 * - NETWORK_ERROR: connectivity failures (transient, retried)
 * - HTTP_5XX: upstream server errors (transient, retried)
 * - HTTP_4XX: malformed request or missing resource
 * - INVALID_ORDERBOOK: orderbook missing or empty (data quality)
 * - INVALID_MARKET_DATA: unparsable snapshot fields (data quality)
 * - INSUFFICIENT_BALANCE, BELOW_MINIMUM_SIZE, INVALID_SIGNATURE,
 *   PRICE_OUT_OF_RANGE, MARKET_CLOSED: execution rejections
 * - CONFIGURATION: bad configuration (fatal at startup only)
 * - UNKNOWN: unclassified
 */

import {
  AppError,
  ConfigurationError,
  MarketDataError,
  NetworkError,
  TimeoutError,
} from "../errors/app.errors";

export enum ErrorCode {
  RATE_LIMITED = "RATE_LIMITED",
  TIMEOUT = "TIMEOUT",
  NETWORK_ERROR = "NETWORK_ERROR",
  HTTP_5XX = "HTTP_5XX",
  HTTP_4XX = "HTTP_4XX",

  INVALID_ORDERBOOK = "INVALID_ORDERBOOK",
  INVALID_MARKET_DATA = "INVALID_MARKET_DATA",

  INSUFFICIENT_BALANCE = "INSUFFICIENT_BALANCE",
  BELOW_MINIMUM_SIZE = "BELOW_MINIMUM_SIZE",
  INVALID_SIGNATURE = "INVALID_SIGNATURE",
  PRICE_OUT_OF_RANGE = "PRICE_OUT_OF_RANGE",
  MARKET_CLOSED = "MARKET_CLOSED",

  CONFIGURATION = "CONFIGURATION",
  UNKNOWN = "UNKNOWN",
}

export type ErrorCategory =
  | "transient"
  | "data_quality"
  | "execution"
  | "configuration"
  | "unknown";

export interface ParsedError {
  code: ErrorCode;
  category: ErrorCategory;
  message: string;
  recoverable: boolean;
  retryAfterMs?: number;
}

/**
 * Structured reasons an execution gateway may report for a rejected order
 */
export type RejectionReason =
  | "insufficient_balance"
  | "below_minimum_size"
  | "invalid_signature"
  | "price_out_of_range"
  | "market_closed"
  | "rate_limited"
  | "unknown";

const SENSITIVE_KEYS = new Set<string>([
  "authorization",
  "cookie",
  "x-api-key",
  "api-key",
  "apikey",
  "secret",
  "passphrase",
  "password",
  "signature",
  "poly_signature",
  "poly_api_key",
  "poly_passphrase",
  "private-key",
  "privatekey",
]);

/**
 * Safely convert an unknown error to a string. Never throws.
 */
function safeErrorToString(error: unknown): string {
  if (!error) return "";
  if (typeof error === "string") return error;
  if (error instanceof Error) return error.message;
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}

function redactSensitiveData(
  value: unknown,
  seen: WeakSet<object> = new WeakSet(),
): unknown {
  if (value === null || typeof value !== "object") {
    return value;
  }
  if (seen.has(value)) {
    return "[Circular]";
  }
  seen.add(value);

  if (Array.isArray(value)) {
    return value.map((item: unknown) => redactSensitiveData(item, seen));
  }

  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }

  const redacted: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    const lowerKey = key.toLowerCase();
    const sensitive =
      SENSITIVE_KEYS.has(lowerKey) ||
      lowerKey.includes("secret") ||
      lowerKey.includes("passphrase") ||
      lowerKey.includes("private");
    redacted[key] = sensitive ? "[REDACTED]" : redactSensitiveData(val, seen);
  }
  return redacted;
}

function redactSensitiveInString(message: string): string {
  const patterns: RegExp[] = [
    /(Authorization)\s*:\s*([^\r\n]+)/gi,
    /\b(api[-_\s]*key)\s*[:=]\s*([^\s&"']+)/gi,
    /\b(secret|passphrase|password)\s*[:=]\s*([^\s&"']+)/gi,
    /\b(POLY_SIGNATURE|POLY_API_KEY|POLY_PASSPHRASE)\s*[:=]\s*([^\s&"']+)/gi,
    /\b(private[-_]?key)\s*[:=]\s*([^\s&"']+)/gi,
  ];
  let result = message;
  for (const pattern of patterns) {
    result = result.replace(pattern, (_match, p1: string) => `${p1}: [REDACTED]`);
  }
  return result;
}

/**
 * Check if an error is a rate limit error
 */
export function isRateLimited(error: unknown): boolean {
  if (!error) return false;
  const lower = safeErrorToString(error).toLowerCase();
  return (
    lower.includes("429") ||
    lower.includes("rate limit") ||
    lower.includes("too many requests")
  );
}

/**
 * True when a failed order submission never reached the exchange: a
 * rate-limit answer, or a connection that was never opened. Any other failure
 * may have landed and must not be resent.
 */
export function isSafeToResend(error: unknown): boolean {
  if (error instanceof TimeoutError) return false;
  if (isRateLimited(error)) return true;
  const lower = safeErrorToString(error).toLowerCase();
  return (
    lower.includes("econnrefused") ||
    lower.includes("enotfound") ||
    lower.includes("eai_again")
  );
}

/**
 * Map a gateway error message to a structured rejection reason
 */
export function toRejectionReason(message: string): RejectionReason {
  const lower = message.toLowerCase();
  if (
    lower.includes("not enough balance") ||
    lower.includes("insufficient balance") ||
    lower.includes("insufficient funds") ||
    lower.includes("allowance")
  ) {
    return "insufficient_balance";
  }
  if (
    lower.includes("lower than the minimum") ||
    lower.includes("below minimum") ||
    lower.includes("min size") ||
    lower.includes("minimum order")
  ) {
    return "below_minimum_size";
  }
  if (lower.includes("invalid signature") || lower.includes("unauthorized")) {
    return "invalid_signature";
  }
  if (
    lower.includes("price out of range") ||
    lower.includes("invalid price") ||
    lower.includes("outside price bounds")
  ) {
    return "price_out_of_range";
  }
  if (
    lower.includes("market closed") ||
    lower.includes("market is closed") ||
    lower.includes("not accepting orders") ||
    lower.includes("resolved")
  ) {
    return "market_closed";
  }
  if (isRateLimited(message)) {
    return "rate_limited";
  }
  return "unknown";
}

const REJECTION_CODES: Record<RejectionReason, ErrorCode> = {
  insufficient_balance: ErrorCode.INSUFFICIENT_BALANCE,
  below_minimum_size: ErrorCode.BELOW_MINIMUM_SIZE,
  invalid_signature: ErrorCode.INVALID_SIGNATURE,
  price_out_of_range: ErrorCode.PRICE_OUT_OF_RANGE,
  market_closed: ErrorCode.MARKET_CLOSED,
  rate_limited: ErrorCode.RATE_LIMITED,
  unknown: ErrorCode.UNKNOWN,
};

/**
 * Parse error and return structured information
 */
export function parseError(error: unknown): ParsedError {
  const errorStr = safeErrorToString(error);
  const lower = errorStr.toLowerCase();

  if (error instanceof ConfigurationError) {
    return {
      code: ErrorCode.CONFIGURATION,
      category: "configuration",
      message: errorStr,
      recoverable: false,
    };
  }

  if (error instanceof TimeoutError) {
    return {
      code: ErrorCode.TIMEOUT,
      category: "transient",
      message: errorStr,
      recoverable: true,
      retryAfterMs: 1000,
    };
  }

  if (error instanceof MarketDataError) {
    return {
      code: lower.includes("orderbook")
        ? ErrorCode.INVALID_ORDERBOOK
        : ErrorCode.INVALID_MARKET_DATA,
      category: "data_quality",
      message: errorStr,
      recoverable: false,
    };
  }

  if (isRateLimited(error)) {
    return {
      code: ErrorCode.RATE_LIMITED,
      category: "transient",
      message: "Rate limit exceeded.",
      recoverable: true,
      retryAfterMs: 5000,
    };
  }

  if (
    lower.includes("timeout") ||
    lower.includes("timed out") ||
    lower.includes("etimedout") ||
    lower.includes("econnaborted")
  ) {
    return {
      code: ErrorCode.TIMEOUT,
      category: "transient",
      message: "Request timed out.",
      recoverable: true,
      retryAfterMs: 1000,
    };
  }

  if (
    error instanceof NetworkError ||
    lower.includes("econnrefused") ||
    lower.includes("econnreset") ||
    lower.includes("enotfound") ||
    lower.includes("socket hang up") ||
    lower.includes("network error") ||
    lower.includes("fetch failed")
  ) {
    return {
      code: ErrorCode.NETWORK_ERROR,
      category: "transient",
      message: "Network connection error.",
      recoverable: true,
      retryAfterMs: 2000,
    };
  }

  if (
    lower.includes("no orderbook") ||
    lower.includes("orderbook not found") ||
    lower.includes("invalid orderbook")
  ) {
    return {
      code: ErrorCode.INVALID_ORDERBOOK,
      category: "data_quality",
      message: "Orderbook unavailable or invalid.",
      recoverable: false,
    };
  }

  if (
    /\b50[0234]\b/.test(errorStr) ||
    lower.includes("internal server error") ||
    lower.includes("bad gateway") ||
    lower.includes("service unavailable")
  ) {
    return {
      code: ErrorCode.HTTP_5XX,
      category: "transient",
      message: "Server error. The API may be temporarily unavailable.",
      recoverable: true,
      retryAfterMs: 5000,
    };
  }

  const rejection = toRejectionReason(errorStr);
  if (rejection !== "unknown") {
    return {
      code: REJECTION_CODES[rejection],
      category: "execution",
      message: errorStr,
      recoverable: false,
    };
  }

  if (
    /\b40[04]\b/.test(errorStr) ||
    lower.includes("bad request") ||
    lower.includes("not found")
  ) {
    return {
      code: ErrorCode.HTTP_4XX,
      category: "unknown",
      message: "API request failed. The request may be malformed or the resource not found.",
      recoverable: false,
    };
  }

  return {
    code: ErrorCode.UNKNOWN,
    category: error instanceof AppError ? "execution" : "unknown",
    message: errorStr || "Unknown error occurred",
    recoverable: false,
  };
}

/**
 * Format error for logging (strips sensitive data, limits length)
 */
export function formatErrorForLog(error: unknown, maxLength = 500): string {
  if (!error) return "Unknown error";

  let errorStr: string;
  if (typeof error === "string") {
    errorStr = redactSensitiveInString(error);
  } else if (error instanceof Error) {
    errorStr = redactSensitiveInString(`${error.name}: ${error.message}`);
  } else {
    try {
      errorStr = redactSensitiveInString(JSON.stringify(redactSensitiveData(error)));
    } catch {
      errorStr = redactSensitiveInString(String(error));
    }
  }

  if (errorStr.length > maxLength) {
    errorStr = errorStr.substring(0, maxLength) + "... (truncated)";
  }
  return errorStr;
}
