/**
 * Retry / backoff policy shared by every network-facing collaborator.
 *
 * Delay before attempt n+1 is `baseDelayMs * exponentialBase^(n-1)`, capped
 * at `maxDelayMs`. Each attempt runs under its own `timeoutMs` deadline.
 * Only errors that `parseError` marks recoverable are retried.
 */

import { TimeoutError } from "../errors/app.errors";
import type { Logger } from "../utils/logger.util";
import { formatErrorForLog, parseError } from "./error-handling";

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  exponentialBase: number;
  /** Per-attempt deadline; 0 disables it */
  timeoutMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 250,
  maxDelayMs: 5000,
  exponentialBase: 2,
  timeoutMs: 5000,
};

export interface RetryOptions {
  label: string;
  logger?: Logger;
  shouldRetry?: (error: unknown) => boolean;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function createRetryPolicy(
  overrides: Partial<RetryPolicy> = {},
): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/**
 * Backoff delay for the given (1-based) failed attempt
 */
export function backoffDelay(policy: RetryPolicy, attempt: number): number {
  const raw =
    policy.baseDelayMs * Math.pow(policy.exponentialBase, Math.max(0, attempt - 1));
  return Math.min(raw, policy.maxDelayMs);
}

/**
 * Race a promise against a deadline. The timer is always cleared.
 */
export async function withTimeout<T>(
  fn: () => Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  if (timeoutMs <= 0) return fn();

  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([fn(), deadline]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  policy: RetryPolicy,
  options: RetryOptions,
): Promise<T> {
  const { label, logger } = options;
  const shouldRetry =
    options.shouldRetry ?? ((error: unknown) => parseError(error).recoverable);
  const wait = options.sleep ?? sleep;
  const attempts = Math.max(1, policy.maxAttempts);

  let lastError: unknown;
  for (let attempt = 1; attempt <= attempts; attempt += 1) {
    try {
      return await withTimeout(fn, policy.timeoutMs, label);
    } catch (err) {
      lastError = err;
      if (attempt === attempts || !shouldRetry(err)) {
        break;
      }
      const delay = backoffDelay(policy, attempt);
      logger?.warn(
        `[Retry] ${label} attempt ${attempt}/${attempts} failed (${formatErrorForLog(err, 200)}); retrying in ${delay}ms`,
      );
      await wait(delay);
    }
  }
  throw lastError;
}
