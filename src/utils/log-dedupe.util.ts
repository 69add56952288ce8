/**
 * Log Deduplication Middleware
 *
 * A scan loop ticking every couple of seconds repeats the same lines for
 * every market. Messages are normalised (prices, durations, timestamps and
 * ids replaced with stable tokens) and identical lines are suppressed for a
 * level-specific TTL; the next emitted line reports how many were dropped.
 */

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LogDedupeConfig {
  enabled: boolean;
  debugTtlMs: number;
  infoTtlMs: number;
  warnTtlMs: number;
  /** Errors are rate limited, not hidden for long */
  errorTtlMs: number;
  maxCacheSize: number;
}

interface DedupeEntry {
  firstSeen: number;
  suppressedCount: number;
}

export interface DedupeResult {
  emit: boolean;
  suffix?: string;
}

function getDefaultConfig(): LogDedupeConfig {
  const parseEnvInt = (key: string, defaultValue: number): number => {
    const value = process.env[key];
    if (!value) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) ? defaultValue : parsed;
  };
  const enabledRaw = process.env.LOG_DEDUPE_ENABLED?.toLowerCase();

  return {
    enabled: enabledRaw !== "false" && enabledRaw !== "0",
    debugTtlMs: parseEnvInt("LOG_DEDUPE_DEBUG_TTL_MS", 60000),
    infoTtlMs: parseEnvInt("LOG_DEDUPE_INFO_TTL_MS", 30000),
    warnTtlMs: parseEnvInt("LOG_DEDUPE_WARN_TTL_MS", 20000),
    errorTtlMs: parseEnvInt("LOG_DEDUPE_ERROR_TTL_MS", 10000),
    maxCacheSize: parseEnvInt("LOG_DEDUPE_MAX_CACHE_SIZE", 5000),
  };
}

/**
 * Replace dynamic fragments with stable tokens so that lines differing only
 * in prices, timings or ids collapse to one key.
 */
export function normalizeMessage(message: string): string {
  return message
    .replace(
      /\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:?\d{2})?/g,
      "TIME",
    )
    .replace(/\b\d{10,13}\b/g, "TIMESTAMP")
    .replace(/0x[a-fA-F0-9]{16,}/g, "0x…")
    .replace(/\b\d+(?:\.\d+)?(ms|s|min|h)\b/g, "X$1")
    .replace(/-?\b\d+(?:\.\d+)?%/g, "X%")
    .replace(/\$-?\d+(?:\.\d+)?/g, "$X")
    .replace(/-?\b\d+\.\d+\b/g, "X.X")
    .replace(/\b\d{8,}\b/g, "…");
}

/**
 * Extract module tag from message prefix like [ScanLoop] or [RiskGuard]
 */
export function extractModuleTag(message: string): string {
  const match = message.match(/^\[([^\]]+)\]/);
  return match ? match[1] : "GLOBAL";
}

export class LogDedupeMiddleware {
  private config: LogDedupeConfig;
  // Map iteration order doubles as LRU order
  private readonly cache = new Map<string, DedupeEntry>();
  private readonly now: () => number;

  constructor(
    config: Partial<LogDedupeConfig> = {},
    now: () => number = Date.now,
  ) {
    this.config = { ...getDefaultConfig(), ...config };
    this.now = now;
  }

  private createKey(level: LogLevel, message: string): string {
    return `${level}:${extractModuleTag(message)}:${normalizeMessage(message)}`;
  }

  private getTtl(level: LogLevel): number {
    switch (level) {
      case "debug":
        return this.config.debugTtlMs;
      case "info":
        return this.config.infoTtlMs;
      case "warn":
        return this.config.warnTtlMs;
      case "error":
        return this.config.errorTtlMs;
    }
  }

  private touch(key: string, entry: DedupeEntry): void {
    this.cache.delete(key);
    this.cache.set(key, entry);
    while (this.cache.size > this.config.maxCacheSize) {
      const oldest = this.cache.keys().next();
      if (oldest.done) break;
      this.cache.delete(oldest.value);
    }
  }

  shouldEmit(level: LogLevel, message: string): DedupeResult {
    if (!this.config.enabled) {
      return { emit: true };
    }

    try {
      const now = this.now();
      const key = this.createKey(level, message);
      const existing = this.cache.get(key);

      if (!existing) {
        this.touch(key, { firstSeen: now, suppressedCount: 0 });
        return { emit: true };
      }

      if (now - existing.firstSeen >= this.getTtl(level)) {
        const suppressed = existing.suppressedCount;
        this.touch(key, { firstSeen: now, suppressedCount: 0 });
        return suppressed > 0
          ? { emit: true, suffix: `(suppressed ${suppressed} repeats)` }
          : { emit: true };
      }

      existing.suppressedCount += 1;
      this.touch(key, existing);
      return { emit: false };
    } catch {
      // never throw from logging
      return { emit: true };
    }
  }

  getCacheSize(): number {
    return this.cache.size;
  }

  clearCache(): void {
    this.cache.clear();
  }

  updateConfig(config: Partial<LogDedupeConfig>): void {
    this.config = { ...this.config, ...config };
  }
}

let globalDedupeInstance: LogDedupeMiddleware | null = null;

export function getLogDedupe(): LogDedupeMiddleware {
  if (!globalDedupeInstance) {
    globalDedupeInstance = new LogDedupeMiddleware();
  }
  return globalDedupeInstance;
}

export function resetLogDedupe(): void {
  globalDedupeInstance?.clearCache();
  globalDedupeInstance = null;
}
