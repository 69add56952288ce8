import { ConfigurationError } from "../errors/app.errors";
import {
  envBool,
  envEnum,
  envList,
  envNum,
  envOptional,
  envStr,
  readEnv,
  type EnvOverrides,
} from "./env";
import {
  DEFAULT_PRESET,
  PRESET_NAMES,
  RISK_PRESETS,
  type PresetKey,
} from "./presets";
import type { AppConfig, ConfigValidationError, LogLevel } from "./schema";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export const GAMMA_API_URL = "https://gamma-api.polymarket.com";
export const CLOB_API_URL = "https://clob.polymarket.com";
export const POLYGON_CHAIN_ID = 137;

// The spread source only ever votes buy_both; momentum carries directional calls
const DEFAULT_ENSEMBLE_WEIGHTS = ["momentum:2", "spread:1"];

/**
 * Parse "name:weight" pairs, e.g. "momentum:2,spread:1"
 */
export function parseWeights(
  entries: string[],
): Record<string, number> {
  const weights: Record<string, number> = {};
  for (const entry of entries) {
    const [name, rawWeight] = entry.split(":").map((part) => part.trim());
    if (!name || rawWeight === undefined) {
      throw new ConfigurationError(
        `Invalid ENSEMBLE_WEIGHTS entry "${entry}" (expected name:weight)`,
        "ENSEMBLE_WEIGHTS",
      );
    }
    weights[name] = Number(rawWeight);
  }
  return weights;
}

export function validateConfig(config: AppConfig): ConfigValidationError[] {
  const errors: ConfigValidationError[] = [];
  const check = (ok: boolean, key: string, message: string): void => {
    if (!ok) errors.push({ key, message });
  };
  const inUnit = (v: number): boolean => v > 0 && v <= 1;
  const pct = (v: number): boolean => v >= 0 && v <= 100;

  check(config.scan.intervalMs > 0, "SCAN_INTERVAL_MS", "must be > 0");
  check(config.scan.concurrency >= 1, "SCAN_CONCURRENCY", "must be >= 1");
  check(
    config.scan.minMinutesToResolution <= config.scan.maxMinutesToResolution,
    "MIN_MINUTES_TO_RESOLUTION",
    "must be <= MAX_MINUTES_TO_RESOLUTION",
  );
  check(inUnit(config.crash.threshold), "CRASH_THRESHOLD", "must be in (0, 1]");
  check(config.crash.windowSeconds > 0, "CRASH_WINDOW_SECONDS", "must be > 0");
  check(config.crash.cooldownSeconds >= 0, "CRASH_COOLDOWN_SECONDS", "must be >= 0");
  check(config.crash.historyCapacity >= 2, "PRICE_HISTORY_CAPACITY", "must be >= 2");
  check(
    config.hedge.threshold > 0 && config.hedge.threshold < 1,
    "HEDGE_THRESHOLD",
    "must be in (0, 1) so a hedged pair costs less than $1",
  );
  check(pct(config.ensemble.minConsensus), "MIN_CONSENSUS", "must be 0-100");
  check(pct(config.ensemble.minConfidence), "MIN_CONFIDENCE", "must be 0-100");
  check(pct(config.ensemble.minPluralityPct), "MIN_PLURALITY_PCT", "must be 0-100");
  for (const [name, weight] of Object.entries(config.ensemble.weights)) {
    check(
      Number.isFinite(weight) && weight >= 0,
      "ENSEMBLE_WEIGHTS",
      `weight for "${name}" must be a finite number >= 0`,
    );
  }
  check(config.risk.circuitBreakerLosses >= 1, "CIRCUIT_BREAKER_LOSSES", "must be >= 1");
  check(config.risk.maxDailyLossUsd >= 0, "MAX_DAILY_LOSS_USD", "must be >= 0");
  check(config.risk.maxDailyTrades >= 0, "MAX_DAILY_TRADES", "must be >= 0");
  check(pct(config.risk.maxAssetExposurePct), "MAX_ASSET_EXPOSURE_PCT", "must be 0-100");
  check(config.risk.maxSlippagePct >= 0, "MAX_SLIPPAGE_PCT", "must be >= 0");
  check(config.risk.startingBalanceUsd > 0, "STARTING_BALANCE_USD", "must be > 0");
  check(config.execution.tradeShares > 0, "TRADE_SHARES", "must be > 0");
  check(config.execution.minNotionalUsd > 0, "MIN_NOTIONAL_USD", "must be > 0");
  check(config.execution.retryMaxAttempts >= 1, "RETRY_MAX_ATTEMPTS", "must be >= 1");
  check(
    !config.execution.liveTrading || config.auth.privateKey !== undefined,
    "PRIVATE_KEY",
    "required when LIVE_TRADING=true",
  );
  return errors;
}

export function loadConfig(overrides: EnvOverrides = {}): AppConfig {
  const presetName = envEnum("PRESET", PRESET_NAMES, DEFAULT_PRESET, overrides);
  const preset = RISK_PRESETS[presetName];
  const overridesApplied: string[] = [];

  const fromPreset = (key: PresetKey): number => {
    if (readEnv(key, overrides) !== undefined) overridesApplied.push(key);
    return envNum(key, preset[key], overrides);
  };
  const optionalNum = (key: string): number | undefined =>
    readEnv(key, overrides) === undefined ? undefined : envNum(key, 0, overrides);

  const config: AppConfig = {
    presetName,
    overridesApplied,
    logLevel: envEnum("LOG_LEVEL", LOG_LEVELS, "info", overrides),
    decisionsLog: envStr("DECISIONS_LOG", "", overrides),
    scan: {
      intervalMs: fromPreset("SCAN_INTERVAL_MS"),
      concurrency: fromPreset("SCAN_CONCURRENCY"),
      minMinutesToResolution: envNum("MIN_MINUTES_TO_RESOLUTION", 1, overrides),
      maxMinutesToResolution: envNum("MAX_MINUTES_TO_RESOLUTION", 15, overrides),
    },
    crash: {
      windowSeconds: fromPreset("CRASH_WINDOW_SECONDS"),
      threshold: fromPreset("CRASH_THRESHOLD"),
      cooldownSeconds: fromPreset("CRASH_COOLDOWN_SECONDS"),
      historyCapacity: envNum("PRICE_HISTORY_CAPACITY", 100, overrides),
    },
    hedge: {
      threshold: fromPreset("HEDGE_THRESHOLD"),
    },
    ensemble: {
      minConsensus: fromPreset("MIN_CONSENSUS"),
      minConfidence: fromPreset("MIN_CONFIDENCE"),
      minPluralityPct: fromPreset("MIN_PLURALITY_PCT"),
      arbitrageMinConsensus: envNum("ARBITRAGE_MIN_CONSENSUS", 30, overrides),
      arbitrageMinConfidence: optionalNum("ARBITRAGE_MIN_CONFIDENCE"),
      sourceTimeoutMs: envNum("ENSEMBLE_SOURCE_TIMEOUT_MS", 3000, overrides),
      weights: parseWeights(
        envList("ENSEMBLE_WEIGHTS", DEFAULT_ENSEMBLE_WEIGHTS, overrides),
      ),
    },
    risk: {
      circuitBreakerLosses: fromPreset("CIRCUIT_BREAKER_LOSSES"),
      maxDailyLossUsd: fromPreset("MAX_DAILY_LOSS_USD"),
      maxDailyTrades: fromPreset("MAX_DAILY_TRADES"),
      maxAssetExposurePct: fromPreset("MAX_ASSET_EXPOSURE_PCT"),
      maxSlippagePct: fromPreset("MAX_SLIPPAGE_PCT"),
      startingBalanceUsd: envNum("STARTING_BALANCE_USD", 100, overrides),
    },
    execution: {
      tradeShares: fromPreset("TRADE_SHARES"),
      minNotionalUsd: envNum("MIN_NOTIONAL_USD", 1, overrides),
      retryMaxAttempts: envNum("RETRY_MAX_ATTEMPTS", 3, overrides),
      retryBaseDelayMs: envNum("RETRY_BASE_DELAY_MS", 250, overrides),
      retryMaxDelayMs: envNum("RETRY_MAX_DELAY_MS", 5000, overrides),
      requestTimeoutMs: envNum("REQUEST_TIMEOUT_MS", 5000, overrides),
      liveTrading: envBool("LIVE_TRADING", false, overrides),
    },
    providers: {
      gammaApiUrl: envStr("GAMMA_API_URL", GAMMA_API_URL, overrides),
      clobApiUrl: envStr("CLOB_API_URL", CLOB_API_URL, overrides),
      chainId: envNum("CHAIN_ID", POLYGON_CHAIN_ID, overrides),
      assets: envList("ASSETS", ["btc", "eth", "sol", "xrp"], overrides).map(
        (asset) => asset.toLowerCase(),
      ),
    },
    auth: {
      privateKey: envOptional("PRIVATE_KEY", overrides),
      apiKey: envOptional("POLYMARKET_API_KEY", overrides),
      apiSecret: envOptional("POLYMARKET_API_SECRET", overrides),
      apiPassphrase: envOptional("POLYMARKET_API_PASSPHRASE", overrides),
      funderAddress: envOptional("PUBLIC_KEY", overrides),
      signatureType: envNum("CLOB_SIGNATURE_TYPE", 0, overrides),
    },
  };

  const errors = validateConfig(config);
  if (errors.length > 0) {
    const detail = errors.map((e) => `${e.key}: ${e.message}`).join("; ");
    throw new ConfigurationError(`Invalid configuration: ${detail}`, errors[0].key);
  }
  return config;
}

export function parseCliOverrides(argv: string[]): Record<string, string> {
  const overrides: Record<string, string> = {};
  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (!arg.startsWith("--")) continue;
    const eq = arg.indexOf("=");
    const rawKey = (eq === -1 ? arg.slice(2) : arg.slice(2, eq))
      .replace(/-/g, "_")
      .toUpperCase();
    if (eq !== -1) {
      overrides[rawKey] = arg.slice(eq + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      overrides[rawKey] = next;
      i += 1;
    } else {
      overrides[rawKey] = "true";
    }
  }
  return overrides;
}
