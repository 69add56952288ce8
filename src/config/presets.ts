/**
 * Risk profile presets. Values are keyed by the env var they default, so
 * any individual key can still be overridden from the environment or CLI.
 */
export const RISK_PRESETS = {
  conservative: {
    SCAN_INTERVAL_MS: 3000,
    SCAN_CONCURRENCY: 2,
    CRASH_THRESHOLD: 0.2,
    CRASH_WINDOW_SECONDS: 3,
    CRASH_COOLDOWN_SECONDS: 120,
    HEDGE_THRESHOLD: 0.93, // 7c guaranteed edge per share pair
    TRADE_SHARES: 5,
    MIN_CONSENSUS: 70,
    MIN_CONFIDENCE: 65,
    MIN_PLURALITY_PCT: 40,
    MAX_DAILY_LOSS_USD: 5,
    MAX_DAILY_TRADES: 20,
    MAX_ASSET_EXPOSURE_PCT: 20,
    CIRCUIT_BREAKER_LOSSES: 3,
    MAX_SLIPPAGE_PCT: 2,
  },
  balanced: {
    SCAN_INTERVAL_MS: 2000,
    SCAN_CONCURRENCY: 4,
    CRASH_THRESHOLD: 0.15,
    CRASH_WINDOW_SECONDS: 3,
    CRASH_COOLDOWN_SECONDS: 60,
    HEDGE_THRESHOLD: 0.95,
    TRADE_SHARES: 5,
    MIN_CONSENSUS: 60,
    MIN_CONFIDENCE: 55,
    MIN_PLURALITY_PCT: 25,
    MAX_DAILY_LOSS_USD: 10,
    MAX_DAILY_TRADES: 50,
    MAX_ASSET_EXPOSURE_PCT: 30,
    CIRCUIT_BREAKER_LOSSES: 5,
    MAX_SLIPPAGE_PCT: 5,
  },
  aggressive: {
    SCAN_INTERVAL_MS: 1000,
    SCAN_CONCURRENCY: 8,
    CRASH_THRESHOLD: 0.1,
    CRASH_WINDOW_SECONDS: 5,
    CRASH_COOLDOWN_SECONDS: 30,
    HEDGE_THRESHOLD: 0.97,
    TRADE_SHARES: 10,
    MIN_CONSENSUS: 50,
    MIN_CONFIDENCE: 45,
    MIN_PLURALITY_PCT: 20,
    MAX_DAILY_LOSS_USD: 25,
    MAX_DAILY_TRADES: 120,
    MAX_ASSET_EXPOSURE_PCT: 50,
    CIRCUIT_BREAKER_LOSSES: 7,
    MAX_SLIPPAGE_PCT: 8,
  },
} as const;

export type PresetName = keyof typeof RISK_PRESETS;
export type PresetKey = keyof (typeof RISK_PRESETS)["balanced"];

export const PRESET_NAMES: readonly PresetName[] = [
  "conservative",
  "balanced",
  "aggressive",
];
export const DEFAULT_PRESET: PresetName = "balanced";
