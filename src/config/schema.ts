/**
 * Configuration Schema
 *
 * Type definitions for the application configuration. Component configs in
 * `src/core` and `src/ensemble` are structurally compatible with the
 * sections below so the bootstrap can pass them through unchanged.
 */

import type { PresetName } from "./presets";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface ScanConfig {
  /** Tick interval; ticks never overlap */
  intervalMs: number;
  /** Markets evaluated in parallel per tick */
  concurrency: number;
  /** Only run the ensemble on markets inside this window (minutes) */
  minMinutesToResolution: number;
  maxMinutesToResolution: number;
}

export interface CrashConfig {
  windowSeconds: number;
  /** Drop fraction over the window, (max - min) / max */
  threshold: number;
  cooldownSeconds: number;
  historyCapacity: number;
}

export interface HedgeConfig {
  /** Second leg fires when yes + no <= this */
  threshold: number;
}

export interface EnsembleConfig {
  minConsensus: number;
  minConfidence: number;
  minPluralityPct: number;
  /** Arbitrage (buy_both) decisions may use their own thresholds */
  arbitrageMinConsensus?: number;
  arbitrageMinConfidence?: number;
  sourceTimeoutMs: number;
  /** Per-source weights, e.g. "momentum:2,spread:1" */
  weights: Record<string, number>;
}

export interface RiskConfig {
  circuitBreakerLosses: number;
  maxDailyLossUsd: number;
  maxDailyTrades: number;
  /** Percent of total balance, 0-100 */
  maxAssetExposurePct: number;
  /** Percent, 0-100 */
  maxSlippagePct: number;
  startingBalanceUsd: number;
}

export interface ExecutionConfig {
  tradeShares: number;
  minNotionalUsd: number;
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  requestTimeoutMs: number;
  liveTrading: boolean;
}

export interface ProviderConfig {
  gammaApiUrl: string;
  clobApiUrl: string;
  chainId: number;
  assets: string[];
}

export interface AuthConfig {
  privateKey?: string;
  apiKey?: string;
  apiSecret?: string;
  apiPassphrase?: string;
  funderAddress?: string;
  signatureType: number;
}

export interface AppConfig {
  presetName: PresetName;
  overridesApplied: string[];
  logLevel: LogLevel;
  decisionsLog: string;
  scan: ScanConfig;
  crash: CrashConfig;
  hedge: HedgeConfig;
  ensemble: EnsembleConfig;
  risk: RiskConfig;
  execution: ExecutionConfig;
  providers: ProviderConfig;
  auth: AuthConfig;
}

export interface ConfigValidationError {
  key: string;
  message: string;
}
