/**
 * Environment variable parsing helpers
 *
 * Every helper reads `overrides` first (CLI flags), then `process.env`,
 * then the lowercase form of the key. Malformed values raise
 * ConfigurationError rather than silently falling back.
 */

import { ConfigurationError } from "../errors/app.errors";

export type EnvOverrides = Record<string, string | undefined>;

export const readEnv = (
  key: string,
  overrides: EnvOverrides = {},
): string | undefined =>
  overrides[key] ?? process.env[key] ?? process.env[key.toLowerCase()];

export function envStr(
  key: string,
  fallback: string,
  overrides: EnvOverrides = {},
): string {
  const raw = readEnv(key, overrides);
  return raw === undefined || raw === "" ? fallback : raw.trim();
}

export function envOptional(
  key: string,
  overrides: EnvOverrides = {},
): string | undefined {
  const raw = readEnv(key, overrides)?.trim();
  return raw ? raw : undefined;
}

export function envNum(
  key: string,
  fallback: number,
  overrides: EnvOverrides = {},
): number {
  const raw = readEnv(key, overrides);
  if (raw === undefined || raw.trim() === "") return fallback;
  const parsed = Number(raw);
  if (!Number.isFinite(parsed)) {
    throw new ConfigurationError(`Invalid number for ${key}: "${raw}"`, key);
  }
  return parsed;
}

export function envBool(
  key: string,
  fallback: boolean,
  overrides: EnvOverrides = {},
): boolean {
  const raw = readEnv(key, overrides);
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  if (["true", "1", "yes", "y", "on"].includes(normalized)) return true;
  if (["false", "0", "no", "n", "off"].includes(normalized)) return false;
  throw new ConfigurationError(`Invalid boolean for ${key}: "${raw}"`, key);
}

export function envEnum<T extends string>(
  key: string,
  allowed: readonly T[],
  fallback: T,
  overrides: EnvOverrides = {},
): T {
  const raw = readEnv(key, overrides);
  if (raw === undefined || raw.trim() === "") return fallback;
  const normalized = raw.trim().toLowerCase();
  const match = allowed.find((value) => value === normalized);
  if (match === undefined) {
    throw new ConfigurationError(
      `Invalid value for ${key}: "${raw}" (expected one of ${allowed.join(", ")})`,
      key,
    );
  }
  return match;
}

/**
 * Comma separated or JSON array list
 */
export function envList(
  key: string,
  fallback: string[],
  overrides: EnvOverrides = {},
): string[] {
  const raw = readEnv(key, overrides);
  if (raw === undefined || raw.trim() === "") return fallback;
  if (raw.trim().startsWith("[")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(
        `Invalid JSON list for ${key}`,
        key,
        err instanceof Error ? err : undefined,
      );
    }
    if (Array.isArray(parsed)) return parsed.map(String);
  }
  return raw
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}
