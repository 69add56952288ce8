import chalk from "chalk";
import { getLogDedupe, type LogLevel } from "./log-dedupe.util";

export interface Logger {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string, err?: Error) => void;
  debug: (msg: string) => void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

const read = (key: string): string | undefined =>
  process.env[key] ?? process.env[key.toLowerCase()];

const resolveThreshold = (): LogLevel => {
  if (read("DEBUG") === "1") return "debug";
  const level = (read("LOG_LEVEL") ?? "info").toLowerCase();
  if (level === "trace") return "debug";
  return level === "error" || level === "warn" || level === "debug"
    ? level
    : "info";
};

export class ConsoleLogger implements Logger {
  private readonly threshold: LogLevel;

  constructor(threshold: LogLevel = resolveThreshold()) {
    this.threshold = threshold;
  }

  info(msg: string): void {
    const out = this.format("info", msg);
    if (out !== null) console.log(chalk.cyan("[INFO]"), out);
  }

  warn(msg: string): void {
    const out = this.format("warn", msg);
    if (out !== null) console.warn(chalk.yellow("[WARN]"), out);
  }

  error(msg: string, err?: Error): void {
    const out = this.format("error", msg);
    if (out === null) return;
    console.error(
      chalk.red("[ERROR]"),
      out,
      err ? `\n${err.stack ?? err.message}` : "",
    );
  }

  debug(msg: string): void {
    const out = this.format("debug", msg);
    if (out !== null) console.debug(chalk.gray("[DEBUG]"), out);
  }

  /**
   * Returns the line to print, or null when filtered by level or dedupe
   */
  private format(level: LogLevel, msg: string): string | null {
    if (LEVEL_RANK[level] > LEVEL_RANK[this.threshold]) return null;
    const result = getLogDedupe().shouldEmit(level, msg);
    if (!result.emit) return null;
    return result.suffix ? `${msg} ${result.suffix}` : msg;
  }
}
