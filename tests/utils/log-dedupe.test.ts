import { test, beforeEach, describe } from "node:test";
import assert from "node:assert";
import {
  LogDedupeMiddleware,
  normalizeMessage,
  extractModuleTag,
  getLogDedupe,
  resetLogDedupe,
} from "../../src/utils/log-dedupe.util";

describe("LogDedupeMiddleware", () => {
  let clock: number;
  let middleware: LogDedupeMiddleware;

  beforeEach(() => {
    clock = 1_000;
    middleware = new LogDedupeMiddleware(
      {
        enabled: true,
        debugTtlMs: 100,
        infoTtlMs: 100,
        warnTtlMs: 100,
        errorTtlMs: 100,
        maxCacheSize: 100,
      },
      () => clock,
    );
  });

  describe("normalizeMessage", () => {
    test("replaces timestamps and durations", () => {
      assert.strictEqual(
        normalizeMessage("[ScanLoop] Tick took 1764ms at 2024-01-15T10:30:45.123Z"),
        "[ScanLoop] Tick took Xms at TIME",
      );
    });

    test("replaces unix timestamps", () => {
      assert.strictEqual(
        normalizeMessage("interval 1705312245 started"),
        "interval TIMESTAMP started",
      );
    });

    test("replaces prices and dollar amounts", () => {
      assert.strictEqual(
        normalizeMessage("[Executor] Filled m1 YES: 5 shares @ 0.450 ($2.25)"),
        "[Executor] Filled m1 YES: 5 shares @ X.X ($X)",
      );
    });

    test("replaces percentages", () => {
      assert.strictEqual(
        normalizeMessage("[CrashDetector] drop=20.0% in 3s"),
        "[CrashDetector] drop=X% in Xs",
      );
    });

    test("replaces long hex ids", () => {
      assert.strictEqual(
        normalizeMessage("token 0x1234567890abcdef1234 missing"),
        "token 0x… missing",
      );
    });
  });

  describe("extractModuleTag", () => {
    test("reads the bracketed prefix", () => {
      assert.strictEqual(extractModuleTag("[RiskGuard] Blocked"), "RiskGuard");
      assert.strictEqual(extractModuleTag("no tag here"), "GLOBAL");
    });
  });

  describe("shouldEmit", () => {
    test("suppresses repeats within the TTL and reports them afterwards", () => {
      assert.deepStrictEqual(middleware.shouldEmit("info", "[ScanLoop] idle"), { emit: true });
      clock += 10;
      assert.deepStrictEqual(middleware.shouldEmit("info", "[ScanLoop] idle"), { emit: false });
      clock += 10;
      assert.deepStrictEqual(middleware.shouldEmit("info", "[ScanLoop] idle"), { emit: false });
      clock += 100;
      assert.deepStrictEqual(middleware.shouldEmit("info", "[ScanLoop] idle"), {
        emit: true,
        suffix: "(suppressed 2 repeats)",
      });
    });

    test("collapses lines that differ only in prices", () => {
      assert.strictEqual(middleware.shouldEmit("info", "[Quote] yes=0.45").emit, true);
      assert.strictEqual(middleware.shouldEmit("info", "[Quote] yes=0.47").emit, false);
    });

    test("keys levels separately", () => {
      assert.strictEqual(middleware.shouldEmit("info", "[A] same").emit, true);
      assert.strictEqual(middleware.shouldEmit("warn", "[A] same").emit, true);
    });

    test("emits everything when disabled", () => {
      middleware.updateConfig({ enabled: false });
      assert.strictEqual(middleware.shouldEmit("info", "[A] x").emit, true);
      assert.strictEqual(middleware.shouldEmit("info", "[A] x").emit, true);
      assert.strictEqual(middleware.getCacheSize(), 0);
    });

    test("evicts the least recently used key at capacity", () => {
      middleware.updateConfig({ maxCacheSize: 2 });
      middleware.shouldEmit("info", "[A] alpha");
      middleware.shouldEmit("info", "[A] beta");
      middleware.shouldEmit("info", "[A] gamma");
      assert.strictEqual(middleware.getCacheSize(), 2);
      assert.strictEqual(middleware.shouldEmit("info", "[A] alpha").emit, true);
    });
  });

  describe("global instance", () => {
    test("reset replaces the shared middleware", () => {
      const first = getLogDedupe();
      assert.strictEqual(getLogDedupe(), first);
      resetLogDedupe();
      assert.notStrictEqual(getLogDedupe(), first);
    });
  });
});
