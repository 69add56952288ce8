import "dotenv/config";
import { loadConfig, parseCliOverrides } from "../config/loadConfig";
import type { AppConfig } from "../config/schema";
import { CrashDetector } from "../core/crash-detector";
import { OrderExecutor } from "../core/executor";
import { HedgeStateMachine } from "../core/hedge-state-machine";
import { PortfolioLedger } from "../core/portfolio";
import { PriceHistoryStore } from "../core/price-history";
import { RiskGuard } from "../core/risk-guard";
import { RiskStats } from "../core/risk-stats";
import { ScanLoop } from "../core/scan-loop";
import type { ExecutionGateway, OrderBookProvider } from "../core/types";
import { HistoricalTracker } from "../ensemble/historical-tracker";
import { MomentumSource } from "../ensemble/sources/momentum.source";
import { SpreadSource } from "../ensemble/sources/spread.source";
import { VoteAggregator } from "../ensemble/vote-aggregator";
import { ConfigurationError } from "../errors/app.errors";
import { createClobClient } from "../infrastructure/clob-client.factory";
import { formatErrorForLog } from "../lib/error-handling";
import { createRetryPolicy, type RetryPolicy } from "../lib/retry";
import { ClobExecutionGateway } from "../providers/clob-execution.gateway";
import { ClobOrderBookProvider } from "../providers/clob-orderbook.provider";
import { GammaMarketProvider } from "../providers/gamma-market.provider";
import { GammaResolutionFeed } from "../providers/gamma-resolution.feed";
import { PaperExecutionGateway } from "../providers/paper-execution.gateway";
import { DecisionLogger } from "../utils/decision-logger";
import { ConsoleLogger, type Logger } from "../utils/logger.util";

let loop: ScanLoop | undefined;

/**
 * Paper gateway unless live trading is on; live trading also reads the CLOB
 * order book for the liquidity check
 */
async function buildTradingStack(
  config: AppConfig,
  retryPolicy: RetryPolicy,
  logger: Logger,
): Promise<{ gateway: ExecutionGateway; orderBook?: OrderBookProvider }> {
  if (!config.execution.liveTrading || !config.auth.privateKey) {
    logger.warn("[Startup] LIVE_TRADING is off: orders are simulated (paper fills)");
    return { gateway: new PaperExecutionGateway(logger) };
  }

  const client = await createClobClient({
    host: config.providers.clobApiUrl,
    chainId: config.providers.chainId,
    privateKey: config.auth.privateKey,
    apiKey: config.auth.apiKey,
    apiSecret: config.auth.apiSecret,
    apiPassphrase: config.auth.apiPassphrase,
    signatureType: config.auth.signatureType,
    funderAddress: config.auth.funderAddress,
    logger,
  });
  return {
    gateway: new ClobExecutionGateway({ client, logger }),
    orderBook: new ClobOrderBookProvider({ source: client, retryPolicy, logger }),
  };
}

async function main(): Promise<void> {
  const config = loadConfig(parseCliOverrides(process.argv.slice(2)));
  const logger = new ConsoleLogger(config.logLevel);

  logger.info("═══════════════════════════════════════════════════════════");
  logger.info(`[Startup] Flash hedge engine (preset: ${config.presetName})`);
  if (config.overridesApplied.length > 0) {
    logger.info(`[Startup] Preset overrides: ${config.overridesApplied.join(", ")}`);
  }
  logger.info(
    `[Startup] assets=${config.providers.assets.join(",")} crash=${(config.crash.threshold * 100).toFixed(0)}%/${config.crash.windowSeconds}s hedge<=${config.hedge.threshold} shares=${config.execution.tradeShares}`,
  );
  logger.info("═══════════════════════════════════════════════════════════");

  const retryPolicy = createRetryPolicy({
    maxAttempts: config.execution.retryMaxAttempts,
    baseDelayMs: config.execution.retryBaseDelayMs,
    maxDelayMs: config.execution.retryMaxDelayMs,
    timeoutMs: config.execution.requestTimeoutMs,
  });

  const { gateway, orderBook } = await buildTradingStack(config, retryPolicy, logger);

  const ledger = new PortfolioLedger(
    { startingBalanceUsd: config.risk.startingBalanceUsd },
    logger,
  );
  const history = new PriceHistoryStore({ capacity: config.crash.historyCapacity });
  const tracker = new HistoricalTracker();

  loop = new ScanLoop({
    markets: new GammaMarketProvider({
      baseUrl: config.providers.gammaApiUrl,
      assets: config.providers.assets,
      retryPolicy,
      logger,
    }),
    resolutions: new GammaResolutionFeed({
      baseUrl: config.providers.gammaApiUrl,
      retryPolicy,
      logger,
    }),
    history,
    crashDetector: new CrashDetector(
      history,
      {
        windowSeconds: config.crash.windowSeconds,
        threshold: config.crash.threshold,
        cooldownSeconds: config.crash.cooldownSeconds,
      },
      logger,
    ),
    positions: new HedgeStateMachine({ hedgeThreshold: config.hedge.threshold }),
    ensemble: new VoteAggregator({
      sources: [new MomentumSource(), new SpreadSource({ maxPriceSum: config.hedge.threshold })],
      config: config.ensemble,
      tracker,
      logger,
    }),
    riskGuard: new RiskGuard({
      portfolio: ledger,
      stats: new RiskStats(),
      orderBook,
      config: config.risk,
      logger,
    }),
    executor: new OrderExecutor({
      gateway,
      ledger,
      retryPolicy,
      minNotionalUsd: config.execution.minNotionalUsd,
      logger,
    }),
    ledger,
    tracker,
    decisionLogger: new DecisionLogger(config.decisionsLog),
    config: {
      intervalMs: config.scan.intervalMs,
      concurrency: config.scan.concurrency,
      tradeShares: config.execution.tradeShares,
      minMinutesToResolution: config.scan.minMinutesToResolution,
      maxMinutesToResolution: config.scan.maxMinutesToResolution,
    },
    logger,
  });

  await loop.start();
}

function shutdown(signal: string): void {
  console.log(`\n[Shutdown] ${signal} received, finishing the current tick...`);
  if (!loop) process.exit(0);
  loop.stop();
}

process.on("SIGINT", () => shutdown("SIGINT"));
process.on("SIGTERM", () => shutdown("SIGTERM"));

main().catch((err) => {
  if (err instanceof ConfigurationError) {
    console.error(`[Startup] Configuration error: ${err.message}`);
  } else {
    console.error(`[Startup] Fatal error: ${formatErrorForLog(err)}`);
  }
  process.exit(1);
});
