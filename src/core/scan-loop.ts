/**
 * Scan Loop - the orchestrator
 *
 * One tick:
 *   1. fetch every market snapshot in one call
 *   2. record YES/NO prices into the history store
 *   3. apply resolutions for open positions (EXPIRED + settlement)
 *   4. evaluate each market on a bounded worker pool:
 *        LEG1_OPEN → hedge when yes + no <= threshold
 *        NONE      → flash-crash entry, else ensemble entry
 *
 * Ticks never overlap. A market with an order in flight is reserved on the
 * state machine; state transitions run under a per-market mutex that is
 * never held across network I/O. A failure in one market skips only that
 * market for the tick. A market whose last order has an unknown outcome
 * takes no further orders while it stays listed.
 */

import { PositionStateError } from "../errors/app.errors";
import { formatErrorForLog, parseError } from "../lib/error-handling";
import type { HistoricalTracker } from "../ensemble/historical-tracker";
import type { OpportunityType } from "../ensemble/types";
import type { VoteAggregator } from "../ensemble/vote-aggregator";
import type { DecisionLogEntry, DecisionLogger } from "../utils/decision-logger";
import { KeyedMutex } from "../utils/limiter";
import type { Logger } from "../utils/logger.util";
import { parallelBatch } from "../utils/parallel-utils";
import type { CrashDetector } from "./crash-detector";
import type { ExecutionOutcome, OrderExecutor } from "./executor";
import type { HedgeStateMachine, HedgedPosition, Leg1OpenPosition } from "./hedge-state-machine";
import type { SizedOrder } from "./order-sizer";
import type { PortfolioLedger } from "./portfolio";
import { historyKey, type PriceHistoryStore } from "./price-history";
import type { RiskDecision, RiskGuard, TradeIntent } from "./risk-guard";
import {
  priceFor,
  tokenIdFor,
  type MarketDataProvider,
  type MarketSnapshot,
  type OutcomeSide,
  type ResolutionEvent,
  type ResolutionFeed,
  type SettledTrade,
} from "./types";

// Float slack for the inclusive price-sum comparison
const PRICE_EPSILON = 1e-9;

type EntryTrigger = "crash" | "ensemble" | "hedge";
type FilledOutcome = Extract<ExecutionOutcome, { status: "filled" }>;

// ═══════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════

export interface ScanLoopConfig {
  intervalMs: number;
  /** Markets evaluated at once */
  concurrency: number;
  /** Shares requested per entry leg, before min-notional sizing */
  tradeShares: number;
  /** Ensemble entries only inside this window */
  minMinutesToResolution: number;
  maxMinutesToResolution: number;
}

export const DEFAULT_SCAN_LOOP_CONFIG: ScanLoopConfig = {
  intervalMs: 2000,
  concurrency: 4,
  tradeShares: 5,
  minMinutesToResolution: 1,
  maxMinutesToResolution: 15,
};

export interface TickSummary {
  markets: number;
  crashes: number;
  entries: number;
  hedges: number;
  expirations: number;
  blocked: number;
  rejected: number;
  skipped: number;
  errors: number;
}

const emptySummary = (): TickSummary => ({
  markets: 0,
  crashes: 0,
  entries: 0,
  hedges: 0,
  expirations: 0,
  blocked: 0,
  rejected: 0,
  skipped: 0,
  errors: 0,
});

export interface ScanLoopParams {
  markets: MarketDataProvider;
  history: PriceHistoryStore;
  crashDetector: CrashDetector;
  positions: HedgeStateMachine;
  ensemble: VoteAggregator;
  riskGuard: RiskGuard;
  executor: OrderExecutor;
  ledger: PortfolioLedger;
  tracker?: HistoricalTracker;
  resolutions?: ResolutionFeed;
  decisionLogger?: DecisionLogger;
  config?: Partial<ScanLoopConfig>;
  logger: Logger;
  now?: () => number;
}

// ═══════════════════════════════════════════════════════════════════════════
// SCAN LOOP
// ═══════════════════════════════════════════════════════════════════════════

export class ScanLoop {
  private readonly markets: MarketDataProvider;
  private readonly history: PriceHistoryStore;
  private readonly crashDetector: CrashDetector;
  private readonly positions: HedgeStateMachine;
  private readonly ensemble: VoteAggregator;
  private readonly riskGuard: RiskGuard;
  private readonly executor: OrderExecutor;
  private readonly ledger: PortfolioLedger;
  private readonly tracker?: HistoricalTracker;
  private readonly resolutions?: ResolutionFeed;
  private readonly decisionLogger?: DecisionLogger;
  private readonly config: ScanLoopConfig;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly mutex = new KeyedMutex();
  /** Resolutions that arrived while the market had an order in flight */
  private readonly deferred = new Map<string, ResolutionEvent>();
  /** Markets holding an order whose outcome never came back */
  private readonly unconfirmed = new Map<string, string>();
  private running = false;
  private wake?: () => void;

  constructor(params: ScanLoopParams) {
    this.markets = params.markets;
    this.history = params.history;
    this.crashDetector = params.crashDetector;
    this.positions = params.positions;
    this.ensemble = params.ensemble;
    this.riskGuard = params.riskGuard;
    this.executor = params.executor;
    this.ledger = params.ledger;
    this.tracker = params.tracker;
    this.resolutions = params.resolutions;
    this.decisionLogger = params.decisionLogger;
    this.config = { ...DEFAULT_SCAN_LOOP_CONFIG, ...params.config };
    this.logger = params.logger;
    this.now = params.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.logger.info(
      `[ScanLoop] Started (interval=${this.config.intervalMs}ms, concurrency=${this.config.concurrency})`,
    );
    while (this.running) {
      const startedAt = this.now();
      await this.runOnce(startedAt);
      if (!this.running) break;
      const waitMs = Math.max(0, this.config.intervalMs - (this.now() - startedAt));
      await this.waitFor(waitMs);
    }
    const stats = this.ensemble.getStats();
    this.logger.info(
      `[ScanLoop] Stopped. open_positions=${this.positions.openCount} ensemble_decisions=${stats.totalDecisions} approval_rate=${stats.approvalRate.toFixed(1)}%`,
    );
  }

  /**
   * The tick in progress finishes; no new tick starts
   */
  stop(): void {
    this.running = false;
    this.wake?.();
  }

  async runOnce(now: number = this.now()): Promise<TickSummary> {
    const summary = emptySummary();
    try {
      let snapshots: MarketSnapshot[];
      try {
        snapshots = await this.markets.fetchSnapshots();
      } catch (err) {
        summary.errors += 1;
        this.logger.warn(
          `[ScanLoop] Market fetch failed (${parseError(err).code}): ${formatErrorForLog(err, 200)}`,
        );
        return summary;
      }
      summary.markets = snapshots.length;
      this.dropDelistedHolds(snapshots);

      for (const market of snapshots) {
        this.history.observe(historyKey(market.marketId, market.yesTokenId), now, market.yesPrice);
        this.history.observe(historyKey(market.marketId, market.noTokenId), now, market.noPrice);
      }

      await this.pollResolutions(snapshots, now, summary);

      await parallelBatch(snapshots, (market) => this.evaluateMarket(market, now, summary), {
        concurrency: this.config.concurrency,
        logger: this.logger,
        label: "ScanLoop",
      });
    } catch (err) {
      summary.errors += 1;
      this.logger.warn(`[ScanLoop] Scan error: ${formatErrorForLog(err, 300)}`);
    }

    const active =
      summary.crashes + summary.entries + summary.hedges + summary.expirations + summary.blocked;
    const line = `[ScanLoop] Tick: markets=${summary.markets} crashes=${summary.crashes} entries=${summary.entries} hedges=${summary.hedges} expired=${summary.expirations} blocked=${summary.blocked} rejected=${summary.rejected} skipped=${summary.skipped} errors=${summary.errors} open=${this.positions.openCount}`;
    if (active > 0) this.logger.info(line);
    else this.logger.debug(line);
    return summary;
  }

  // ═══════════════════════════════════════════════════════════════════════
  // RESOLUTIONS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * LEG1_OPEN → EXPIRED and settle. Returns false when the market holds no
   * open position or the resolution was deferred behind an in-flight order.
   */
  async handleResolution(event: ResolutionEvent, now: number = this.now()): Promise<boolean> {
    const { marketId, winningSide } = event;
    if (this.positions.isReserved(marketId)) {
      this.deferred.set(marketId, event);
      this.logger.debug(`[ScanLoop] Resolution for ${marketId} deferred (order in flight)`);
      return false;
    }
    this.deferred.delete(marketId);
    const unconfirmed = this.unconfirmed.get(marketId);
    if (unconfirmed) {
      this.unconfirmed.delete(marketId);
      this.logger.error(
        `[ScanLoop] ${marketId} resolved ${winningSide} with an unconfirmed order (${unconfirmed}); check the exchange`,
      );
    }

    const expired = await this.mutex.with(marketId, async () =>
      this.positions.expire(marketId, winningSide),
    );
    if (!expired) return false;

    this.settle(expired, expired.pnl, now);
    const stray = expired.strayLegs.length > 0 ? ` (+${expired.strayLegs.length} stray)` : "";
    this.logger.info(
      `[ScanLoop] ${expired.asset} ${marketId} resolved ${winningSide}: leg 1 ${expired.leg1.side} ${expired.leg1.shares} @ ${expired.leg1.price.toFixed(3)}${stray} pnl=$${expired.pnl.toFixed(2)}`,
    );
    await this.logDecision({
      ts: new Date(now).toISOString(),
      market_id: marketId,
      asset: expired.asset,
      yes_price: winningSide === "YES" ? 1 : 0,
      no_price: winningSide === "NO" ? 1 : 0,
      action: "expire",
      trigger: "resolution",
      side: expired.leg1.side,
      shares: expired.leg1.shares,
      pnl: expired.pnl,
    });
    return true;
  }

  private async pollResolutions(
    snapshots: readonly MarketSnapshot[],
    now: number,
    summary: TickSummary,
  ): Promise<void> {
    const events = [...this.deferred.values()];
    const openIds = this.positions.openPositions().map((p) => p.marketId);
    if (this.resolutions && openIds.length > 0) {
      try {
        events.push(...(await this.resolutions.pollResolutions(openIds)));
      } catch (err) {
        summary.errors += 1;
        this.logger.warn(`[ScanLoop] Resolution poll failed: ${formatErrorForLog(err, 200)}`);
      }
    }
    const live = new Set(snapshots.map((s) => s.marketId));
    for (const event of events) {
      if (live.has(event.marketId)) {
        this.logger.debug(`[ScanLoop] ${event.marketId} reported resolved while still listed`);
      }
      if (await this.handleResolution(event, now)) summary.expirations += 1;
    }
  }

  // ═══════════════════════════════════════════════════════════════════════
  // PER-MARKET EVALUATION
  // ═══════════════════════════════════════════════════════════════════════

  private async evaluateMarket(
    market: MarketSnapshot,
    now: number,
    summary: TickSummary,
  ): Promise<void> {
    const { marketId } = market;
    const held = this.unconfirmed.get(marketId);
    if (held) {
      this.logger.debug(`[ScanLoop] ${marketId} held: unconfirmed ${held}`);
      summary.skipped += 1;
      return;
    }
    if (!this.positions.reserve(marketId)) {
      this.logger.debug(`[ScanLoop] ${marketId} skipped: order in flight`);
      summary.skipped += 1;
      return;
    }
    try {
      const open = this.positions.get(marketId);
      if (open) {
        await this.tryHedge(market, open, now, summary);
      } else {
        await this.tryEntry(market, now, summary);
      }
    } catch (err) {
      summary.errors += 1;
      const parsed = parseError(err);
      this.logger.warn(
        `[ScanLoop] ${market.asset} ${marketId} skipped this tick (${parsed.category}/${parsed.code}): ${formatErrorForLog(err, 200)}`,
      );
    } finally {
      this.positions.release(marketId);
    }
  }

  private async tryHedge(
    market: MarketSnapshot,
    position: Leg1OpenPosition,
    now: number,
    summary: TickSummary,
  ): Promise<void> {
    const intent = this.positions.hedgeOpportunity(
      market.marketId,
      market.yesPrice,
      market.noPrice,
    );
    if (!intent) return;

    this.logger.info(
      `[ScanLoop] Hedge opportunity ${market.asset} ${market.marketId}: yes+no=${intent.priceSum.toFixed(3)} <= ${this.positions.hedgeThreshold}; buying ${intent.side} @ ${intent.price.toFixed(3)}`,
    );
    const outcome = await this.buyWithRisk(market, intent.side, intent.shares, now, summary, "hedge");
    if (!outcome) return;

    let hedged: HedgedPosition;
    try {
      hedged = await this.mutex.with(market.marketId, async () =>
        this.positions.completeHedge(market.marketId, outcome.fill, market.yesPrice, market.noPrice),
      );
    } catch (err) {
      if (!(err instanceof PositionStateError)) throw err;
      await this.mutex.with(market.marketId, async () =>
        this.positions.recordStrayLeg(market.marketId, outcome.fill),
      );
      this.logger.error(
        `[ScanLoop] Hedge fill on ${market.marketId} does not complete the pair (leg 1 ${position.leg1.price.toFixed(3)} + leg 2 ${outcome.fill.price.toFixed(3)}); both legs settle at resolution`,
        err,
      );
      return;
    }

    summary.hedges += 1;
    this.settle(hedged, hedged.lockedPnl, now);
    this.logger.info(
      `[ScanLoop] HEDGED ${market.asset} ${market.marketId}: ${hedged.leg1.side}@${hedged.leg1.price.toFixed(3)} + ${hedged.leg2.side}@${hedged.leg2.price.toFixed(3)} = ${hedged.combinedCost.toFixed(3)} locked=$${hedged.lockedPnl.toFixed(2)}`,
    );
    await this.logDecision({
      ...this.entryBase(market, now),
      action: "hedge",
      trigger: "hedge",
      side: hedged.leg2.side,
      shares: hedged.leg2.shares,
      value_usd: outcome.cost,
      order_id: hedged.leg2.orderId,
      pnl: hedged.lockedPnl,
    });
  }

  private async tryEntry(
    market: MarketSnapshot,
    now: number,
    summary: TickSummary,
  ): Promise<void> {
    const crash = this.crashDetector.detect(market, now);
    if (crash) {
      summary.crashes += 1;
      await this.openLeg1(market, crash.side, "flash_crash", "crash", now, summary);
      return;
    }

    const minutes = market.minutesToResolution;
    if (
      minutes < this.config.minMinutesToResolution ||
      minutes > this.config.maxMinutesToResolution
    ) {
      return;
    }

    const priceSum = market.yesPrice + market.noPrice;
    const opportunityType: OpportunityType =
      priceSum <= this.positions.hedgeThreshold + PRICE_EPSILON ? "arbitrage" : "directional";
    const decision = await this.ensemble.decide(
      {
        market,
        yesHistory: this.history.points(historyKey(market.marketId, market.yesTokenId)),
        noHistory: this.history.points(historyKey(market.marketId, market.noTokenId)),
        now,
      },
      this.ledger.getState(now),
      opportunityType,
    );

    const execute = this.ensemble.shouldExecute(decision, {
      minConfidenceFloor: this.ledger.requiredConfidence(0),
    });
    if (!execute) {
      summary.skipped += 1;
      if (decision.action !== "skip") {
        await this.logDecision({
          ...this.entryBase(market, now),
          action: "skip",
          trigger: "ensemble",
          reason: decision.reasoning,
          consensus: decision.consensusScore,
          confidence: decision.confidence,
        });
      }
      return;
    }

    this.logger.info(`[ScanLoop] Ensemble ${market.asset} ${market.marketId}: ${decision.reasoning}`);
    if (decision.action === "buy_yes") {
      await this.openLeg1(market, "YES", opportunityType, "ensemble", now, summary);
    } else if (decision.action === "buy_no") {
      await this.openLeg1(market, "NO", opportunityType, "ensemble", now, summary);
    } else if (decision.action === "buy_both") {
      await this.openPair(market, now, summary);
    }
  }

  private async openLeg1(
    market: MarketSnapshot,
    side: OutcomeSide,
    strategy: string,
    trigger: "crash" | "ensemble",
    now: number,
    summary: TickSummary,
  ): Promise<void> {
    const outcome = await this.buyWithRisk(
      market,
      side,
      this.config.tradeShares,
      now,
      summary,
      trigger,
    );
    if (!outcome) return;

    await this.mutex.with(market.marketId, async () =>
      this.positions.openLeg1({
        marketId: market.marketId,
        asset: market.asset,
        strategy,
        fill: outcome.fill,
      }),
    );
    summary.entries += 1;
    this.logger.info(
      `[ScanLoop] LEG1_OPEN ${market.asset} ${market.marketId} ${side} ${outcome.fill.shares} @ ${outcome.fill.price.toFixed(3)} (${strategy})`,
    );
    await this.logDecision({
      ...this.entryBase(market, now),
      action: "trade",
      trigger,
      side,
      shares: outcome.fill.shares,
      value_usd: outcome.cost,
      order_id: outcome.fill.orderId,
    });
  }

  /**
   * Buy both outcomes at once. If the second leg fails the first is kept as
   * an ordinary LEG1_OPEN position.
   */
  private async openPair(
    market: MarketSnapshot,
    now: number,
    summary: TickSummary,
  ): Promise<void> {
    const priceSum = market.yesPrice + market.noPrice;
    if (priceSum > this.positions.hedgeThreshold + PRICE_EPSILON) {
      summary.skipped += 1;
      this.logger.debug(
        `[ScanLoop] ${market.marketId} buy_both skipped: yes+no=${priceSum.toFixed(3)} above ${this.positions.hedgeThreshold}`,
      );
      return;
    }

    // Both legs need the same share count for the pair to pay $1 each
    const shares = Math.max(
      this.executor.sizeFor(market.yesPrice, this.config.tradeShares).shares,
      this.executor.sizeFor(market.noPrice, this.config.tradeShares).shares,
    );
    if (shares <= 0) {
      summary.skipped += 1;
      return;
    }

    // Both legs are authorised together, before either order goes out
    const risk = await this.riskGuard.evaluatePair(
      this.intentFor(market, "YES", { shares, value: market.yesPrice * shares }),
      this.intentFor(market, "NO", { shares, value: market.noPrice * shares }),
      now,
    );
    if (!(await this.admit(market, risk, "BOTH", now, summary, "ensemble"))) return;

    const yes = await this.buy(market, "YES", shares, now, summary, "ensemble");
    if (!yes) return;
    const no = await this.buy(market, "NO", shares, now, summary, "ensemble");
    if (!no) {
      await this.mutex.with(market.marketId, async () =>
        this.positions.openLeg1({
          marketId: market.marketId,
          asset: market.asset,
          strategy: "arbitrage",
          fill: yes.fill,
        }),
      );
      summary.entries += 1;
      this.logger.warn(
        `[ScanLoop] ${market.marketId} NO leg failed; holding YES ${yes.fill.shares} @ ${yes.fill.price.toFixed(3)} as leg 1`,
      );
      return;
    }

    const hedged = await this.mutex.with(market.marketId, async () =>
      this.positions.recordPairedEntry({
        marketId: market.marketId,
        asset: market.asset,
        strategy: "arbitrage",
        yesFill: yes.fill,
        noFill: no.fill,
      }),
    );
    summary.entries += 1;
    summary.hedges += 1;
    this.settle(hedged, hedged.lockedPnl, now);
    this.logger.info(
      `[ScanLoop] Paired entry ${market.asset} ${market.marketId}: YES@${yes.fill.price.toFixed(3)} + NO@${no.fill.price.toFixed(3)} locked=$${hedged.lockedPnl.toFixed(2)}`,
    );
    await this.logDecision({
      ...this.entryBase(market, now),
      action: "trade",
      trigger: "ensemble",
      side: "BOTH",
      shares,
      value_usd: yes.cost + no.cost,
      pnl: hedged.lockedPnl,
    });
  }

  // ═══════════════════════════════════════════════════════════════════════
  // SHARED STEPS
  // ═══════════════════════════════════════════════════════════════════════

  /**
   * Risk check then buy. Returns the fill, or null after logging the block
   * or rejection.
   */
  private async buyWithRisk(
    market: MarketSnapshot,
    side: OutcomeSide,
    requestedShares: number,
    now: number,
    summary: TickSummary,
    trigger: EntryTrigger,
  ): Promise<FilledOutcome | null> {
    const price = priceFor(market, side);
    const sized = this.executor.sizeFor(price, requestedShares);
    if (sized.shares <= 0) {
      summary.skipped += 1;
      this.logger.debug(`[ScanLoop] ${market.marketId} ${side} unpriceable at ${price}`);
      return null;
    }

    const risk = await this.riskGuard.evaluate(this.intentFor(market, side, sized), now);
    if (!(await this.admit(market, risk, side, now, summary, trigger))) return null;
    return this.buy(market, side, requestedShares, now, summary, trigger);
  }

  private intentFor(market: MarketSnapshot, side: OutcomeSide, sized: SizedOrder): TradeIntent {
    return {
      marketId: market.marketId,
      asset: market.asset,
      tokenId: tokenIdFor(market, side),
      side,
      price: priceFor(market, side),
      shares: sized.shares,
      notional: sized.value,
    };
  }

  /**
   * True when the risk decision allows the order; a block is logged
   */
  private async admit(
    market: MarketSnapshot,
    risk: RiskDecision,
    side: OutcomeSide | "BOTH",
    now: number,
    summary: TickSummary,
    trigger: EntryTrigger,
  ): Promise<boolean> {
    if (risk.allowed) return true;
    summary.blocked += 1;
    await this.logDecision({
      ...this.entryBase(market, now),
      action: "block",
      trigger,
      side,
      reason: risk.blockedBy
        ? `${risk.blockedBy.check}: ${risk.blockedBy.reason ?? "blocked"}`
        : "blocked",
    });
    return false;
  }

  /**
   * Submit an authorised order. An unknown outcome holds the market until it
   * resolves or leaves the listing.
   */
  private async buy(
    market: MarketSnapshot,
    side: OutcomeSide,
    requestedShares: number,
    now: number,
    summary: TickSummary,
    trigger: EntryTrigger,
  ): Promise<FilledOutcome | null> {
    const outcome = await this.executor.buy(
      {
        marketId: market.marketId,
        asset: market.asset,
        tokenId: tokenIdFor(market, side),
        side,
        price: priceFor(market, side),
        requestedShares,
      },
      now,
    );
    if (outcome.status === "filled") return outcome;

    let reason: string;
    if (outcome.status === "unknown") {
      summary.errors += 1;
      this.unconfirmed.set(market.marketId, `${trigger} ${side} order`);
      reason = `outcome_unknown: ${outcome.error.message}`;
    } else {
      summary.rejected += 1;
      reason =
        outcome.status === "rejected"
          ? `${outcome.reason}: ${outcome.message}`
          : `${outcome.error.code}: ${outcome.error.message}`;
    }
    await this.logDecision({
      ...this.entryBase(market, now),
      action: "reject",
      trigger,
      side,
      reason,
    });
    return null;
  }

  private dropDelistedHolds(snapshots: readonly MarketSnapshot[]): void {
    if (this.unconfirmed.size === 0) return;
    const listed = new Set(snapshots.map((s) => s.marketId));
    for (const marketId of this.unconfirmed.keys()) {
      if (!listed.has(marketId)) this.unconfirmed.delete(marketId);
    }
  }

  private settle(
    position: { marketId: string; asset: string; strategy: string },
    pnl: number,
    now: number,
  ): void {
    const trade: SettledTrade = {
      marketId: position.marketId,
      asset: position.asset,
      strategy: position.strategy,
      pnl,
      outcome: pnl >= 0 ? "win" : "loss",
      settledAt: now,
    };
    this.riskGuard.recordOutcome(trade, now);
    this.tracker?.record(trade);
  }

  private entryBase(
    market: MarketSnapshot,
    now: number,
  ): Pick<DecisionLogEntry, "ts" | "market_id" | "asset" | "yes_price" | "no_price"> {
    return {
      ts: new Date(now).toISOString(),
      market_id: market.marketId,
      asset: market.asset,
      yes_price: market.yesPrice,
      no_price: market.noPrice,
    };
  }

  private async logDecision(entry: DecisionLogEntry): Promise<void> {
    if (!this.decisionLogger?.enabled) return;
    try {
      await this.decisionLogger.append(entry);
    } catch (err) {
      this.logger.warn(`[ScanLoop] Decision log write failed: ${formatErrorForLog(err, 200)}`);
    }
  }

  private waitFor(ms: number): Promise<void> {
    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        this.wake = undefined;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = undefined;
        resolve();
      };
    });
  }
}
