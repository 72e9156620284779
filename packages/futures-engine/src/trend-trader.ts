import type {
  CloseReason,
  FuturesSymbol,
  MarginMode,
  PositionSide,
  PositionState,
  TradingStrategy,
  TrendDirection
} from "@perpbot/futures-core";
import {
  closingOrderSide,
  emptyPosition,
  floorToPrecision,
  isOpen,
  openedPosition,
  resyncPosition,
  toOrderSide
} from "@perpbot/futures-core";
import type { FuturesExchange } from "@perpbot/futures-exchange";
import { buildSnapshot, type IndicatorSnapshot, type SnapshotParams } from "@perpbot/indicators";
import type { RiskEngine } from "@perpbot/risk";
import { createLogger, serializeError, type Logger } from "@perpbot/core";
import type { OrderExecutor } from "./order-executor.js";

export type TrendTraderConfig = SnapshotParams & {
  symbol: FuturesSymbol;
  signalTimeframe: string;
  executionTimeframe: string;
  signalLookback: number;
  executionLookback: number;
  adxThreshold: number;
  atrStopMultiplier: number;
  trailingAtrMultiplier: number;
  leverage: number;
  marginMode: MarginMode;
};

export type TraderAction =
  | {
      type: "opened";
      side: PositionSide;
      size: number;
      entryPrice: number;
      stopLoss: number;
      orderId: string;
    }
  | { type: "closed"; reason: CloseReason; side: PositionSide; size: number; orderId: string }
  | { type: "close_skipped"; reason: CloseReason; side: PositionSide; size: number }
  | { type: "stop_trailed"; side: PositionSide; from: number | null; to: number };

export type StepReport = {
  snapshot: IndicatorSnapshot | null;
  direction: TrendDirection | null;
  position: PositionState;
  actions: TraderAction[];
};

export type SnapshotBuilder = typeof buildSnapshot;

export type TrendTraderDeps = {
  exchange: FuturesExchange;
  executor: OrderExecutor;
  risk: RiskEngine;
  config: TrendTraderConfig;
  /** Defaults to the indicator pipeline; tests substitute scripted snapshots. */
  snapshot?: SnapshotBuilder;
  log?: Logger;
};

/** EMA order gated by the configured ADX threshold. */
export function determineTrend(snapshot: IndicatorSnapshot, adxThreshold: number): TrendDirection {
  if (snapshot.adx < adxThreshold) return "flat";
  if (snapshot.emaFast > snapshot.emaSlow) return "long";
  if (snapshot.emaFast < snapshot.emaSlow) return "short";
  return "flat";
}

/** Ratchets the stop toward price; it never loosens. A long stop is floored at 0. */
export function trailStop(
  side: PositionSide,
  previous: number | null,
  close: number,
  atr: number,
  multiplier: number
): number {
  if (side === "long") {
    return Math.max(previous ?? 0, close - multiplier * atr);
  }
  const candidate = close + multiplier * atr;
  return previous === null ? candidate : Math.min(previous, candidate);
}

export function initialStop(side: PositionSide, entry: number, atr: number, multiplier: number): number {
  return side === "long" ? Math.max(entry - multiplier * atr, 0) : entry + multiplier * atr;
}

export class TrendTrader implements TradingStrategy {
  private position: PositionState = emptyPosition();
  private precision: number | null = null;
  private readonly ex: FuturesExchange;
  private readonly executor: OrderExecutor;
  private readonly risk: RiskEngine;
  private readonly buildSnapshot: SnapshotBuilder;
  private readonly log: Logger;

  constructor(private readonly deps: TrendTraderDeps) {
    this.ex = deps.exchange;
    this.executor = deps.executor;
    this.risk = deps.risk;
    this.buildSnapshot = deps.snapshot ?? buildSnapshot;
    this.log = deps.log ?? createLogger("trend-trader", { symbol: deps.config.symbol });
  }

  get config(): TrendTraderConfig {
    return this.deps.config;
  }

  get currentPosition(): PositionState {
    return { ...this.position };
  }

  async initialize(): Promise<void> {
    const { symbol, marginMode, leverage } = this.config;
    await this.ex.loadMarkets();

    try {
      await this.ex.setMarginMode(symbol, marginMode);
    } catch (error) {
      this.log.warn("margin mode not applied", { marginMode, ...serializeError(error) });
    }

    try {
      await this.ex.setLeverage(symbol, leverage);
    } catch (error) {
      this.log.warn("leverage not applied", { leverage, ...serializeError(error) });
    }

    this.precision = this.ex.marketPrecision(symbol);
    await this.resync();
    this.log.info("trader initialized", {
      precision: this.precision,
      side: this.position.side,
      size: this.position.size
    });
  }

  async step(): Promise<StepReport> {
    const cfg = this.config;
    const actions: TraderAction[] = [];
    const report = (snapshot: IndicatorSnapshot | null, direction: TrendDirection | null): StepReport => ({
      snapshot,
      direction,
      position: this.currentPosition,
      actions
    });

    const signal = await this.ex.fetchOHLCV(cfg.symbol, cfg.signalTimeframe, cfg.signalLookback);
    const execution = await this.ex.fetchOHLCV(cfg.symbol, cfg.executionTimeframe, cfg.executionLookback);

    const snapshot = this.buildSnapshot(signal, execution, cfg, this.log);
    if (!snapshot) return report(null, null);

    await this.resync();
    const metrics = await this.ex.fetchAccountMetrics();
    const equity = Math.max(metrics.equity, 0);
    const close = snapshot.close;

    const trend = determineTrend(snapshot, cfg.adxThreshold);

    if (trend === "flat") {
      const position = this.position;
      if (isOpen(position)) {
        const exitLong = position.side === "long" && close < snapshot.emaSlow;
        const exitShort = position.side === "short" && close > snapshot.emaSlow;
        if (exitLong || exitShort) {
          await this.closePosition("trend_exit", actions);
        }
      }
      return report(snapshot, trend);
    }

    if (isOpen(this.position) && this.position.side !== trend) {
      await this.closePosition("trend_flip", actions);
    }

    const position = this.position;
    if (isOpen(position)) {
      const next = trailStop(position.side, position.stopLoss, close, snapshot.atr, cfg.trailingAtrMultiplier);
      if (next !== position.stopLoss) {
        actions.push({ type: "stop_trailed", side: position.side, from: position.stopLoss, to: next });
        this.position = { ...position, stopLoss: next };
      }

      if (this.risk.shouldReduceOnDrawdown(close, this.position, snapshot)) {
        await this.closePosition("keltner_break", actions);
      }
      return report(snapshot, trend);
    }

    const breakout = trend === "long" ? close >= snapshot.donchianHigh : close <= snapshot.donchianLow;
    if (!breakout) return report(snapshot, trend);

    if (!this.risk.canOpen(trend, equity, snapshot, this.position)) return report(snapshot, trend);

    await this.openPosition(trend, equity, snapshot, actions);
    return report(snapshot, trend);
  }

  async shutdown(): Promise<void> {
    try {
      await this.ex.close();
    } catch (error) {
      this.log.warn("exchange close failed", serializeError(error));
    }
  }

  private async resync(): Promise<void> {
    const reported = await this.ex.fetchPosition(this.config.symbol);
    this.position = resyncPosition(this.position, reported);
  }

  private async openPosition(
    side: PositionSide,
    equity: number,
    snapshot: IndicatorSnapshot,
    actions: TraderAction[]
  ): Promise<void> {
    const cfg = this.config;
    const rawSize = this.risk.computePositionSize(equity, snapshot.atr, snapshot.close);
    const size = floorToPrecision(rawSize, this.precision);
    if (!(size > 0)) {
      this.log.warn("position size rounds to zero, entry skipped", {
        side,
        rawSize,
        precision: this.precision,
        equity
      });
      return;
    }

    const response = await this.executor.submit({
      symbol: cfg.symbol,
      side: toOrderSide(side),
      amount: size,
      orderType: "market",
      reduceOnly: false,
      postOnly: false
    });

    const average = response.average;
    const entryPrice = typeof average === "number" && average > 0 ? average : snapshot.close;
    const stopLoss = initialStop(side, entryPrice, snapshot.atr, cfg.atrStopMultiplier);
    this.position = openedPosition({ side, size, entryPrice, stopLoss });
    actions.push({ type: "opened", side, size, entryPrice, stopLoss, orderId: response.id });
    this.log.info("position opened", { side, size, entryPrice, stopLoss, orderId: response.id });
  }

  private async closePosition(reason: CloseReason, actions: TraderAction[]): Promise<void> {
    const position = this.position;
    if (!isOpen(position)) return;

    const size = floorToPrecision(position.size, this.precision);
    if (!(size > 0)) {
      actions.push({ type: "close_skipped", reason, side: position.side, size: position.size });
      this.log.warn("close amount rounds to zero, close skipped", {
        reason,
        side: position.side,
        size: position.size,
        precision: this.precision
      });
      return;
    }

    const response = await this.executor.submit({
      symbol: this.config.symbol,
      side: closingOrderSide(position.side),
      amount: size,
      orderType: "market",
      reduceOnly: true,
      postOnly: false
    });

    this.position = emptyPosition();
    actions.push({ type: "closed", reason, side: position.side, size, orderId: response.id });
    this.log.info("position closed", { reason, side: position.side, size, orderId: response.id });
  }
}
