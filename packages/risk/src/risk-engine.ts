import type { PositionState, RiskLimits, TrendDirection } from "@perpbot/futures-core";
import { isOpen, notional } from "@perpbot/futures-core";
import type { IndicatorSnapshot } from "@perpbot/indicators";
import { createLogger, type Logger } from "@perpbot/core";

export type OpenRejection =
  | "flat_direction"
  | "weak_trend"
  | "volatility_out_of_range"
  | "same_side_position"
  | "exposure_cap"
  | "no_equity";

export type OpenDecision = { ok: true } | { ok: false; reason: OpenRejection; message: string };

export type RiskEngineOptions = {
  contractMultiplier?: number;
  log?: Logger;
};

export const DEFAULT_RISK_LIMITS: RiskLimits = {
  maxLeverage: 5,
  maxPositionRatio: 0.3,
  portfolioExposureLimit: 3,
  riskPerTrade: 0.01,
  minTrendStrength: 1,
  minVolatilityRatio: 0.001,
  maxVolatilityRatio: 0.03
};

export class RiskEngine {
  readonly contractMultiplier: number;
  private readonly log: Logger;

  constructor(
    readonly limits: RiskLimits,
    options: RiskEngineOptions = {}
  ) {
    this.contractMultiplier = options.contractMultiplier ?? 1;
    this.log = options.log ?? createLogger("risk");
  }

  /** Volatility-normalised size: equity x riskPerTrade / atr, capped at equity x maxLeverage notional. */
  computePositionSize(equity: number, atr: number, price: number): number {
    if (!(equity > 0) || !(atr > 0) || !(price > 0)) return 0;

    const riskBudget = equity * this.limits.riskPerTrade;
    if (!(riskBudget > 0)) return 0;

    let size = riskBudget / atr;
    const nominalCap = equity * this.limits.maxLeverage;
    if (notional(size, price, this.contractMultiplier) > nominalCap) {
      size = nominalCap / (price * this.contractMultiplier);
    }

    return Math.max(size, 0);
  }

  evaluateOpen(
    direction: TrendDirection,
    equity: number,
    snapshot: IndicatorSnapshot,
    position: PositionState
  ): OpenDecision {
    if (direction === "flat") {
      return { ok: false, reason: "flat_direction", message: "No trend direction" };
    }

    if (snapshot.trendStrength < this.limits.minTrendStrength) {
      return {
        ok: false,
        reason: "weak_trend",
        message: `Trend strength ${snapshot.trendStrength} < ${this.limits.minTrendStrength}`
      };
    }

    const vr = snapshot.volatilityRatio;
    if (!(this.limits.minVolatilityRatio <= vr && vr <= this.limits.maxVolatilityRatio)) {
      return {
        ok: false,
        reason: "volatility_out_of_range",
        message: `Volatility ratio ${vr} not in [${this.limits.minVolatilityRatio}, ${this.limits.maxVolatilityRatio}]`
      };
    }

    if (isOpen(position) && position.side === direction) {
      return { ok: false, reason: "same_side_position", message: `Already ${direction}, no pyramiding` };
    }

    const existing = notional(position.size, snapshot.close, this.contractMultiplier);
    const cap = equity * this.limits.maxPositionRatio;
    if (existing >= cap) {
      return { ok: false, reason: "exposure_cap", message: `Exposure ${existing} >= cap ${cap}` };
    }

    if (!(equity > 0)) {
      return { ok: false, reason: "no_equity", message: `Equity ${equity} is not positive` };
    }

    return { ok: true };
  }

  canOpen(
    direction: TrendDirection,
    equity: number,
    snapshot: IndicatorSnapshot,
    position: PositionState
  ): boolean {
    const decision = this.evaluateOpen(direction, equity, snapshot, position);
    if (!decision.ok) {
      const meta = { reason: decision.reason, direction, equity };
      if (decision.reason === "exposure_cap") {
        this.log.info(decision.message, meta);
      } else {
        this.log.debug(decision.message, meta);
      }
    }
    return decision.ok;
  }

  /** Adverse-move breaker, separate from the trailing stop. */
  shouldReduceOnDrawdown(price: number, position: PositionState, snapshot: IndicatorSnapshot): boolean {
    if (!isOpen(position)) return false;
    if (position.side === "long" && price < snapshot.keltnerLower) return true;
    if (position.side === "short" && price > snapshot.keltnerUpper) return true;
    return false;
  }
}
