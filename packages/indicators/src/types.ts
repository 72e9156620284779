import type { TrendDirection } from "@perpbot/futures-core";

export type IndicatorSnapshot = Readonly<{
  ts: number;
  close: number;
  emaFast: number;
  emaSlow: number;
  adx: number;
  atr: number;
  donchianHigh: number;
  donchianLow: number;
  keltnerUpper: number;
  keltnerLower: number;
  /** (close - emaSlow) / atr */
  trendStrength: number;
  /** atr / close, 0 when close is 0 */
  volatilityRatio: number;
}>;

export type SnapshotParams = {
  emaFast: number;
  emaSlow: number;
  adxPeriod: number;
  atrPeriod: number;
  donchianPeriod: number;
  keltnerMultiplier: number;
};

/**
 * Loose EMA-order direction gated only by adx > 0. The trader decides its own
 * trend against a configured ADX threshold and does not read this.
 */
export function snapshotDirection(snapshot: IndicatorSnapshot): TrendDirection {
  if (snapshot.emaFast > snapshot.emaSlow && snapshot.adx > 0) return "long";
  if (snapshot.emaFast < snapshot.emaSlow && snapshot.adx > 0) return "short";
  return "flat";
}
