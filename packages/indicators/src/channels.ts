import { Highest, Lowest } from "technicalindicators";
import type { Candle } from "@perpbot/futures-core";
import { toFinite } from "@perpbot/core";

export type Channel = {
  upper: number;
  lower: number;
};

export type TimedValue = {
  ts: number;
  value: number;
};

export function donchianLatest(candles: Candle[], period: number): Channel | null {
  if (period <= 0 || candles.length < period) return null;

  const highs = Highest.calculate({ values: candles.map((row) => row.high), period });
  const lows = Lowest.calculate({ values: candles.map((row) => row.low), period });
  const upper = toFinite(highs[highs.length - 1]);
  const lower = toFinite(lows[lows.length - 1]);
  if (upper === null || lower === null) return null;

  return { upper, lower };
}

/** Value of the latest point whose ts is at or before `ts`; series must be sorted by ts. */
export function forwardFillAt(series: TimedValue[], ts: number): number | null {
  let lo = 0;
  let hi = series.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    if (series[mid].ts <= ts) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  if (found < 0) return null;
  return toFinite(series[found].value);
}

export function keltnerAt(midline: number, atr: number | null, multiplier: number): Channel | null {
  if (atr === null || !Number.isFinite(midline)) return null;
  return {
    upper: midline + multiplier * atr,
    lower: midline - multiplier * atr
  };
}
