import type { Candle } from "@perpbot/futures-core";
import { wilderSeries } from "./ema.js";

export function trueRangeSeries(candles: Candle[]): number[] {
  const tr: number[] = [];
  for (let i = 0; i < candles.length; i += 1) {
    const curr = candles[i];
    if (i === 0) {
      tr.push(curr.high - curr.low);
      continue;
    }
    const prevClose = candles[i - 1].close;
    tr.push(
      Math.max(
        curr.high - curr.low,
        Math.abs(curr.high - prevClose),
        Math.abs(curr.low - prevClose)
      )
    );
  }
  return tr;
}

export function atrSeries(candles: Candle[], period: number): number[] {
  return wilderSeries(trueRangeSeries(candles), period);
}
