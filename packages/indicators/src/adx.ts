import type { Candle } from "@perpbot/futures-core";
import { trueRangeSeries } from "./atr.js";
import { wilderSeries } from "./ema.js";

export type AdxSeries = {
  adx: number[];
  plusDi: number[];
  minusDi: number[];
};

function directionalMoves(candles: Candle[]): { plusDm: number[]; minusDm: number[] } {
  const plusDm: number[] = [];
  const minusDm: number[] = [];

  for (let i = 0; i < candles.length; i += 1) {
    if (i === 0) {
      plusDm.push(0);
      minusDm.push(0);
      continue;
    }
    const curr = candles[i];
    const prev = candles[i - 1];
    const upMove = curr.high - prev.high;
    const downMove = prev.low - curr.low;

    plusDm.push(upMove > downMove && upMove > 0 ? upMove : 0);
    minusDm.push(downMove > upMove && downMove > 0 ? downMove : 0);
  }

  return { plusDm, minusDm };
}

export function adxSeries(candles: Candle[], period: number): AdxSeries {
  if (period <= 0 || candles.length === 0) {
    return { adx: [], plusDi: [], minusDi: [] };
  }

  const { plusDm, minusDm } = directionalMoves(candles);
  const smoothTr = wilderSeries(trueRangeSeries(candles), period);
  const smoothPlusDm = wilderSeries(plusDm, period);
  const smoothMinusDm = wilderSeries(minusDm, period);

  const plusDi: number[] = [];
  const minusDi: number[] = [];
  const dx: number[] = [];

  for (let i = 0; i < candles.length; i += 1) {
    const tr = smoothTr[i];
    const pDi = tr > 0 ? (100 * smoothPlusDm[i]) / tr : 0;
    const mDi = tr > 0 ? (100 * smoothMinusDm[i]) / tr : 0;
    const diSum = pDi + mDi;
    plusDi.push(pDi);
    minusDi.push(mDi);
    dx.push(diSum > 0 ? (100 * Math.abs(pDi - mDi)) / diSum : 0);
  }

  return {
    adx: wilderSeries(dx, period),
    plusDi,
    minusDi
  };
}
