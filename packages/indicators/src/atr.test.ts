import assert from "node:assert/strict";
import test from "node:test";
import type { Candle } from "@perpbot/futures-core";
import { atrSeries, trueRangeSeries } from "./atr.js";

function bar(ts: number, high: number, low: number, close: number): Candle {
  return { ts, open: close, high, low, close, volume: 1 };
}

const candles: Candle[] = [
  bar(0, 10, 8, 9),
  bar(1, 12, 9.5, 11),
  bar(2, 10, 9, 9.5),
  bar(3, 10.5, 9.25, 10),
  bar(4, 13, 10, 12.5),
  bar(5, 12.75, 11, 11.5)
];

test("true range uses the previous close for gaps", () => {
  assert.deepEqual(trueRangeSeries(candles).slice(0, 3), [2, 3, 2]);
});

test("ATR recurrence holds exactly and is seeded at TR(0)", () => {
  const period = 3;
  const tr = trueRangeSeries(candles);
  const atr = atrSeries(candles, period);

  assert.equal(atr.length, candles.length);
  assert.equal(atr[0], tr[0]);
  for (let t = 1; t < atr.length; t += 1) {
    assert.equal(atr[t], atr[t - 1] + (tr[t] - atr[t - 1]) / period);
  }
});

test("ATR of flat bars is zero", () => {
  const flat = [bar(0, 5, 5, 5), bar(1, 5, 5, 5), bar(2, 5, 5, 5)];
  assert.deepEqual(atrSeries(flat, 2), [0, 0, 0]);
});
