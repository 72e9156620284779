import assert from "node:assert/strict";
import test from "node:test";
import type { Candle } from "@perpbot/futures-core";
import { adxSeries } from "./adx.js";

function lcg(seed: number) {
  let state = seed >>> 0 || 1;
  return () => {
    state = (state * 1664525 + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

function randomWalk(length: number, seed: number): Candle[] {
  const rng = lcg(seed);
  const out: Candle[] = [];
  let close = 100;
  for (let i = 0; i < length; i += 1) {
    const open = close;
    close = Math.max(1, close + (rng() - 0.5) * 6);
    const high = Math.max(open, close) + rng() * 3;
    const low = Math.max(0.5, Math.min(open, close) - rng() * 3);
    out.push({ ts: i * 60_000, open, high, low, close, volume: 1 });
  }
  return out;
}

test("ADX stays within [0, 100] on arbitrary paths", () => {
  for (const seed of [1, 7, 42, 1234]) {
    const { adx, plusDi, minusDi } = adxSeries(randomWalk(300, seed), 14);
    assert.equal(adx.length, 300);
    for (let i = 0; i < adx.length; i += 1) {
      assert.ok(Number.isFinite(adx[i]));
      assert.ok(adx[i] >= 0 && adx[i] <= 100, `adx[${i}] = ${adx[i]}`);
      assert.ok(plusDi[i] >= 0 && minusDi[i] >= 0);
    }
  }
});

test("ADX is 0 when both directional indices are 0", () => {
  const flat: Candle[] = Array.from({ length: 30 }, (_, i) => ({
    ts: i,
    open: 50,
    high: 50,
    low: 50,
    close: 50,
    volume: 0
  }));
  const { adx, plusDi, minusDi } = adxSeries(flat, 14);
  assert.equal(adx[adx.length - 1], 0);
  assert.equal(plusDi[plusDi.length - 1], 0);
  assert.equal(minusDi[minusDi.length - 1], 0);
});

test("steady uptrend drives ADX toward 100 through Wilder smoothing", () => {
  const up: Candle[] = [10, 11, 12, 13, 14].map((close, i) => ({
    ts: i,
    open: close,
    high: close + 1,
    low: close - 1,
    close,
    volume: 1
  }));
  const { adx, minusDi } = adxSeries(up, 2);
  assert.deepEqual(adx, [0, 50, 75, 87.5, 93.75]);
  assert.equal(minusDi[4], 0);
});

test("ADX of an empty series is empty", () => {
  assert.deepEqual(adxSeries([], 14), { adx: [], plusDi: [], minusDi: [] });
});
