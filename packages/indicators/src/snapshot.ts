import type { Candle } from "@perpbot/futures-core";
import { createLogger, type Logger } from "@perpbot/core";
import { adxSeries } from "./adx.js";
import { atrSeries } from "./atr.js";
import { donchianLatest, forwardFillAt, keltnerAt } from "./channels.js";
import { emaSeries, latest } from "./ema.js";
import type { IndicatorSnapshot, SnapshotParams } from "./types.js";

const defaultLog = createLogger("indicators");

export function minimumSignalBars(params: SnapshotParams): number {
  return Math.max(params.donchianPeriod, params.adxPeriod + 1);
}

export function minimumExecutionBars(params: SnapshotParams): number {
  return params.atrPeriod + 1;
}

/**
 * Builds the point-in-time snapshot from the slower signal series and the faster
 * execution series (ATR). Returns null whenever any input is missing or the
 * resulting ATR is not positive.
 */
export function buildSnapshot(
  signal: Candle[],
  execution: Candle[],
  params: SnapshotParams,
  log: Logger = defaultLog
): IndicatorSnapshot | null {
  if (signal.length === 0 || execution.length === 0) {
    log.warn("snapshot skipped: empty OHLCV series", {
      signalBars: signal.length,
      executionBars: execution.length
    });
    return null;
  }

  if (signal.length < minimumSignalBars(params) || execution.length < minimumExecutionBars(params)) {
    log.warn("snapshot skipped: not enough bars", {
      signalBars: signal.length,
      executionBars: execution.length,
      signalRequired: minimumSignalBars(params),
      executionRequired: minimumExecutionBars(params)
    });
    return null;
  }

  const closes = signal.map((row) => row.close);
  const emaFastSeries = emaSeries(closes, params.emaFast);
  const emaFast = latest(emaFastSeries);
  const emaSlow = latest(emaSeries(closes, params.emaSlow));
  const adx = latest(adxSeries(signal, params.adxPeriod).adx);

  const execAtr = atrSeries(execution, params.atrPeriod);
  const atr = latest(execAtr);

  const last = signal[signal.length - 1];
  const donchian = donchianLatest(signal, params.donchianPeriod);
  const atrAtSignal = forwardFillAt(
    execution.map((row, idx) => ({ ts: row.ts, value: execAtr[idx] })),
    last.ts
  );
  const keltner = emaFast === null ? null : keltnerAt(emaFast, atrAtSignal, params.keltnerMultiplier);

  if (emaFast === null || emaSlow === null || adx === null || atr === null || !donchian || !keltner) {
    log.warn("snapshot skipped: indicator missing", {
      emaFast,
      emaSlow,
      adx,
      atr,
      donchian: donchian !== null,
      keltner: keltner !== null
    });
    return null;
  }

  if (atr <= 0) {
    log.debug("snapshot skipped: non-positive ATR", { atr });
    return null;
  }

  const close = last.close;
  const snapshot: IndicatorSnapshot = {
    ts: last.ts,
    close,
    emaFast,
    emaSlow,
    adx,
    atr,
    donchianHigh: donchian.upper,
    donchianLow: donchian.lower,
    keltnerUpper: keltner.upper,
    keltnerLower: keltner.lower,
    trendStrength: (close - emaSlow) / atr,
    volatilityRatio: close !== 0 ? atr / close : 0
  };

  log.debug("snapshot built", {
    at: new Date(last.ts).toISOString(),
    close,
    emaFast,
    emaSlow,
    adx,
    atr
  });
  return snapshot;
}
