import { createLogger, serializeError, type Logger } from "@perpbot/core";
import { classifyError } from "@perpbot/futures-core";
import { OrderExecutor, TrendTrader } from "@perpbot/futures-engine";
import type { FuturesExchange } from "@perpbot/futures-exchange";
import { RiskEngine } from "@perpbot/risk";
import type { StrategyConfig } from "./config.js";
import type { HealthRegistry } from "./health.js";
import { Scheduler, type SleepFn } from "./loop.js";

export type InstrumentRuntime = {
  symbol: string;
  exchange: FuturesExchange;
  trader: TrendTrader;
  scheduler: Scheduler;
};

export type LaunchDeps = {
  /** Called once per instrument; instances are never shared. */
  createExchange: (config: StrategyConfig) => FuturesExchange;
  health?: HealthRegistry;
  sleep?: SleepFn;
  log?: Logger;
};

export type LaunchOutcome = { symbol: string; ok: true } | { symbol: string; ok: false; error: unknown };

export function buildInstrument(config: StrategyConfig, deps: LaunchDeps): InstrumentRuntime {
  const base = deps.log ?? createLogger("runner");
  const log = base.child({ symbol: config.symbol });
  const exchange = deps.createExchange(config);
  const risk = new RiskEngine(config.riskLimits, {
    contractMultiplier: config.contractMultiplier,
    log: log.child({ component: "risk" })
  });
  const executor = new OrderExecutor(exchange, {
    maxRetries: config.maxRetries,
    timeInForce: config.timeInForce,
    log: log.child({ component: "order-executor" })
  });
  const trader = new TrendTrader({
    exchange,
    executor,
    risk,
    config,
    log: log.child({ component: "trend-trader" })
  });
  const scheduler = new Scheduler(trader, {
    name: config.symbol,
    intervalMs: config.loopIntervalMs,
    sleep: deps.sleep,
    health: deps.health,
    log: log.child({ component: "scheduler" })
  });
  return { symbol: config.symbol, exchange, trader, scheduler };
}

/** Runs every instrument concurrently; one failing instrument does not stop the others. */
export async function runInstruments(instruments: InstrumentRuntime[], log: Logger = createLogger("runner")) {
  const settled = await Promise.allSettled(instruments.map((item) => item.scheduler.start()));
  return settled.map((result, idx): LaunchOutcome => {
    const symbol = instruments[idx]?.symbol ?? "unknown";
    if (result.status === "fulfilled") return { symbol, ok: true };
    log.error("instrument failed", { symbol, kind: classifyError(result.reason), ...serializeError(result.reason) });
    return { symbol, ok: false, error: result.reason };
  });
}

export function stopAll(instruments: InstrumentRuntime[]): void {
  for (const item of instruments) {
    item.scheduler.stop();
  }
}
