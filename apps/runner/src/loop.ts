import { setTimeout as delay } from "node:timers/promises";
import { createLogger, serializeError, type Logger } from "@perpbot/core";
import { classifyError, type TradingStrategy } from "@perpbot/futures-core";
import type { HealthRegistry } from "./health.js";

export type SleepFn = (ms: number, signal: AbortSignal) => Promise<void>;

export type SchedulerOptions = {
  name: string;
  intervalMs: number;
  sleep?: SleepFn;
  health?: HealthRegistry;
  log?: Logger;
};

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === "AbortError";
}

/** Resolves early, without error, when the signal aborts. */
export async function interruptibleSleep(ms: number, signal: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (error) {
    if (isAbortError(error)) return;
    throw error;
  }
}

export class Scheduler {
  readonly name: string;
  readonly intervalMs: number;
  private readonly sleep: SleepFn;
  private readonly log: Logger;
  private active = false;
  private stopRequested = false;
  private wake = new AbortController();
  private completion: Promise<void> | null = null;

  constructor(
    private readonly strategy: TradingStrategy,
    private readonly options: SchedulerOptions
  ) {
    this.name = options.name;
    this.intervalMs = options.intervalMs;
    this.sleep = options.sleep ?? interruptibleSleep;
    this.log = options.log ?? createLogger("scheduler", { symbol: options.name });
    options.health?.register(options.name);
  }

  get isRunning(): boolean {
    return this.active;
  }

  /** Completion of the loop started by `start()`, null before the first start. */
  get done(): Promise<void> | null {
    return this.completion;
  }

  async run(): Promise<void> {
    if (this.active) return;
    this.active = true;
    this.stopRequested = false;
    this.wake = new AbortController();

    try {
      await this.strategy.initialize();
      this.log.info("scheduler started", { intervalMs: this.intervalMs });

      while (!this.stopRequested) {
        await this.tick();
        await this.sleep(this.intervalMs, this.wake.signal);
      }
      this.options.health?.setStatus(this.name, "STOPPED");
    } catch (error) {
      this.options.health?.setStatus(this.name, "ERROR", String(error));
      this.log.error("scheduler aborted", { kind: classifyError(error), ...serializeError(error) });
      throw error;
    } finally {
      await this.shutdown();
      this.active = false;
    }
  }

  /** Runs the loop in the background; the returned promise settles when it ends. */
  start(): Promise<void> {
    if (this.active && this.completion) return this.completion;
    this.completion = this.run();
    return this.completion;
  }

  /** Takes effect once the current step and sleep complete; the sleep is cut short. */
  stop(): void {
    if (this.stopRequested) return;
    this.stopRequested = true;
    this.wake.abort();
    this.log.info("scheduler stop requested");
  }

  private async tick(): Promise<void> {
    try {
      await this.strategy.step();
      this.options.health?.noteTick(this.name);
    } catch (error) {
      const kind = classifyError(error);
      this.options.health?.noteFailure(this.name, String(error));
      const meta = { kind, ...serializeError(error) };
      if (kind === "unknown") {
        this.log.error("tick failed", meta);
      } else {
        this.log.warn("tick failed", meta);
      }
    }
  }

  private async shutdown(): Promise<void> {
    try {
      await this.strategy.shutdown();
    } catch (error) {
      this.log.warn("shutdown failed", serializeError(error));
    }
    this.log.info("scheduler stopped");
  }
}
