export type InstrumentStatus = "INIT" | "RUNNING" | "STOPPED" | "ERROR";

export type InstrumentHealth = {
  symbol: string;
  status: InstrumentStatus;
  startedAt: number;
  lastTickAt: number;
  ticks: number;
  failedTicks: number;
  lastErrorReason: string | null;
};

export class HealthRegistry {
  private readonly instruments = new Map<string, InstrumentHealth>();

  constructor(private readonly now: () => number = Date.now) {}

  private entry(symbol: string): InstrumentHealth {
    let current = this.instruments.get(symbol);
    if (!current) {
      current = {
        symbol,
        status: "INIT",
        startedAt: this.now(),
        lastTickAt: 0,
        ticks: 0,
        failedTicks: 0,
        lastErrorReason: null
      };
      this.instruments.set(symbol, current);
    }
    return current;
  }

  register(symbol: string): void {
    this.entry(symbol);
  }

  noteTick(symbol: string): void {
    const current = this.entry(symbol);
    current.lastTickAt = this.now();
    current.ticks += 1;
    this.setStatus(symbol, "RUNNING");
  }

  noteFailure(symbol: string, reason: string): void {
    const current = this.entry(symbol);
    current.failedTicks += 1;
    this.setStatus(symbol, "ERROR", reason);
  }

  setStatus(symbol: string, status: InstrumentStatus, reason?: string | null): void {
    const current = this.entry(symbol);
    current.status = status;
    if (status === "ERROR") {
      current.lastErrorReason = reason ?? current.lastErrorReason ?? "unknown";
    }
    if (status === "RUNNING") {
      current.lastErrorReason = null;
    }
  }

  get(symbol: string): InstrumentHealth | null {
    const current = this.instruments.get(symbol);
    return current ? { ...current } : null;
  }

  summary() {
    const instruments = [...this.instruments.values()].map((item) => ({ ...item }));
    return {
      instruments,
      running: instruments.filter((item) => item.status === "RUNNING").length,
      errored: instruments.filter((item) => item.status === "ERROR").length
    };
  }
}
