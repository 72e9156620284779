export type ErrorKind = "data_insufficient" | "transient_exchange" | "configuration" | "unknown";

export class TradingError extends Error {
  constructor(
    message: string,
    public readonly kind: ErrorKind,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "TradingError";
  }
}

export class TransientExchangeError extends TradingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "transient_exchange", options);
    this.name = "TransientExchangeError";
  }
}

export class ConfigurationError extends TradingError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, "configuration", options);
    this.name = "ConfigurationError";
  }
}

const TRANSIENT_NAMES = new Set(["AbortError", "TimeoutError"]);

export function classifyError(error: unknown): ErrorKind {
  if (error instanceof TradingError) return error.kind;
  if (error instanceof Error) {
    if (TRANSIENT_NAMES.has(error.name)) return "transient_exchange";
    // undici reports connection failures as TypeError("fetch failed")
    if (error instanceof TypeError && error.message.toLowerCase().includes("fetch failed")) {
      return "transient_exchange";
    }
  }
  return "unknown";
}

export function isTransient(error: unknown): boolean {
  return classifyError(error) === "transient_exchange";
}
