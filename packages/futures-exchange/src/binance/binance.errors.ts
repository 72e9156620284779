import { TradingError, type ErrorKind } from "@perpbot/futures-core";
import {
  BINANCE_AUTH_CODES,
  BINANCE_RATE_LIMIT_CODES,
  BINANCE_SERVICE_CODES,
  BINANCE_TIMESTAMP_CODE
} from "./binance.constants.js";

export type BinanceErrorOptions = {
  endpoint: string;
  method: string;
  status?: number;
  code?: number;
  responseBody?: unknown;
};

export class BinanceApiError extends TradingError {
  constructor(
    message: string,
    public readonly options: BinanceErrorOptions,
    kind: ErrorKind = "unknown"
  ) {
    super(message, kind);
    this.name = "BinanceApiError";
  }
}

export class BinanceAuthError extends BinanceApiError {
  constructor(message: string, options: BinanceErrorOptions) {
    super(message, options, "configuration");
    this.name = "BinanceAuthError";
  }
}

export class BinanceRateLimitError extends BinanceApiError {
  constructor(message: string, options: BinanceErrorOptions) {
    super(message, options, "transient_exchange");
    this.name = "BinanceRateLimitError";
  }
}

export class BinanceServiceError extends BinanceApiError {
  constructor(message: string, options: BinanceErrorOptions) {
    super(message, options, "transient_exchange");
    this.name = "BinanceServiceError";
  }
}

export class BinanceClockSkewError extends BinanceApiError {
  constructor(message: string, options: BinanceErrorOptions) {
    super(message, options, "transient_exchange");
    this.name = "BinanceClockSkewError";
  }
}

export function toBinanceError(params: BinanceErrorOptions & { message?: string }): BinanceApiError {
  const { message: rawMessage, ...options } = params;
  const message = rawMessage ?? "Binance request failed";
  const code = options.code;
  const status = options.status ?? 0;

  if (status === 401 || (code !== undefined && BINANCE_AUTH_CODES.has(code))) {
    return new BinanceAuthError(message, options);
  }

  if (status === 429 || status === 418 || (code !== undefined && BINANCE_RATE_LIMIT_CODES.has(code))) {
    return new BinanceRateLimitError(message, options);
  }

  if (code === BINANCE_TIMESTAMP_CODE) {
    return new BinanceClockSkewError(message, options);
  }

  if (status >= 500 || (code !== undefined && BINANCE_SERVICE_CODES.has(code))) {
    return new BinanceServiceError(message, options);
  }

  return new BinanceApiError(message, options);
}
