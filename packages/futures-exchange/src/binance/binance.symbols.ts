import type { FuturesSymbol } from "@perpbot/futures-core";

/** `BTC/USDT:USDT` and `btc-usdt` both become `BTCUSDT`. */
export function toBinanceSymbol(symbol: FuturesSymbol): string {
  const [market = ""] = symbol.trim().split(":");
  return market.replace(/[^A-Za-z0-9]/g, "").toUpperCase();
}

export const BINANCE_INTERVALS = new Set([
  "1m",
  "3m",
  "5m",
  "15m",
  "30m",
  "1h",
  "2h",
  "4h",
  "6h",
  "8h",
  "12h",
  "1d",
  "3d",
  "1w",
  "1M"
]);

export function isBinanceInterval(timeframe: string): boolean {
  return BINANCE_INTERVALS.has(timeframe);
}
