import type {
  AccountMetrics,
  Candle,
  ExchangePosition,
  FuturesSymbol,
  MarginMode,
  OrderParams,
  OrderResponse,
  OrderSide,
  OrderType
} from "@perpbot/futures-core";

export interface FuturesExchange {
  /** Must run before any market-dependent call. */
  loadMarkets(): Promise<void>;
  fetchOHLCV(symbol: FuturesSymbol, timeframe: string, limit: number): Promise<Candle[]>;
  fetchPosition(symbol: FuturesSymbol): Promise<ExchangePosition | null>;
  fetchAccountMetrics(): Promise<AccountMetrics>;
  createOrder(
    symbol: FuturesSymbol,
    type: OrderType,
    side: OrderSide,
    amount: number,
    price: number | undefined,
    params: OrderParams
  ): Promise<OrderResponse>;
  cancelOrder(orderId: string, symbol: FuturesSymbol): Promise<OrderResponse>;
  setLeverage(symbol: FuturesSymbol, leverage: number): Promise<void>;
  setMarginMode(symbol: FuturesSymbol, mode: MarginMode): Promise<void>;
  /** Decimal places allowed for order quantity, null when unknown. */
  marketPrecision(symbol: FuturesSymbol): number | null;
  close(): Promise<void>;
}
