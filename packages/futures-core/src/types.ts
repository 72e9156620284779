export type MarginMode = "isolated" | "cross";
export type PositionSide = "long" | "short";
export type TrendDirection = PositionSide | "flat";
export type OrderSide = "buy" | "sell";
export type OrderType = "market" | "limit";

export type FuturesSymbol = string;

export type Candle = {
  ts: number;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
};

/** Position as reported by the venue; `size` is the absolute contract amount. */
export type ExchangePosition = {
  symbol: FuturesSymbol;
  side: PositionSide;
  size: number;
  entryPrice: number;
  markPrice?: number;
  unrealizedPnl?: number;
};

export type AccountMetrics = {
  equity: number;
  unrealizedProfit?: number;
  marginBalance?: number;
};

export type RiskLimits = {
  maxLeverage: number;
  /** Single-instrument notional / equity. */
  maxPositionRatio: number;
  /** Advisory only; no instrument enforces it. */
  portfolioExposureLimit: number;
  riskPerTrade: number;
  minTrendStrength: number;
  minVolatilityRatio: number;
  maxVolatilityRatio: number;
};

export type PositionState = {
  size: number;
  side: PositionSide | null;
  entryPrice: number;
  stopLoss: number | null;
  takeProfit: number | null;
  unrealizedPnl: number;
};

export type OrderParams = Record<string, string | number | boolean>;

export type OrderRequest = {
  symbol: FuturesSymbol;
  side: OrderSide;
  amount: number;
  orderType: OrderType;
  price?: number;
  reduceOnly: boolean;
  postOnly: boolean;
  clientOrderId?: string;
  params?: OrderParams;
};

export type OrderResponse = {
  id: string;
  average?: number | null;
  status?: string;
  raw?: unknown;
};

export type CloseReason = "trend_exit" | "trend_flip" | "keltner_break";

export interface TradingStrategy {
  initialize(): Promise<void>;
  step(): Promise<unknown>;
  shutdown(): Promise<void>;
}
