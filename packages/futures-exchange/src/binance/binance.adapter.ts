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
import { ConfigurationError } from "@perpbot/futures-core";
import type { FuturesExchange } from "../futures-exchange.interface.js";
import {
  BINANCE_BLOCKED_SYMBOL_STATUSES,
  BINANCE_ENDPOINTS,
  BINANCE_MARGIN_TYPE_UNCHANGED_CODE
} from "./binance.constants.js";
import { BinanceApiError } from "./binance.errors.js";
import { BinanceRestClient } from "./binance.rest.js";
import {
  binanceAccountSchema,
  binanceExchangeInfoSchema,
  binanceKlinesSchema,
  binanceOrderSchema,
  binancePositionRiskSchema,
  type BinanceOrderRaw,
  type BinancePositionRow
} from "./binance.schemas.js";
import type { QueryValue } from "./binance.signing.js";
import { isBinanceInterval, toBinanceSymbol } from "./binance.symbols.js";
import type { BinanceAdapterConfig, BinanceMarket } from "./binance.types.js";

const MAX_KLINES = 1500;

function mapMarginMode(mode: MarginMode): "ISOLATED" | "CROSSED" {
  return mode === "isolated" ? "ISOLATED" : "CROSSED";
}

function mapPosition(symbol: FuturesSymbol, row: BinancePositionRow): ExchangePosition {
  return {
    symbol,
    side: row.positionAmt > 0 ? "long" : "short",
    size: Math.abs(row.positionAmt),
    entryPrice: row.entryPrice,
    markPrice: row.markPrice,
    unrealizedPnl: row.unRealizedProfit
  };
}

function mapOrder(raw: BinanceOrderRaw): OrderResponse {
  const average = raw.avgPrice !== undefined && raw.avgPrice > 0 ? raw.avgPrice : null;
  return {
    id: String(raw.orderId),
    average,
    status: raw.status,
    raw
  };
}

function isTruthyFlag(value: string | number | boolean | undefined): boolean {
  return value === true || value === "true";
}

/** Translates engine order params into USDⓈ-M order fields. */
export function buildOrderQuery(params: {
  symbol: string;
  type: OrderType;
  side: OrderSide;
  amount: number;
  price?: number;
  extra: OrderParams;
}): Record<string, QueryValue> {
  const { timeInForce, reduceOnly, postOnly, newClientOrderId, clientOrderId, ...rest } = params.extra;
  const query: Record<string, QueryValue> = {
    ...rest,
    symbol: params.symbol,
    side: params.side === "buy" ? "BUY" : "SELL",
    type: params.type === "market" ? "MARKET" : "LIMIT",
    quantity: params.amount,
    newOrderRespType: "RESULT"
  };

  if (params.type === "limit") {
    if (params.price === undefined) {
      throw new ConfigurationError("Limit orders require a price");
    }
    query.price = params.price;
    query.timeInForce = isTruthyFlag(postOnly) ? "GTX" : String(timeInForce ?? "GTC");
  }

  if (isTruthyFlag(reduceOnly)) query.reduceOnly = "true";

  const clientId = newClientOrderId ?? clientOrderId;
  if (clientId !== undefined && clientId !== "") query.newClientOrderId = String(clientId);

  return query;
}

export class BinanceFuturesAdapter implements FuturesExchange {
  readonly rest: BinanceRestClient;
  private readonly markets = new Map<string, BinanceMarket>();
  private closed = false;

  constructor(config: BinanceAdapterConfig = {}) {
    this.rest = new BinanceRestClient(config);
  }

  async loadMarkets(): Promise<void> {
    if (this.rest.hasCredentials) {
      await this.rest.syncTime();
    }
    const info = await this.rest.requestPublic(binanceExchangeInfoSchema, "GET", BINANCE_ENDPOINTS.exchangeInfo);
    this.markets.clear();
    for (const row of info.symbols) {
      this.markets.set(row.symbol, {
        symbol: row.symbol,
        status: row.status,
        tradable: !BINANCE_BLOCKED_SYMBOL_STATUSES.has(row.status),
        quantityPrecision: row.quantityPrecision
      });
    }
  }

  marketPrecision(symbol: FuturesSymbol): number | null {
    return this.markets.get(toBinanceSymbol(symbol))?.quantityPrecision ?? null;
  }

  /** Symbols missing from the cache pass; the venue rejects what it does not list. */
  private assertTradable(exchangeSymbol: string): void {
    const market = this.markets.get(exchangeSymbol);
    if (market && !market.tradable) {
      throw new ConfigurationError(`Market ${exchangeSymbol} is not tradable (status ${market.status})`);
    }
  }

  async fetchOHLCV(symbol: FuturesSymbol, timeframe: string, limit: number): Promise<Candle[]> {
    if (!isBinanceInterval(timeframe)) {
      throw new ConfigurationError(`Unsupported timeframe: ${timeframe}`);
    }
    const rows = await this.rest.requestPublic(binanceKlinesSchema, "GET", BINANCE_ENDPOINTS.klines, {
      symbol: toBinanceSymbol(symbol),
      interval: timeframe,
      limit: Math.min(Math.max(1, Math.floor(limit)), MAX_KLINES)
    });
    return rows.map(([ts, open, high, low, close, volume]) => ({ ts, open, high, low, close, volume }));
  }

  async fetchPosition(symbol: FuturesSymbol): Promise<ExchangePosition | null> {
    const exchangeSymbol = toBinanceSymbol(symbol);
    const rows = await this.rest.requestPrivate(binancePositionRiskSchema, {
      method: "GET",
      endpoint: BINANCE_ENDPOINTS.positionRisk,
      query: { symbol: exchangeSymbol }
    });
    const row = rows.find((item) => item.symbol === exchangeSymbol && item.positionAmt !== 0);
    return row ? mapPosition(symbol, row) : null;
  }

  async fetchAccountMetrics(): Promise<AccountMetrics> {
    const account = await this.rest.requestPrivate(binanceAccountSchema, {
      method: "GET",
      endpoint: BINANCE_ENDPOINTS.account
    });
    return {
      equity: account.totalWalletBalance,
      unrealizedProfit: account.totalUnrealizedProfit,
      marginBalance: account.totalMarginBalance
    };
  }

  async createOrder(
    symbol: FuturesSymbol,
    type: OrderType,
    side: OrderSide,
    amount: number,
    price: number | undefined,
    params: OrderParams
  ): Promise<OrderResponse> {
    const exchangeSymbol = toBinanceSymbol(symbol);
    this.assertTradable(exchangeSymbol);
    const query = buildOrderQuery({
      symbol: exchangeSymbol,
      type,
      side,
      amount,
      price,
      extra: params
    });
    const raw = await this.rest.requestPrivate(binanceOrderSchema, {
      method: "POST",
      endpoint: BINANCE_ENDPOINTS.order,
      query
    });
    return mapOrder(raw);
  }

  async cancelOrder(orderId: string, symbol: FuturesSymbol): Promise<OrderResponse> {
    const raw = await this.rest.requestPrivate(binanceOrderSchema, {
      method: "DELETE",
      endpoint: BINANCE_ENDPOINTS.order,
      query: { symbol: toBinanceSymbol(symbol), orderId }
    });
    return mapOrder(raw);
  }

  async setLeverage(symbol: FuturesSymbol, leverage: number): Promise<void> {
    await this.rest.requestPrivate(
      { parse: (input: unknown) => input },
      {
        method: "POST",
        endpoint: BINANCE_ENDPOINTS.leverage,
        query: { symbol: toBinanceSymbol(symbol), leverage: Math.floor(leverage) }
      }
    );
  }

  async setMarginMode(symbol: FuturesSymbol, mode: MarginMode): Promise<void> {
    try {
      await this.rest.requestPrivate(
        { parse: (input: unknown) => input },
        {
          method: "POST",
          endpoint: BINANCE_ENDPOINTS.marginType,
          query: { symbol: toBinanceSymbol(symbol), marginType: mapMarginMode(mode) }
        }
      );
    } catch (error) {
      // -4046: margin type already set
      if (error instanceof BinanceApiError && error.options.code === BINANCE_MARGIN_TYPE_UNCHANGED_CODE) return;
      throw error;
    }
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.markets.clear();
  }
}
