import assert from "node:assert/strict";
import test from "node:test";
import { TradingError } from "@perpbot/futures-core";
import { BinanceFuturesAdapter, buildOrderQuery } from "./binance.adapter.js";
import { BinanceAuthError } from "./binance.errors.js";
import type { BinanceAdapterConfig } from "./binance.types.js";

type Call = { url: string; method: string; apiKey: string | null };
type Reply = () => Response | Promise<Response>;

function json(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function createAdapter(replies: Reply[], config: BinanceAdapterConfig = {}) {
  const calls: Call[] = [];
  let index = 0;
  const adapter = new BinanceFuturesAdapter({
    apiKey: "test-key",
    apiSecret: "test-secret",
    retryBaseDelayMs: 0,
    now: () => 1_700_000_000_000,
    ...config,
    fetch: async (url, init) => {
      calls.push({
        url,
        method: init?.method ?? "GET",
        apiKey: new Headers(init?.headers).get("X-MBX-APIKEY")
      });
      const reply = replies[Math.min(index, replies.length - 1)];
      index += 1;
      if (!reply) throw new Error("no reply configured");
      return reply();
    }
  });
  return { adapter, calls };
}

test("fetchOHLCV maps klines to candles", async () => {
  const { adapter, calls } = createAdapter([
    () =>
      json([
        [1_700_000_000_000, "100.0", "101.5", "99.5", "101.0", "12.5", 1_700_000_899_999, "0", 10],
        [1_700_000_900_000, "101.0", "102.0", "100.5", "101.8", "8", 1_700_001_799_999, "0", 7]
      ])
  ]);

  const candles = await adapter.fetchOHLCV("BTC/USDT:USDT", "15m", 2);

  assert.equal(calls[0]?.url, "https://fapi.binance.com/fapi/v1/klines?interval=15m&limit=2&symbol=BTCUSDT");
  assert.equal(calls[0]?.apiKey, null);
  assert.deepEqual(candles, [
    { ts: 1_700_000_000_000, open: 100, high: 101.5, low: 99.5, close: 101, volume: 12.5 },
    { ts: 1_700_000_900_000, open: 101, high: 102, low: 100.5, close: 101.8, volume: 8 }
  ]);
});

test("fetchOHLCV rejects timeframes the venue does not serve", async () => {
  const { adapter, calls } = createAdapter([() => json([])]);

  await assert.rejects(adapter.fetchOHLCV("BTCUSDT", "7m", 10), (error: unknown) => {
    assert.ok(error instanceof TradingError);
    assert.equal(error.kind, "configuration");
    return true;
  });
  assert.equal(calls.length, 0);
});

test("loadMarkets caches quantity precision per symbol", async () => {
  const { adapter, calls } = createAdapter([
    () => json({ serverTime: 1_700_000_000_250 }),
    () =>
      json({
        symbols: [
          { symbol: "BTCUSDT", status: "TRADING", quantityPrecision: 3 },
          { symbol: "ETHUSDT", status: "TRADING", quantityPrecision: 2 }
        ]
      })
  ]);

  assert.equal(adapter.marketPrecision("BTC/USDT:USDT"), null);
  await adapter.loadMarkets();

  assert.equal(calls.length, 2);
  assert.equal(calls[0]?.url, "https://fapi.binance.com/fapi/v1/time");
  assert.equal(adapter.marketPrecision("BTC/USDT:USDT"), 3);
  assert.equal(adapter.marketPrecision("ETHUSDT"), 2);
  assert.equal(adapter.marketPrecision("SOLUSDT"), null);
});

test("fetchPosition reports absolute size and side from the signed amount", async () => {
  const { adapter, calls } = createAdapter([
    () =>
      json([
        {
          symbol: "BTCUSDT",
          positionAmt: "-0.010",
          entryPrice: "27000.0",
          markPrice: "26900.0",
          unRealizedProfit: "1.0"
        }
      ])
  ]);

  const position = await adapter.fetchPosition("BTC/USDT:USDT");

  assert.equal(calls[0]?.apiKey, "test-key");
  assert.deepEqual(position, {
    symbol: "BTC/USDT:USDT",
    side: "short",
    size: 0.01,
    entryPrice: 27000,
    markPrice: 26900,
    unrealizedPnl: 1
  });
});

test("fetchPosition returns null when the venue holds nothing", async () => {
  const { adapter } = createAdapter([
    () => json([{ symbol: "BTCUSDT", positionAmt: "0.000", entryPrice: "0.0" }])
  ]);

  assert.equal(await adapter.fetchPosition("BTCUSDT"), null);
});

test("fetchAccountMetrics reads wallet balance as equity", async () => {
  const { adapter } = createAdapter([
    () => json({ totalWalletBalance: "10000.00", totalUnrealizedProfit: "-12.5", totalMarginBalance: "9987.5" })
  ]);

  assert.deepEqual(await adapter.fetchAccountMetrics(), {
    equity: 10000,
    unrealizedProfit: -12.5,
    marginBalance: 9987.5
  });
});

test("createOrder sends a signed market order and maps the fill", async () => {
  const { adapter, calls } = createAdapter([
    () => json({ orderId: 42, clientOrderId: "abc", status: "FILLED", avgPrice: "27000.5", executedQty: "0.002" })
  ]);

  const response = await adapter.createOrder("BTC/USDT:USDT", "market", "buy", 0.002, undefined, {
    timeInForce: "GTC",
    reduceOnly: false,
    postOnly: false
  });

  assert.equal(calls.length, 1);
  assert.equal(calls[0]?.method, "POST");
  assert.equal(calls[0]?.apiKey, "test-key");
  assert.equal(
    calls[0]?.url,
    "https://fapi.binance.com/fapi/v1/order?newOrderRespType=RESULT&quantity=0.002&recvWindow=5000" +
      "&side=BUY&symbol=BTCUSDT&timestamp=1700000000000&type=MARKET" +
      "&signature=8d98dd5e76a929f9d3439d321eab5e212c39463296870f0605b51338ae837d8e"
  );
  assert.equal(response.id, "42");
  assert.equal(response.average, 27000.5);
  assert.equal(response.status, "FILLED");
});

test("createOrder refuses a market the venue lists as not trading", async () => {
  const { adapter, calls } = createAdapter([
    () => json({ serverTime: 1_700_000_000_250 }),
    () =>
      json({
        symbols: [
          { symbol: "BTCUSDT", status: "SETTLING", quantityPrecision: 3 },
          { symbol: "ETHUSDT", status: "TRADING", quantityPrecision: 2 }
        ]
      }),
    () => json({ orderId: 9, status: "FILLED", avgPrice: "1800.0" })
  ]);
  await adapter.loadMarkets();

  await assert.rejects(
    adapter.createOrder("BTC/USDT:USDT", "market", "buy", 0.002, undefined, {}),
    (error: unknown) => {
      assert.ok(error instanceof TradingError);
      assert.equal(error.kind, "configuration");
      assert.equal(error.message, "Market BTCUSDT is not tradable (status SETTLING)");
      return true;
    }
  );
  assert.equal(calls.length, 2);

  const response = await adapter.createOrder("ETHUSDT", "market", "buy", 0.5, undefined, {});
  assert.equal(response.id, "9");
  assert.equal(calls.length, 3);
  assert.equal(calls[2]?.method, "POST");
});

test("createOrder reports an unfilled average as null", async () => {
  const { adapter } = createAdapter([() => json({ orderId: "7", status: "NEW", avgPrice: "0.00" })]);

  const response = await adapter.createOrder("BTCUSDT", "market", "sell", 1, undefined, {});

  assert.equal(response.average, null);
});

test("buildOrderQuery maps reduce-only and post-only flags", () => {
  assert.deepEqual(
    buildOrderQuery({
      symbol: "BTCUSDT",
      type: "limit",
      side: "sell",
      amount: 0.5,
      price: 27100,
      extra: { timeInForce: "GTC", reduceOnly: true, postOnly: true, newClientOrderId: "close-1" }
    }),
    {
      symbol: "BTCUSDT",
      side: "SELL",
      type: "LIMIT",
      quantity: 0.5,
      newOrderRespType: "RESULT",
      price: 27100,
      timeInForce: "GTX",
      reduceOnly: "true",
      newClientOrderId: "close-1"
    }
  );
});

test("buildOrderQuery drops time in force on market orders", () => {
  const query = buildOrderQuery({
    symbol: "BTCUSDT",
    type: "market",
    side: "buy",
    amount: 1,
    extra: { timeInForce: "GTC", reduceOnly: false, postOnly: false }
  });

  assert.equal(query.timeInForce, undefined);
  assert.equal(query.reduceOnly, undefined);
});

test("setMarginMode tolerates an unchanged margin type", async () => {
  const { adapter, calls } = createAdapter([
    () => json({ code: -4046, msg: "No need to change margin type." }, 400)
  ]);

  await adapter.setMarginMode("BTCUSDT", "cross");

  assert.equal(calls.length, 1);
  assert.match(calls[0]?.url ?? "", /marginType=CROSSED/);
});

test("reads are retried on transient failures", async () => {
  const { adapter, calls } = createAdapter([
    () => new Response("Service Unavailable", { status: 503 }),
    () => new Response("Service Unavailable", { status: 503 }),
    () => json({ totalWalletBalance: "5" })
  ]);

  const metrics = await adapter.fetchAccountMetrics();

  assert.equal(metrics.equity, 5);
  assert.equal(calls.length, 3);
});

test("network failures surface as transient after the retry budget", async () => {
  const { adapter, calls } = createAdapter([
    () => {
      throw new TypeError("fetch failed");
    }
  ]);

  await assert.rejects(adapter.fetchOHLCV("BTCUSDT", "1h", 5), (error: unknown) => {
    assert.ok(error instanceof TradingError);
    assert.equal(error.kind, "transient_exchange");
    return true;
  });
  assert.equal(calls.length, 3);
});

test("order placement is never retried by the client", async () => {
  const { adapter, calls } = createAdapter([() => new Response("Bad Gateway", { status: 502 })]);

  await assert.rejects(adapter.createOrder("BTCUSDT", "market", "buy", 1, undefined, {}), (error: unknown) => {
    assert.ok(error instanceof TradingError);
    assert.equal(error.kind, "transient_exchange");
    return true;
  });
  assert.equal(calls.length, 1);
});

test("auth rejections are not retried", async () => {
  const { adapter, calls } = createAdapter([
    () => json({ code: -2015, msg: "Invalid API-key, IP, or permissions for action." }, 401)
  ]);

  await assert.rejects(adapter.fetchAccountMetrics(), BinanceAuthError);
  assert.equal(calls.length, 1);
});

test("signed calls without credentials fail before reaching the network", async () => {
  const { adapter, calls } = createAdapter([() => json({})], { apiKey: undefined, apiSecret: undefined });

  await assert.rejects(adapter.fetchAccountMetrics(), (error: unknown) => {
    assert.ok(error instanceof TradingError);
    assert.equal(error.kind, "configuration");
    return true;
  });
  assert.equal(calls.length, 0);
});
