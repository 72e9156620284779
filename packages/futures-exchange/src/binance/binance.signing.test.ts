import assert from "node:assert/strict";
import test from "node:test";
import { buildQueryString, buildSignedQuery, signQuery } from "./binance.signing.js";

test("buildQueryString sorts keys, drops empty values and url-encodes", () => {
  const query = buildQueryString({
    symbol: "BTCUSDT",
    note: "a b",
    limit: 3,
    skipped: undefined,
    nothing: null
  });

  assert.equal(query, "limit=3&note=a%20b&symbol=BTCUSDT");
});

test("buildQueryString returns empty string without a query", () => {
  assert.equal(buildQueryString(undefined), "");
  assert.equal(buildQueryString({}), "");
});

test("signQuery produces the HMAC-SHA256 hex digest", () => {
  const signature = signQuery("symbol=BTCUSDT&timestamp=1700000000000", "test-secret");
  assert.equal(signature, "4e7e8444963d2d57498c79c818e00d7325c0de1fe36287ea426397a06945cbea");
});

test("buildSignedQuery signs the sorted parameters and appends the signature last", () => {
  const signed = buildSignedQuery(
    {
      symbol: "BTCUSDT",
      side: "BUY",
      type: "MARKET",
      quantity: 0.002,
      timestamp: 1700000000000,
      recvWindow: 5000
    },
    "test-secret"
  );

  assert.equal(
    signed,
    "quantity=0.002&recvWindow=5000&side=BUY&symbol=BTCUSDT&timestamp=1700000000000&type=MARKET" +
      "&signature=93d478204f31346564eadcc7e38ea97b7479b6d260c269ac8d3dc47481ce6b71"
  );
});
