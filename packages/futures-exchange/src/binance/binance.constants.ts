export const BINANCE_DEFAULT_REST_BASE_URL = "https://fapi.binance.com";
export const BINANCE_TESTNET_REST_BASE_URL = "https://testnet.binancefuture.com";

export const BINANCE_DEFAULT_TIMEOUT_MS = 12_000;
export const BINANCE_DEFAULT_RETRY_ATTEMPTS = 3;
export const BINANCE_DEFAULT_RETRY_BASE_DELAY_MS = 300;
export const BINANCE_DEFAULT_RECV_WINDOW = 5_000;

export const BINANCE_API_KEY_HEADER = "X-MBX-APIKEY";

export const BINANCE_ENDPOINTS = {
  time: "/fapi/v1/time",
  exchangeInfo: "/fapi/v1/exchangeInfo",
  klines: "/fapi/v1/klines",
  positionRisk: "/fapi/v2/positionRisk",
  account: "/fapi/v2/account",
  order: "/fapi/v1/order",
  leverage: "/fapi/v1/leverage",
  marginType: "/fapi/v1/marginType"
} as const;

export const BINANCE_AUTH_CODES = new Set([-1022, -2014, -2015]);
export const BINANCE_RATE_LIMIT_CODES = new Set([-1003, -1015]);
export const BINANCE_SERVICE_CODES = new Set([-1000, -1001, -1006, -1007, -1008]);
export const BINANCE_TIMESTAMP_CODE = -1021;
export const BINANCE_MARGIN_TYPE_UNCHANGED_CODE = -4046;

export const BINANCE_BLOCKED_SYMBOL_STATUSES = new Set([
  "PENDING_TRADING",
  "CLOSE",
  "SETTLING",
  "DELIVERING",
  "DELIVERED",
  "PRE_DELIVERING",
  "PRE_SETTLE"
]);
