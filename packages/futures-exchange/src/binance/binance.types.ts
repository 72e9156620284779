export type HttpMethod = "GET" | "POST" | "DELETE";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type BinanceLogEntry = {
  at: string;
  endpoint: string;
  method: HttpMethod;
  durationMs: number;
  status?: number;
  code?: number;
  ok: boolean;
  attempt?: number;
  message?: string;
  requestId?: string;
};

export type BinanceAdapterConfig = {
  apiKey?: string;
  apiSecret?: string;
  restBaseUrl?: string;
  timeoutMs?: number;
  retryAttempts?: number;
  retryBaseDelayMs?: number;
  recvWindow?: number;
  fetch?: FetchLike;
  now?: () => number;
  log?: (entry: BinanceLogEntry) => void;
};

export type BinanceMarket = {
  symbol: string;
  status: string;
  tradable: boolean;
  quantityPrecision: number;
};
