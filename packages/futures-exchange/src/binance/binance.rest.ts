import { TransientExchangeError, isTransient } from "@perpbot/futures-core";
import {
  BINANCE_API_KEY_HEADER,
  BINANCE_DEFAULT_RECV_WINDOW,
  BINANCE_DEFAULT_REST_BASE_URL,
  BINANCE_DEFAULT_RETRY_ATTEMPTS,
  BINANCE_DEFAULT_RETRY_BASE_DELAY_MS,
  BINANCE_DEFAULT_TIMEOUT_MS,
  BINANCE_ENDPOINTS
} from "./binance.constants.js";
import { BinanceApiError, BinanceClockSkewError, toBinanceError } from "./binance.errors.js";
import { binanceErrorSchema, binanceServerTimeSchema } from "./binance.schemas.js";
import { buildQueryString, buildSignedQuery, type QueryValue } from "./binance.signing.js";
import type { BinanceAdapterConfig, BinanceLogEntry, FetchLike, HttpMethod } from "./binance.types.js";

export type Parser<T> = { parse(input: unknown): T };

function sleep(ms: number) {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function nowIso() {
  return new Date().toISOString();
}

function parseBody(text: string): unknown {
  if (!text) return {};
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export type BinanceRestClientOptions = Pick<
  BinanceAdapterConfig,
  | "apiKey"
  | "apiSecret"
  | "restBaseUrl"
  | "timeoutMs"
  | "retryAttempts"
  | "retryBaseDelayMs"
  | "recvWindow"
  | "fetch"
  | "now"
  | "log"
>;

export class BinanceRestClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly retryAttempts: number;
  readonly retryBaseDelayMs: number;
  readonly recvWindow: number;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private timeOffsetMs = 0;

  constructor(private readonly options: BinanceRestClientOptions = {}) {
    this.baseUrl = (options.restBaseUrl ?? BINANCE_DEFAULT_REST_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? BINANCE_DEFAULT_TIMEOUT_MS;
    this.retryAttempts = Math.max(1, options.retryAttempts ?? BINANCE_DEFAULT_RETRY_ATTEMPTS);
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? BINANCE_DEFAULT_RETRY_BASE_DELAY_MS;
    this.recvWindow = options.recvWindow ?? BINANCE_DEFAULT_RECV_WINDOW;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
  }

  get hasCredentials(): boolean {
    return Boolean(this.options.apiKey && this.options.apiSecret);
  }

  private log(entry: Omit<BinanceLogEntry, "at">): void {
    if (!this.options.log) return;
    this.options.log({
      at: nowIso(),
      ...entry
    });
  }

  /** Aligns signed-request timestamps with the venue clock. */
  async syncTime(): Promise<number> {
    const started = this.now();
    const payload = await this.requestPublic(binanceServerTimeSchema, "GET", BINANCE_ENDPOINTS.time);
    const finished = this.now();
    this.timeOffsetMs = payload.serverTime - Math.round((started + finished) / 2);
    return this.timeOffsetMs;
  }

  private buildUrl(params: {
    endpoint: string;
    query?: Record<string, QueryValue>;
    privateAuth: boolean;
  }): string {
    let queryString: string;
    if (params.privateAuth) {
      const apiSecret = this.options.apiSecret;
      if (!this.options.apiKey || !apiSecret) {
        throw toBinanceError({
          endpoint: params.endpoint,
          method: "AUTH",
          status: 401,
          message: "Missing Binance credentials"
        });
      }
      queryString = buildSignedQuery(
        {
          ...params.query,
          recvWindow: this.recvWindow,
          timestamp: this.now() + this.timeOffsetMs
        },
        apiSecret
      );
    } else {
      queryString = buildQueryString(params.query);
    }
    return `${this.baseUrl}${params.endpoint}${queryString ? `?${queryString}` : ""}`;
  }

  private async doRequest(params: {
    method: HttpMethod;
    endpoint: string;
    query?: Record<string, QueryValue>;
    privateAuth: boolean;
    attempt: number;
  }): Promise<unknown> {
    const startedAt = this.now();
    const requestId = `${startedAt}-${Math.random().toString(16).slice(2, 8)}`;
    const url = this.buildUrl(params);

    const headers: Record<string, string> = {};
    if (params.privateAuth && this.options.apiKey) {
      headers[BINANCE_API_KEY_HEADER] = this.options.apiKey;
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const res = await this.fetchImpl(url, {
        method: params.method,
        headers,
        signal: controller.signal
      });

      const payload = parseBody(await res.text());
      const apiError = binanceErrorSchema.safeParse(payload);

      if (!res.ok || (apiError.success && apiError.data.code < 0)) {
        throw toBinanceError({
          endpoint: params.endpoint,
          method: params.method,
          status: res.status,
          code: apiError.success ? apiError.data.code : undefined,
          message: apiError.success ? apiError.data.msg : `HTTP ${res.status}`,
          responseBody: payload
        });
      }

      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: this.now() - startedAt,
        status: res.status,
        ok: true,
        attempt: params.attempt,
        requestId
      });

      return payload;
    } catch (error) {
      this.log({
        endpoint: params.endpoint,
        method: params.method,
        durationMs: this.now() - startedAt,
        status: error instanceof BinanceApiError ? error.options.status : undefined,
        code: error instanceof BinanceApiError ? error.options.code : undefined,
        ok: false,
        attempt: params.attempt,
        message: String(error),
        requestId
      });
      if (!(error instanceof BinanceApiError) && isTransient(error)) {
        throw new TransientExchangeError(`${params.method} ${params.endpoint} failed: ${String(error)}`, {
          cause: error
        });
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  /** Only idempotent reads are retried; order placement retries belong to the caller. */
  private async withRetry<T>(
    method: HttpMethod,
    fn: (attempt: number) => Promise<T>
  ): Promise<T> {
    const attempts = method === "GET" ? this.retryAttempts : 1;
    let attempt = 0;
    let lastError: unknown;

    while (attempt < attempts) {
      attempt += 1;
      try {
        return await fn(attempt);
      } catch (error) {
        lastError = error;
        if (!isTransient(error) || attempt >= attempts) break;
        if (error instanceof BinanceClockSkewError) {
          await this.syncTime();
        }
        await sleep(this.retryBaseDelayMs * 2 ** (attempt - 1));
      }
    }

    throw lastError;
  }

  async requestPublic<T>(
    schema: Parser<T>,
    method: HttpMethod,
    endpoint: string,
    query?: Record<string, QueryValue>
  ): Promise<T> {
    const payload = await this.withRetry(method, (attempt) =>
      this.doRequest({ method, endpoint, query, privateAuth: false, attempt })
    );
    return schema.parse(payload);
  }

  async requestPrivate<T>(
    schema: Parser<T>,
    params: {
      method: HttpMethod;
      endpoint: string;
      query?: Record<string, QueryValue>;
    }
  ): Promise<T> {
    const payload = await this.withRetry(params.method, (attempt) =>
      this.doRequest({ ...params, privateAuth: true, attempt })
    );
    return schema.parse(payload);
  }
}
