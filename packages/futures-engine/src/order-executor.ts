import type { OrderParams, OrderRequest, OrderResponse, FuturesSymbol } from "@perpbot/futures-core";
import { classifyError } from "@perpbot/futures-core";
import type { FuturesExchange } from "@perpbot/futures-exchange";
import { createLogger, serializeError, type Logger } from "@perpbot/core";

export type OrderExecutorOptions = {
  /** Total attempts per submission, including the first. */
  maxRetries: number;
  timeInForce: string;
  log?: Logger;
};

export function buildOrderParams(request: OrderRequest, timeInForce: string): OrderParams {
  const params: OrderParams = { timeInForce, ...request.params };
  if (request.reduceOnly) params.reduceOnly = true;
  if (request.postOnly) params.postOnly = true;
  if (request.clientOrderId) params.newClientOrderId = request.clientOrderId;
  return params;
}

export class OrderExecutor {
  readonly maxRetries: number;
  private readonly log: Logger;

  constructor(
    private readonly ex: FuturesExchange,
    private readonly options: OrderExecutorOptions
  ) {
    this.maxRetries = Math.max(1, Math.floor(options.maxRetries));
    this.log = options.log ?? createLogger("order-executor");
  }

  async submit(request: OrderRequest): Promise<OrderResponse> {
    const params = buildOrderParams(request, this.options.timeInForce);
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxRetries; attempt += 1) {
      try {
        return await this.ex.createOrder(
          request.symbol,
          request.orderType,
          request.side,
          request.amount,
          request.price,
          params
        );
      } catch (error) {
        lastError = error;
        const kind = classifyError(error);
        this.log.warn("order submission failed", {
          symbol: request.symbol,
          side: request.side,
          amount: request.amount,
          reduceOnly: request.reduceOnly,
          attempt,
          maxRetries: this.maxRetries,
          kind,
          ...serializeError(error)
        });
        if (kind !== "transient_exchange") break;
      }
    }

    throw lastError;
  }

  async cancel(symbol: FuturesSymbol, orderId: string): Promise<OrderResponse> {
    return this.ex.cancelOrder(orderId, symbol);
  }
}
