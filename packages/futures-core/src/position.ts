import type { ExchangePosition, PositionSide, PositionState } from "./types.js";

export function emptyPosition(): PositionState {
  return {
    size: 0,
    side: null,
    entryPrice: 0,
    stopLoss: null,
    takeProfit: null,
    unrealizedPnl: 0
  };
}

export function isOpen(position: PositionState): position is PositionState & { side: PositionSide } {
  return position.side !== null && position.size > 0;
}

export function openedPosition(params: {
  side: PositionSide;
  size: number;
  entryPrice: number;
  stopLoss: number | null;
}): PositionState {
  return {
    size: params.size,
    side: params.side,
    entryPrice: params.entryPrice,
    stopLoss: params.stopLoss,
    takeProfit: null,
    unrealizedPnl: 0
  };
}

/**
 * Exchange-sourced fields are replaced as a whole; the locally tracked stopLoss
 * and takeProfit are merged back whenever the venue reports an open position.
 */
export function resyncPosition(local: PositionState, reported: ExchangePosition | null): PositionState {
  if (!reported) return emptyPosition();
  const size = Math.abs(reported.size);
  if (!Number.isFinite(size) || size <= 0) return emptyPosition();

  return {
    size,
    side: reported.side,
    entryPrice: reported.entryPrice > 0 ? reported.entryPrice : reported.markPrice ?? 0,
    stopLoss: local.stopLoss,
    takeProfit: local.takeProfit,
    unrealizedPnl: reported.unrealizedPnl ?? 0
  };
}

export function toOrderSide(side: PositionSide): "buy" | "sell" {
  return side === "long" ? "buy" : "sell";
}

export function closingOrderSide(side: PositionSide): "buy" | "sell" {
  return side === "long" ? "sell" : "buy";
}
