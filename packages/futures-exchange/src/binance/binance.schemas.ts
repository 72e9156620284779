import { z } from "zod";

const num = z.coerce.number();

export const binanceErrorSchema = z.object({
  code: z.number(),
  msg: z.string()
});

export const binanceServerTimeSchema = z.object({
  serverTime: z.number()
});

export const binanceExchangeInfoSchema = z.object({
  symbols: z.array(
    z.object({
      symbol: z.string(),
      status: z.string().default("TRADING"),
      quantityPrecision: z.number().int().min(0)
    })
  )
});

// [openTime, open, high, low, close, volume, closeTime, ...]
export const binanceKlinesSchema = z.array(z.tuple([z.number(), num, num, num, num, num]).rest(z.unknown()));

export const binancePositionRiskSchema = z.array(
  z.object({
    symbol: z.string(),
    positionAmt: num,
    entryPrice: num,
    markPrice: num.optional(),
    unRealizedProfit: num.optional(),
    positionSide: z.string().optional()
  })
);

export const binanceAccountSchema = z.object({
  totalWalletBalance: num,
  totalUnrealizedProfit: num.optional(),
  totalMarginBalance: num.optional()
});

export const binanceOrderSchema = z.object({
  orderId: z.union([z.number(), z.string()]),
  clientOrderId: z.string().optional(),
  status: z.string().optional(),
  avgPrice: num.optional(),
  executedQty: num.optional()
});

export type BinancePositionRow = z.infer<typeof binancePositionRiskSchema>[number];
export type BinanceOrderRaw = z.infer<typeof binanceOrderSchema>;
