import { readFile } from "node:fs/promises";
import { z } from "zod";
import { parseLogThreshold, type LogThreshold } from "@perpbot/core";
import { ConfigurationError } from "@perpbot/futures-core";

const positiveInt = z.number().int().positive();
const positive = z.number().positive();
const ratio = z.number().min(0);

const riskLimitFields = z.object({
  maxLeverage: positive.default(5),
  maxPositionRatio: positive.default(0.3),
  portfolioExposureLimit: positive.default(3),
  riskPerTrade: positive.max(1).default(0.01),
  minTrendStrength: z.number().default(1),
  minVolatilityRatio: ratio.default(0.001),
  maxVolatilityRatio: ratio.default(0.03)
});

export const riskLimitsSchema = riskLimitFields.refine(
  (limits) => limits.minVolatilityRatio <= limits.maxVolatilityRatio,
  { message: "minVolatilityRatio must not exceed maxVolatilityRatio", path: ["minVolatilityRatio"] }
);

const strategyFields = z.object({
  symbol: z.string().trim().min(1),
  signalTimeframe: z.string().min(1).default("1h"),
  executionTimeframe: z.string().min(1).default("15m"),
  signalLookback: positiveInt.default(240),
  executionLookback: positiveInt.default(180),
  emaFast: positiveInt.default(50),
  emaSlow: positiveInt.default(200),
  adxPeriod: positiveInt.default(14),
  adxThreshold: z.number().min(0).max(100).default(25),
  atrPeriod: positiveInt.default(21),
  donchianPeriod: positiveInt.default(20),
  keltnerMultiplier: positive.default(2),
  atrStopMultiplier: positive.default(2.5),
  trailingAtrMultiplier: positive.default(3),
  loopIntervalMs: positiveInt.default(60_000),
  contractMultiplier: positive.default(1),
  leverage: positiveInt.default(3),
  marginMode: z.enum(["isolated", "cross"]).default("cross"),
  maxRetries: positiveInt.default(3),
  timeInForce: z.enum(["GTC", "IOC", "FOK", "GTX"]).default("GTC"),
  riskLimits: riskLimitsSchema.default({})
});

export const strategyConfigSchema = strategyFields.refine((cfg) => cfg.emaFast < cfg.emaSlow, {
  message: "emaFast must be shorter than emaSlow",
  path: ["emaFast"]
});

export type StrategyConfig = z.infer<typeof strategyConfigSchema>;

const strategyOverrideSchema = strategyFields
  .omit({ symbol: true, riskLimits: true })
  .partial()
  .extend({ riskLimits: riskLimitFields.partial().strict().optional() })
  .strict();

export const overridesFileSchema = z
  .object({
    defaults: strategyOverrideSchema.optional(),
    symbols: z.record(strategyOverrideSchema).optional()
  })
  .strict();

export type StrategyOverride = z.infer<typeof strategyOverrideSchema>;
export type OverridesFile = z.infer<typeof overridesFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`).join("; ");
}

export function parseOverrides(raw: unknown): OverridesFile {
  const parsed = overridesFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid overrides: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export async function loadOverridesFile(path: string): Promise<OverridesFile> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${path}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Config file ${path} is not valid JSON`, { cause: error });
  }
  return parseOverrides(raw);
}

/** Defaults, then shared overrides, then the symbol's own block. */
export function resolveStrategyConfig(symbol: string, overrides: OverridesFile = {}): StrategyConfig {
  const shared = overrides.defaults ?? {};
  const own = overrides.symbols?.[symbol] ?? {};
  const parsed = strategyConfigSchema.safeParse({
    ...shared,
    ...own,
    symbol,
    riskLimits: { ...shared.riskLimits, ...own.riskLimits }
  });
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid config for ${symbol}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

const flag = z
  .string()
  .optional()
  .transform((value) => ["1", "true", "yes", "on"].includes((value ?? "").trim().toLowerCase()));

const runtimeEnvSchema = z.object({
  BINANCE_API_KEY: z.string().optional(),
  BINANCE_API_SECRET: z.string().optional(),
  BINANCE_BASE_URL: z.string().url().optional(),
  BINANCE_TESTNET: flag,
  BINANCE_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
  BINANCE_RECV_WINDOW: z.coerce.number().int().positive().max(60_000).optional(),
  SYMBOLS: z.string().optional(),
  PERPBOT_CONFIG: z.string().optional(),
  LOG_LEVEL: z.string().optional()
});

export type RuntimeEnv = {
  apiKey?: string;
  apiSecret?: string;
  restBaseUrl?: string;
  testnet: boolean;
  timeoutMs?: number;
  recvWindow?: number;
  symbols: string[];
  configPath?: string;
  logLevel: LogThreshold;
};

export function parseSymbolList(raw: string | null | undefined): string[] {
  return [
    ...new Set(
      (raw ?? "")
        .split(",")
        .map((item) => item.trim())
        .filter((item) => item.length > 0)
    )
  ];
}

export function loadRuntimeEnv(env: NodeJS.ProcessEnv = process.env): RuntimeEnv {
  const parsed = runtimeEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid environment: ${formatIssues(parsed.error)}`);
  }
  const data = parsed.data;
  return {
    apiKey: data.BINANCE_API_KEY || undefined,
    apiSecret: data.BINANCE_API_SECRET || undefined,
    restBaseUrl: data.BINANCE_BASE_URL,
    testnet: data.BINANCE_TESTNET,
    timeoutMs: data.BINANCE_TIMEOUT_MS,
    recvWindow: data.BINANCE_RECV_WINDOW,
    symbols: parseSymbolList(data.SYMBOLS),
    configPath: data.PERPBOT_CONFIG || undefined,
    logLevel: parseLogThreshold(data.LOG_LEVEL)
  };
}
