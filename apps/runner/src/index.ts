import "dotenv/config";
import { parseArgs } from "node:util";
import { createLogger, serializeError, setLogThreshold } from "@perpbot/core";
import { BINANCE_TESTNET_REST_BASE_URL, BinanceFuturesAdapter } from "@perpbot/futures-exchange";
import { loadOverridesFile, loadRuntimeEnv, resolveStrategyConfig, type OverridesFile } from "./config.js";
import { HealthRegistry } from "./health.js";
import { buildInstrument, runInstruments, stopAll } from "./launch.js";

const USAGE = "Usage: perpbot-runner <SYMBOL...> [--config file.json]";

const log = createLogger("runner");

async function main(): Promise<number> {
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    options: {
      config: { type: "string", short: "c" },
      help: { type: "boolean", short: "h" }
    },
    allowPositionals: true
  });

  if (values.help) {
    console.log(USAGE);
    return 0;
  }

  const env = loadRuntimeEnv();
  setLogThreshold(env.logLevel);

  const symbols = positionals.length > 0 ? [...new Set(positionals)] : env.symbols;
  if (symbols.length === 0) {
    log.error("no symbols given", { usage: USAGE });
    return 2;
  }

  const configPath = values.config ?? env.configPath;
  const overrides: OverridesFile = configPath ? await loadOverridesFile(configPath) : {};
  const configs = symbols.map((symbol) => resolveStrategyConfig(symbol, overrides));

  const restBaseUrl = env.restBaseUrl ?? (env.testnet ? BINANCE_TESTNET_REST_BASE_URL : undefined);
  const restLog = log.child({ component: "binance-rest" });
  const health = new HealthRegistry();
  const instruments = configs.map((config) =>
    buildInstrument(config, {
      health,
      log,
      createExchange: () =>
        new BinanceFuturesAdapter({
          apiKey: env.apiKey,
          apiSecret: env.apiSecret,
          restBaseUrl,
          timeoutMs: env.timeoutMs,
          recvWindow: env.recvWindow,
          log: (entry) => (entry.ok ? restLog.debug("request", entry) : restLog.warn("request failed", entry))
        })
    })
  );

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals) => {
    signals += 1;
    if (signals > 1) {
      log.warn("second signal, exiting immediately", { signal });
      process.exit(130);
    }
    log.info("stopping", { signal, symbols });
    stopAll(instruments);
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  log.info("runner starting", { symbols, testnet: env.testnet, configPath: configPath ?? null });
  const outcomes = await runInstruments(instruments, log);
  const summary = health.summary();
  log.info("runner finished", {
    failed: outcomes.filter((item) => !item.ok).map((item) => item.symbol),
    instruments: summary.instruments.map((item) => ({
      symbol: item.symbol,
      status: item.status,
      ticks: item.ticks,
      failedTicks: item.failedTicks
    }))
  });
  return outcomes.every((item) => item.ok) ? 0 : 1;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    log.error("runner crashed", serializeError(error));
    process.exitCode = 1;
  });
