export * from "./futures-exchange.interface.js";
export * from "./binance/binance.adapter.js";
export * from "./binance/binance.constants.js";
export * from "./binance/binance.errors.js";
export * from "./binance/binance.rest.js";
export * from "./binance/binance.signing.js";
export * from "./binance/binance.symbols.js";
export type * from "./binance/binance.types.js";
