export * from "./order-executor.js";
export * from "./trend-trader.js";
