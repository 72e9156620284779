export * from "./types.js";
export * from "./ema.js";
export * from "./atr.js";
export * from "./adx.js";
export * from "./channels.js";
export * from "./snapshot.js";
