export * from "./logger.js";
export * from "./math.js";
