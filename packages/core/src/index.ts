export * from "./protocols.js";
export * from "./snapshot.js";
export * from "./errors.js";
export * from "./env.js";
export * from "./config.js";
export { logger, serialize, type ScopedLogger } from "./logger.js";
