export type { Config } from "./config/schema";
export { configSchema, loadConfig } from "./config/schema";
export type { Logger, LogContext } from "./core/logging/logger";
export { createLogger, logger } from "./core/logging/logger";
export * from "./core/stream";
