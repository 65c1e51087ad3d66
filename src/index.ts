/**
 * Package Entry Point
 *
 * @module src
 */

export * from "./results";
export * from "./format";
export * from "./profilers";
export { ConfigError, loadConfig, type Config } from "./config";
export { createLogger, type Logger, type LogLevel } from "./logger";
