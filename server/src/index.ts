/**
 * llm-relay — Package Entry Point
 */

export * from "./llm/index.js";
export { loadManagerSettings, envKeyForProvider, type Env } from "./config.js";
export { initServerLogging, getServerLogger, createComponentLogger, type LoggingOptions } from "./logging.js";
