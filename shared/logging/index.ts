/**
 * Shared Logging
 *
 * ```typescript
 * import { initLogger, log, ConsoleTransport } from "@llm-relay/shared/logging";
 *
 * initLogger({
 *   minLevel: "info",
 *   component: "relay",
 *   transports: [new ConsoleTransport()]
 * });
 *
 * log().info("Provider manager ready", { providers: ["openai"] });
 * const trafficLog = log().child({ component: "relay.traffic" });
 * ```
 */

export {
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS,
  isLogLevel,
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LogTransport,
  type LoggerConfig,
  type ILogger
} from "./types.js";

export {
  Logger,
  RingBuffer,
  initLogger,
  getLogger,
  log
} from "./logger.js";

export {
  ConsoleTransport,
  FileTransport,
  type ConsoleTransportOptions,
  type FileTransportOptions
} from "./transports/index.js";
