/**
 * Logging Setup
 *
 * Initializes the process logger with a console transport, plus a file
 * transport when LOG_DIR is set.
 */

import {
  initLogger,
  isLogLevel,
  Logger,
  ConsoleTransport,
  FileTransport,
  type ILogger,
  type LogLevel,
  type LogTransport
} from "@llm-relay/shared/logging";

export interface LoggingOptions {
  /** Minimum level to log (default: LOG_LEVEL, else "debug" in dev and "info" in prod) */
  minLevel?: LogLevel;
  /** Enable console output (default: true) */
  console?: boolean;
  /** Directory for JSON-line log files (default: LOG_DIR; no file output when unset) */
  logDir?: string;
  /** Console colors (default: auto-detect) */
  colors?: boolean;
}

let logger: Logger | null = null;

function resolveMinLevel(options: LoggingOptions): LogLevel {
  if (options.minLevel) return options.minLevel;
  const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
  if (fromEnv && isLogLevel(fromEnv)) return fromEnv;
  return process.env.NODE_ENV === "production" ? "info" : "debug";
}

/**
 * Initialize the logging system for the relay.
 */
export function initServerLogging(options: LoggingOptions = {}): Logger {
  const isDev = process.env.NODE_ENV !== "production";
  const minLevel = resolveMinLevel(options);
  const logDir = options.logDir ?? process.env.LOG_DIR;

  const transports: LogTransport[] = [];

  if (options.console !== false) {
    transports.push(new ConsoleTransport({
      minLevel,
      colors: options.colors,
      prettyPrint: isDev
    }));
  }

  if (logDir) {
    transports.push(new FileTransport({
      minLevel: "debug",
      logDir,
      filename: "relay",
      maxSize: 10 * 1024 * 1024,
      maxFiles: 10
    }));
  }

  logger = initLogger({
    minLevel,
    component: "relay",
    transports,
    ringBufferSize: 2000
  });

  return logger;
}

/**
 * Process logger; initialized with defaults on first access.
 */
export function getServerLogger(): Logger {
  return logger ?? initServerLogging();
}

/**
 * Create a namespaced logger for a specific component.
 */
export function createComponentLogger(component: string): ILogger {
  return getServerLogger().child({ component: `relay.${component}` });
}
