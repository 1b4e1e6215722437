/**
 * Logging Types
 *
 * Structured log entries, transports and the logger contract shared by every
 * llm-relay package.
 */

// ============================================
// LOG LEVELS
// ============================================

export const LOG_LEVELS = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LOG_LEVELS, value);
}

// ============================================
// LOG ENTRY
// ============================================

export interface LogEntry {
  /** ISO timestamp */
  timestamp: string;
  level: LogLevel;
  /** Component that produced the log (e.g. "relay.manager", "relay.traffic") */
  component: string;
  message: string;
  /** Structured payload, redacted before it reaches a transport */
  data?: Record<string, unknown>;
  error?: {
    name: string;
    message: string;
    stack?: string;
    cause?: string;
  };
  /** Request id for tracing one logical request across retries and failover */
  correlationId?: string;
  userId?: string;
  sessionId?: string;
}

// ============================================
// TRANSPORT INTERFACE
// ============================================

export interface LogTransport {
  name: string;
  minLevel: LogLevel;
  log(entry: LogEntry): void | Promise<void>;
  /** Flush buffered output (graceful shutdown) */
  flush?(): Promise<void>;
  close?(): Promise<void>;
}

// ============================================
// LOGGER CONFIG
// ============================================

export interface LogContext {
  component?: string;
  correlationId?: string;
  userId?: string;
  sessionId?: string;
}

export interface LoggerConfig {
  /** Entries below this level are dropped */
  minLevel: LogLevel;
  component: string;
  defaultContext?: Omit<LogContext, "component">;
  transports: LogTransport[];
  /** Data keys matching any of these are replaced with "[REDACTED]" */
  redactPatterns?: RegExp[];
  /** Keep the last N entries in memory (default 1000) */
  ringBufferSize?: number;
}

// ============================================
// LOGGER INTERFACE
// ============================================

export interface ILogger {
  trace(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, error?: unknown, data?: Record<string, unknown>): void;
  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void;

  /** Child logger with extra context; shares transports and the recent-entry buffer */
  child(context: LogContext): ILogger;

  setCorrelationId(id: string): void;

  getRecentLogs(count?: number): LogEntry[];

  flush(): Promise<void>;
}

// ============================================
// SENSITIVE FIELD PATTERNS
// ============================================

export const DEFAULT_REDACT_PATTERNS = [
  /apiKey/i,
  /api_key/i,
  /password/i,
  /secret/i,
  /token$/i,
  /authorization/i,
  /credential/i,
];
