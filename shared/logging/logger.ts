/**
 * Core Logger Implementation
 *
 * Structured logging with multiple transports. A logger and every child
 * created from it write into the same recent-entry buffer, so the root
 * logger can replay what any component emitted.
 */

import {
  type LogLevel,
  type LogEntry,
  type LogContext,
  type LoggerConfig,
  type ILogger,
  LOG_LEVELS,
  DEFAULT_REDACT_PATTERNS
} from "./types.js";

// ============================================
// RING BUFFER
// ============================================

export class RingBuffer<T> {
  private buffer: Array<T | undefined>;
  private head = 0;
  private count = 0;

  constructor(private capacity: number) {
    this.buffer = new Array<T | undefined>(capacity);
  }

  push(item: T): void {
    this.buffer[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    if (this.count < this.capacity) this.count++;
  }

  getAll(): T[] {
    const ordered = this.count < this.capacity
      ? this.buffer.slice(0, this.count)
      : [...this.buffer.slice(this.head), ...this.buffer.slice(0, this.head)];
    return ordered.filter((item): item is T => item !== undefined);
  }

  getLast(n: number): T[] {
    return this.getAll().slice(-n);
  }

  clear(): void {
    this.buffer = new Array<T | undefined>(this.capacity);
    this.head = 0;
    this.count = 0;
  }
}

// ============================================
// LOGGER IMPLEMENTATION
// ============================================

export class Logger implements ILogger {
  private config: LoggerConfig;
  private redactPatterns: RegExp[];
  private ringBuffer: RingBuffer<LogEntry>;
  private context: Omit<LogContext, "component">;

  constructor(config: LoggerConfig, sharedBuffer?: RingBuffer<LogEntry>) {
    this.config = config;
    this.redactPatterns = config.redactPatterns ?? DEFAULT_REDACT_PATTERNS;
    this.ringBuffer = sharedBuffer ?? new RingBuffer<LogEntry>(config.ringBufferSize ?? 1000);
    this.context = { ...config.defaultContext };
  }

  // ----------------------------------------
  // Log Methods
  // ----------------------------------------

  trace(message: string, data?: Record<string, unknown>): void {
    this.log("trace", message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("error", message, data, error);
  }

  fatal(message: string, error?: unknown, data?: Record<string, unknown>): void {
    this.log("fatal", message, data, error);
  }

  // ----------------------------------------
  // Core Logging
  // ----------------------------------------

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
    error?: unknown
  ): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      component: this.config.component,
      message,
      correlationId: this.context.correlationId,
      userId: this.context.userId,
      sessionId: this.context.sessionId
    };

    if (data) {
      entry.data = this.redact(data);
    }

    if (error !== undefined) {
      entry.error = serializeError(error);
    }

    this.ringBuffer.push(entry);

    for (const transport of this.config.transports) {
      if (LOG_LEVELS[level] >= LOG_LEVELS[transport.minLevel]) {
        try {
          const pending = transport.log(entry);
          if (pending) {
            pending.catch((e: unknown) => {
              console.error(`[Logger] Transport ${transport.name} failed:`, e);
            });
          }
        } catch (e) {
          // Transport error - fall back to the console
          console.error(`[Logger] Transport ${transport.name} failed:`, e);
        }
      }
    }
  }

  // ----------------------------------------
  // Redaction
  // ----------------------------------------

  private redact(data: Record<string, unknown>): Record<string, unknown> {
    const result: Record<string, unknown> = {};

    for (const [key, value] of Object.entries(data)) {
      if (this.redactPatterns.some(pattern => pattern.test(key))) {
        result[key] = "[REDACTED]";
      } else if (isPlainRecord(value)) {
        result[key] = this.redact(value);
      } else {
        result[key] = value;
      }
    }

    return result;
  }

  // ----------------------------------------
  // Context Management
  // ----------------------------------------

  child(context: LogContext): ILogger {
    const { component, ...rest } = context;
    return new Logger(
      {
        ...this.config,
        component: component || this.config.component,
        defaultContext: { ...this.context, ...rest }
      },
      this.ringBuffer
    );
  }

  setCorrelationId(id: string): void {
    this.context.correlationId = id;
  }

  // ----------------------------------------
  // Buffer Access
  // ----------------------------------------

  getRecentLogs(count: number = 100): LogEntry[] {
    return this.ringBuffer.getLast(count);
  }

  clearRecentLogs(): void {
    this.ringBuffer.clear();
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async flush(): Promise<void> {
    await Promise.all(
      this.config.transports.map(t => (t.flush ? t.flush() : Promise.resolve()))
    );
  }

  async close(): Promise<void> {
    await this.flush();
    await Promise.all(
      this.config.transports.map(t => (t.close ? t.close() : Promise.resolve()))
    );
  }
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
    && Object.getPrototypeOf(value) === Object.prototype;
}

function serializeError(error: unknown): NonNullable<LogEntry["error"]> {
  if (error instanceof Error) {
    const serialized: NonNullable<LogEntry["error"]> = {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
    if (error.cause !== undefined) {
      serialized.cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
    }
    return serialized;
  }
  return {
    name: "Unknown",
    message: String(error)
  };
}

// ============================================
// GLOBAL LOGGER SINGLETON
// ============================================

let globalLogger: Logger | null = null;

export function initLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error("Logger not initialized. Call initLogger() first.");
  }
  return globalLogger;
}

export function log(): Logger {
  return getLogger();
}
