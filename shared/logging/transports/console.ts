/**
 * Console Transport
 *
 * Color-coded console output. Colors default on only when stdout is a TTY.
 */

import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// COLOR CODES
// ============================================

const COLORS = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  magenta: "\x1b[35m",
  cyan: "\x1b[36m",
  white: "\x1b[37m",
  gray: "\x1b[90m",
  bgRed: "\x1b[41m",
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  trace: COLORS.gray,
  debug: COLORS.cyan,
  info: COLORS.blue,
  warn: COLORS.yellow,
  error: COLORS.red,
  fatal: COLORS.bgRed + COLORS.white,
  silent: COLORS.reset,
};

const LEVEL_LABELS: Record<LogLevel, string> = {
  trace: "TRC",
  debug: "DBG",
  info: "INF",
  warn: "WRN",
  error: "ERR",
  fatal: "FTL",
  silent: "   ",
};

// ============================================
// CONSOLE TRANSPORT
// ============================================

export interface ConsoleTransportOptions {
  minLevel?: LogLevel;
  /** Default: true when stdout is a TTY */
  colors?: boolean;
  /** Default: true */
  timestamps?: boolean;
  /** Default: true */
  showComponent?: boolean;
  /** Multi-line JSON for data payloads (default: false) */
  prettyPrint?: boolean;
}

export class ConsoleTransport implements LogTransport {
  name = "console";
  minLevel: LogLevel;
  private colors: boolean;
  private timestamps: boolean;
  private showComponent: boolean;
  private prettyPrint: boolean;

  constructor(options: ConsoleTransportOptions = {}) {
    this.minLevel = options.minLevel || "debug";
    this.colors = options.colors ?? process.stdout.isTTY === true;
    this.timestamps = options.timestamps ?? true;
    this.showComponent = options.showComponent ?? true;
    this.prettyPrint = options.prettyPrint ?? false;
  }

  log(entry: LogEntry): void {
    const output = this.format(entry);

    switch (entry.level) {
      case "trace":
      case "debug":
        console.debug(output);
        break;
      case "info":
        console.info(output);
        break;
      case "warn":
        console.warn(output);
        break;
      case "error":
      case "fatal":
        console.error(output);
        break;
      case "silent":
        break;
    }
  }

  format(entry: LogEntry): string {
    const parts: string[] = [];

    if (this.timestamps) {
      // HH:MM:SS
      const time = entry.timestamp.slice(11, 19);
      parts.push(this.colorize(time, COLORS.dim));
    }

    parts.push(this.colorize(LEVEL_LABELS[entry.level], LEVEL_COLORS[entry.level]));

    if (this.showComponent) {
      parts.push(this.colorize(`[${entry.component}]`, COLORS.magenta));
    }

    if (entry.correlationId) {
      parts.push(this.colorize(`(${entry.correlationId.slice(0, 12)})`, COLORS.dim));
    }

    parts.push(entry.message);

    let output = parts.join(" ");

    if (entry.data && Object.keys(entry.data).length > 0) {
      output += this.prettyPrint
        ? "\n" + this.colorize(JSON.stringify(entry.data, null, 2), COLORS.dim)
        : " " + this.colorize(JSON.stringify(entry.data), COLORS.dim);
    }

    if (entry.error) {
      output += "\n" + this.colorize(`${entry.error.name}: ${entry.error.message}`, COLORS.red);
      if (entry.error.cause) {
        output += "\n" + this.colorize(`caused by: ${entry.error.cause}`, COLORS.red);
      }
      if (entry.error.stack && this.prettyPrint) {
        output += "\n" + this.colorize(entry.error.stack, COLORS.dim);
      }
    }

    return output;
  }

  private colorize(text: string, color: string): string {
    if (!this.colors) return text;
    return `${color}${text}${COLORS.reset}`;
  }
}
