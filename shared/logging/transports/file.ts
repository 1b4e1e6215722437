/**
 * File Transport
 *
 * Appends JSON-line log entries to a dated file and rotates by size.
 */

import * as fs from "fs";
import * as path from "path";
import type { LogTransport, LogEntry, LogLevel } from "../types.js";

// ============================================
// FILE TRANSPORT
// ============================================

export interface FileTransportOptions {
  minLevel?: LogLevel;
  logDir: string;
  /** Base filename (default: "llm-relay") */
  filename?: string;
  /** Rotate once the current file would exceed this many bytes (default: 10MB) */
  maxSize?: number;
  /** Rotated files to keep (default: 5) */
  maxFiles?: number;
}

export class FileTransport implements LogTransport {
  name = "file";
  minLevel: LogLevel;
  private logDir: string;
  private filename: string;
  private maxSize: number;
  private maxFiles: number;
  private currentPath: string;
  private writeStream: fs.WriteStream | null = null;
  private currentSize = 0;
  private writeQueue: string[] = [];
  private isWriting = false;

  constructor(options: FileTransportOptions) {
    this.minLevel = options.minLevel || "info";
    this.logDir = options.logDir;
    this.filename = options.filename || "llm-relay";
    this.maxSize = options.maxSize || 10 * 1024 * 1024;
    this.maxFiles = options.maxFiles || 5;
    this.currentPath = this.getLogPath();

    fs.mkdirSync(this.logDir, { recursive: true });
    this.openStream();
  }

  private getLogPath(): string {
    const date = new Date().toISOString().split("T")[0]; // YYYY-MM-DD
    return path.join(this.logDir, `${this.filename}-${date}.log`);
  }

  private openStream(): void {
    this.currentPath = this.getLogPath();

    try {
      this.currentSize = fs.statSync(this.currentPath).size;
    } catch {
      this.currentSize = 0;
    }

    this.writeStream = fs.createWriteStream(this.currentPath, { flags: "a" });
    this.writeStream.on("error", (err: Error) => {
      console.error("[FileTransport] Write error:", err);
    });
  }

  log(entry: LogEntry): void {
    this.writeQueue.push(JSON.stringify(entry) + "\n");
    this.processQueue();
  }

  private processQueue(): void {
    const stream = this.writeStream;
    if (this.isWriting || !stream) return;

    const line = this.writeQueue.shift();
    if (line === undefined) return;

    this.isWriting = true;

    if (this.currentSize + line.length > this.maxSize) {
      this.rotate();
    } else if (this.getLogPath() !== this.currentPath) {
      // New day, new file
      stream.end();
      this.openStream();
    }

    const target = this.writeStream ?? stream;
    target.write(line, (err: Error | null | undefined) => {
      if (!err) {
        this.currentSize += line.length;
      }
      this.isWriting = false;
      this.processQueue();
    });
  }

  private rotate(): void {
    this.writeStream?.end();

    for (let i = this.maxFiles - 1; i >= 1; i--) {
      const oldPath = `${this.currentPath}.${i}`;
      if (!fs.existsSync(oldPath)) continue;
      if (i === this.maxFiles - 1) {
        fs.unlinkSync(oldPath);
      } else {
        fs.renameSync(oldPath, `${this.currentPath}.${i + 1}`);
      }
    }

    if (fs.existsSync(this.currentPath)) {
      fs.renameSync(this.currentPath, `${this.currentPath}.1`);
    }

    this.openStream();
  }

  async flush(): Promise<void> {
    while (this.writeQueue.length > 0 || this.isWriting) {
      await new Promise(resolve => setTimeout(resolve, 10));
    }
  }

  async close(): Promise<void> {
    await this.flush();
    const stream = this.writeStream;
    this.writeStream = null;
    if (!stream) return;
    await new Promise<void>(resolve => stream.end(() => resolve()));
  }
}
