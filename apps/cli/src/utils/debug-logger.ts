/**
 * Debug logger for per-session troubleshooting.
 * Stores debug logs in ~/.stampline/debug/<session-id>.log
 *
 * Features:
 * - Per-session log files (no overwriting)
 * - Timestamped entries
 * - Reader diagnostics (skipped annotations, session transitions)
 * - Automatic log rotation (keeps last 10 logs)
 */

import {
  appendFileSync,
  existsSync,
  mkdirSync,
  readdirSync,
  statSync,
  unlinkSync,
  writeFileSync,
} from "node:fs";
import { join } from "node:path";
import type { ReaderDebugSink } from "@stampline/reader";
import { getStamplineDir } from "../lib/config.js";

const DEBUG_DIR_NAME = "debug";
export const MAX_LOG_FILES = 10;

export const getDebugDir = (): string =>
  join(getStamplineDir(), DEBUG_DIR_NAME);

/**
 * Creates a session id that sorts by start time, e.g. 20261018-142233-k3f9
 */
export const createSessionId = (now: Date = new Date()): string => {
  const stamp = now
    .toISOString()
    .slice(0, 19)
    .replace(/[-:]/g, "")
    .replace("T", "-");
  return `${stamp}-${Math.random().toString(36).slice(2, 6)}`;
};

/**
 * Per-session debug logger that writes to ~/.stampline/debug/<id>.log
 * Passed to the reader as its debug sink.
 */
export class DebugLogger implements ReaderDebugSink {
  private readonly logPath: string;
  private readonly sessionID: string;
  private closed = false;

  constructor(sessionID: string, debugDir: string = getDebugDir()) {
    this.sessionID = sessionID;
    this.logPath = this.initializeLogFile(sessionID, debugDir);
    this.log("DebugLogger initialized");
  }

  /**
   * Initializes the log file and ensures the debug directory exists.
   * Performs log rotation to keep only the most recent logs.
   */
  private initializeLogFile(sessionID: string, debugDir: string): string {
    if (!existsSync(debugDir)) {
      mkdirSync(debugDir, { recursive: true, mode: 0o700 });
    }

    this.rotateLogs(debugDir);

    const logPath = join(debugDir, `${sessionID}.log`);
    const timestamp = this.formatTimestamp();
    const header = `${"=".repeat(80)}\nstampline Debug Log\nSession ID: ${sessionID}\nStarted: ${timestamp}\n${"=".repeat(80)}\n\n`;
    writeFileSync(logPath, header, { mode: 0o600 });

    return logPath;
  }

  /**
   * Rotates log files, keeping only the MAX_LOG_FILES most recent.
   */
  private rotateLogs(debugDir: string): void {
    try {
      const logFiles = readdirSync(debugDir)
        .filter((file) => file.endsWith(".log"))
        .map((file) => {
          const filePath = join(debugDir, file);
          return { path: filePath, mtime: statSync(filePath).mtime.getTime() };
        })
        .sort((a, b) => b.mtime - a.mtime);

      // Keep space for the new log
      for (const log of logFiles.slice(MAX_LOG_FILES - 1)) {
        try {
          unlinkSync(log.path);
        } catch {
          // Ignore errors when deleting old logs
        }
      }
    } catch {
      // Ignore errors during rotation
    }
  }

  /**
   * Formats a timestamp in ISO 8601 format with local timezone offset.
   */
  private formatTimestamp(): string {
    const now = new Date();
    const offset = -now.getTimezoneOffset();
    const offsetHours = String(Math.floor(Math.abs(offset) / 60)).padStart(
      2,
      "0"
    );
    const offsetMinutes = String(Math.abs(offset) % 60).padStart(2, "0");
    const offsetSign = offset >= 0 ? "+" : "-";

    const local = new Date(now.getTime() + offset * 60_000);
    const iso = local.toISOString().slice(0, -1);
    return `${iso}${offsetSign}${offsetHours}:${offsetMinutes}`;
  }

  /**
   * Logs a message with timestamp.
   */
  log(message: string): void {
    if (this.closed) {
      return;
    }

    try {
      appendFileSync(this.logPath, `${this.formatTimestamp()} ${message}\n`);
    } catch {
      // Silently fail
    }
  }

  /**
   * Logs a phase transition (e.g., "[lines] opened build.log").
   */
  logPhase(phase: string, message: string): void {
    this.log(`[${phase}] ${message}`);
  }

  /**
   * Logs an error with stack trace.
   */
  logError(error: unknown, context?: string): void {
    const prefix = context ? `[${context}] ` : "";

    if (error instanceof Error) {
      this.log(`${prefix}Error: ${error.message}`);
      if (error.stack) {
        this.log(`Stack trace:\n${error.stack}`);
      }
    } else {
      this.log(`${prefix}Error: ${String(error)}`);
    }
  }

  /**
   * Logs the options a command runs with.
   */
  logHeader(options: {
    command: string;
    file: string;
    buildStart: number;
    timestampFormat?: string;
    charset: string;
  }): void {
    this.log("=".repeat(80));
    this.log("Configuration:");
    this.log(`  Command: ${options.command}`);
    this.log(`  File: ${options.file}`);
    this.log(`  Build start: ${new Date(options.buildStart).toISOString()}`);
    if (options.timestampFormat) {
      this.log(`  Timestamp format: ${options.timestampFormat}`);
    }
    this.log(`  Charset: ${options.charset}`);
    this.log("=".repeat(80));
    this.log("");
  }

  close(): void {
    if (this.closed) {
      return;
    }

    this.log("DebugLogger closed");
    this.log(`${"=".repeat(80)}\n`);
    this.closed = true;
  }

  /**
   * Gets the absolute path to the log file.
   */
  get path(): string {
    return this.logPath;
  }

  get id(): string {
    return this.sessionID;
  }
}
