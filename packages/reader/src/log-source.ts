/**
 * Log sources.
 * A BuildLog answers three questions for the reader: does the log exist
 * right now, how is it encoded, and give me a fresh stream over it.
 */

import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { Readable } from "node:stream";

// ============================================================================
// Types
// ============================================================================

/**
 * Charsets a log may declare. All are ASCII-compatible, so annotation
 * frames survive decoding a line and encoding it again.
 */
export type LogCharset = "utf8" | "utf-8" | "latin1" | "ascii";

export const LOG_CHARSETS: readonly LogCharset[] = [
  "utf8",
  "utf-8",
  "latin1",
  "ascii",
];

export const isLogCharset = (value: string): value is LogCharset =>
  LOG_CHARSETS.some((charset) => charset === value);

/**
 * The build a log belongs to.
 */
export interface BuildInfo {
  readonly id: string;
  /** Build start, in milliseconds since the Unix epoch */
  readonly startTimeMillis: number;
}

/**
 * BuildLog gives access to the stored log of one build.
 *
 * exists() is asked before every read, so a log that appears after the
 * reader was created is picked up. openStream() must return a new stream
 * positioned at the start of the log on every call.
 */
export interface BuildLog {
  readonly build: BuildInfo;
  readonly charset: LogCharset;
  exists(): Promise<boolean>;
  openStream(): Readable;
}

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

// ============================================================================
// File-backed logs
// ============================================================================

export interface FileBuildLogOptions {
  build: BuildInfo;
  charset?: LogCharset;
}

/**
 * BuildLog backed by a file on disk.
 */
export class FileBuildLog implements BuildLog {
  readonly path: string;
  readonly build: BuildInfo;
  readonly charset: LogCharset;

  constructor(path: string, options: FileBuildLogOptions) {
    this.path = path;
    this.build = options.build;
    this.charset = options.charset ?? "utf8";
  }

  /**
   * False when nothing (or something other than a file) is at the path.
   * Other stat failures, such as permission errors, reject.
   */
  async exists(): Promise<boolean> {
    try {
      const stats = await stat(this.path);
      return stats.isFile();
    } catch (error) {
      if (
        isErrnoException(error) &&
        (error.code === "ENOENT" || error.code === "ENOTDIR")
      ) {
        return false;
      }
      throw error;
    }
  }

  openStream(): Readable {
    return createReadStream(this.path);
  }
}

export const createFileBuildLog = (
  path: string,
  options: FileBuildLogOptions
): FileBuildLog => new FileBuildLog(path, options);

// ============================================================================
// In-memory logs
// ============================================================================

/**
 * BuildLog held in memory. A log without contents does not exist.
 * Streams opened before a change keep the contents they started with.
 */
export class MemoryBuildLog implements BuildLog {
  readonly build: BuildInfo;
  readonly charset: LogCharset;
  private contents: Buffer | undefined;

  constructor(
    build: BuildInfo,
    contents?: string | Uint8Array,
    charset: LogCharset = "utf8"
  ) {
    this.build = build;
    this.charset = charset;
    this.contents =
      contents === undefined ? undefined : this.toBuffer(contents);
  }

  exists(): Promise<boolean> {
    return Promise.resolve(this.contents !== undefined);
  }

  openStream(): Readable {
    if (this.contents === undefined) {
      throw new Error(`log for build ${this.build.id} does not exist`);
    }
    return Readable.from(this.contents, { objectMode: false });
  }

  /**
   * Append to the log, creating it if needed.
   */
  append(data: string | Uint8Array): void {
    const chunk = this.toBuffer(data);
    this.contents = this.contents
      ? Buffer.concat([this.contents, chunk])
      : chunk;
  }

  replace(data: string | Uint8Array): void {
    this.contents = this.toBuffer(data);
  }

  remove(): void {
    this.contents = undefined;
  }

  private toBuffer(data: string | Uint8Array): Buffer {
    return typeof data === "string"
      ? Buffer.from(data, this.charset)
      : Buffer.from(data);
  }
}

export const createMemoryBuildLog = (
  build: BuildInfo,
  contents?: string | Uint8Array,
  charset?: LogCharset
): MemoryBuildLog => new MemoryBuildLog(build, contents, charset);
