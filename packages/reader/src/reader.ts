/**
 * Annotated build log reader.
 *
 * Reads a build log one line at a time, extracting the first timestamp
 * annotation of each line and removing every annotation frame from the
 * text. Reading is forward-only; a session moves
 *
 *   unstarted -> streaming -> exhausted
 *
 * and never leaves exhausted.
 */

import { createInterface, type Interface } from "node:readline";
import type { Readable } from "node:stream";
import {
  removeAnnotations,
  scanAnnotations,
} from "./annotations/framing.js";
import { createDefaultRegistry } from "./annotations/registry.js";
import { isTimestampAnnotation } from "./annotations/timestamp.js";
import type {
  AnnotationDecoder,
  SkippedAnnotation,
} from "./annotations/types.js";
import { createDecodedLine, type DecodedLine } from "./decoded-line.js";
import { LogReadError } from "./errors.js";
import type { BuildLog } from "./log-source.js";
import {
  resolveTimestamp,
  type Timestamp,
  type TimestampResolver,
} from "./timestamp.js";

// ============================================================================
// Types
// ============================================================================

export type ReaderState = "unstarted" | "streaming" | "exhausted";

/**
 * Receives diagnostics from the reader: skipped annotations, session
 * transitions and failures to release the stream. Structurally compatible
 * with a per-run debug logger.
 */
export interface ReaderDebugSink {
  log(message: string): void;
  logError(error: unknown, context?: string): void;
}

export interface AnnotatedLogReaderOptions {
  /** Codecs used to decode annotations (default: built-in codecs) */
  registry?: AnnotationDecoder;
  /** Resolves timestamp annotations (default: resolveTimestamp) */
  resolveTimestamp?: TimestampResolver;
  debug?: ReaderDebugSink;
}

interface OpenLog {
  readonly stream: Readable;
  readonly lines: Interface;
  readonly iterator: AsyncIterator<string>;
}

type Session =
  | { readonly state: "unstarted" }
  | { readonly state: "streaming"; readonly log: OpenLog }
  | { readonly state: "exhausted" };

const UNSTARTED: Session = Object.freeze({ state: "unstarted" });
const EXHAUSTED: Session = Object.freeze({ state: "exhausted" });

const openLines = (stream: Readable): Interface =>
  createInterface({ input: stream, crlfDelay: Number.POSITIVE_INFINITY });

const describeSkipped = (skipped: SkippedAnnotation): string =>
  skipped.status === "unknown"
    ? `skipped annotation of unknown type "${skipped.type}"`
    : `skipped malformed annotation (${skipped.reason}): ${skipped.detail}`;

// ============================================================================
// Reader
// ============================================================================

/**
 * AnnotatedLogReader decodes the lines of one build log.
 *
 * One instance serves one consumer; calls must not overlap. The owner
 * calls close() when done unless the log was read to its end.
 *
 * @example
 * ```typescript
 * const reader = new AnnotatedLogReader(createFileBuildLog(path, { build }));
 * for await (const line of reader) {
 *   console.log(line.timestamp?.elapsedMillis, line.text);
 * }
 * ```
 */
export class AnnotatedLogReader implements AsyncIterable<DecodedLine> {
  private readonly buildLog: BuildLog;
  private readonly decoder: AnnotationDecoder;
  private readonly resolve: TimestampResolver;
  private readonly debug: ReaderDebugSink | undefined;
  private session: Session = UNSTARTED;
  private linesRead = 0;

  constructor(buildLog: BuildLog, options: AnnotatedLogReaderOptions = {}) {
    this.buildLog = buildLog;
    this.decoder = options.registry ?? createDefaultRegistry();
    this.resolve = options.resolveTimestamp ?? resolveTimestamp;
    this.debug = options.debug;
  }

  get state(): ReaderState {
    return this.session.state;
  }

  /**
   * Read and decode the next line.
   *
   * Resolves undefined when the log does not exist (checked on every call)
   * or has no more lines. Rejects with LogReadError when the log cannot be
   * read; the session is exhausted afterwards.
   */
  async nextLine(): Promise<DecodedLine | undefined> {
    if (this.state === "exhausted") {
      return undefined;
    }

    const exists = await this.logExists();

    // close() may have run while waiting on the existence check
    const session = this.session;
    if (session.state === "exhausted") {
      return undefined;
    }
    if (!exists) {
      if (session.state === "streaming") {
        this.finish("log no longer exists");
      }
      return undefined;
    }

    const log = session.state === "streaming" ? session.log : this.open();

    let next: IteratorResult<string>;
    try {
      next = await log.iterator.next();
    } catch (error) {
      this.finish("read failed");
      throw new LogReadError(this.buildLog.build.id, error);
    }

    if (next.done) {
      this.finish("end of log");
      return undefined;
    }

    this.linesRead++;
    return this.decode(next.value);
  }

  /**
   * Count the lines of the log without decoding them.
   * Uses its own stream; the reading session is not touched.
   */
  async lineCount(): Promise<number> {
    if (!(await this.logExists())) {
      return 0;
    }

    const stream = this.openStream();
    const lines = openLines(stream);
    let count = 0;
    try {
      for await (const _line of lines) {
        count++;
      }
    } catch (error) {
      throw new LogReadError(this.buildLog.build.id, error);
    } finally {
      this.release(stream, lines);
    }
    return count;
  }

  /**
   * Release the session's stream. Safe to call any number of times and
   * from any state; never throws.
   */
  close(): void {
    if (this.session.state === "streaming") {
      this.finish("closed");
    }
  }

  /**
   * Iterate the remaining lines. Breaking out of the loop closes the reader.
   */
  async *lines(): AsyncGenerator<DecodedLine, void, undefined> {
    try {
      let line = await this.nextLine();
      while (line) {
        yield line;
        line = await this.nextLine();
      }
    } finally {
      this.close();
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<DecodedLine, void, undefined> {
    return this.lines();
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private async logExists(): Promise<boolean> {
    try {
      return await this.buildLog.exists();
    } catch (error) {
      throw new LogReadError(this.buildLog.build.id, error);
    }
  }

  private openStream(): Readable {
    let stream: Readable;
    try {
      stream = this.buildLog.openStream();
    } catch (error) {
      throw new LogReadError(this.buildLog.build.id, error);
    }
    stream.setEncoding(this.buildLog.charset);
    return stream;
  }

  private open(): OpenLog {
    const stream = this.openStream();
    const lines = openLines(stream);
    const log: OpenLog = {
      stream,
      lines,
      iterator: lines[Symbol.asyncIterator](),
    };
    this.session = { state: "streaming", log };
    this.debug?.log(`opened log for build ${this.buildLog.build.id}`);
    return log;
  }

  private finish(reason: string): void {
    const current = this.session;
    this.session = EXHAUSTED;
    if (current.state === "streaming") {
      this.release(current.log.stream, current.log.lines);
    }
    this.debug?.log(
      `log for build ${this.buildLog.build.id} exhausted ` +
        `after ${this.linesRead} lines (${reason})`
    );
  }

  private release(stream: Readable, lines: Interface): void {
    try {
      lines.close();
      stream.destroy();
    } catch (error) {
      this.debug?.logError(error, "release log stream");
    }
  }

  private decode(raw: string): DecodedLine {
    if (!raw.includes("\x1b")) {
      return createDecodedLine(raw);
    }

    const { charset, build } = this.buildLog;
    const bytes = Buffer.from(raw, charset);
    const lineNumber = this.linesRead;

    const timestamp = scanAnnotations<Timestamp>(
      bytes,
      this.decoder,
      (annotation) =>
        isTimestampAnnotation(annotation)
          ? this.resolve(annotation.value, build)
          : undefined,
      (skipped) =>
        this.debug?.log(`line ${lineNumber}: ${describeSkipped(skipped)}`)
    );

    const stripped = removeAnnotations(bytes);
    const text =
      stripped.length === bytes.length ? raw : stripped.toString(charset);
    return createDecodedLine(text, timestamp);
  }
}

/**
 * Create a reader for a build log.
 */
export const createReader = (
  buildLog: BuildLog,
  options?: AnnotatedLogReaderOptions
): AnnotatedLogReader => new AnnotatedLogReader(buildLog, options);
