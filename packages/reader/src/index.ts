/**
 * @stampline/reader - annotated build log reader
 *
 * Architecture:
 * - annotations/ : frame format, codec registry, built-in codecs
 * - reader       : forward-only line decoding session
 * - log-source   : where log bytes come from (file, memory)
 * - timestamp    : line timestamps and their display formats
 */

// ============================================================================
// Reader
// ============================================================================

export type {
  AnnotatedLogReaderOptions,
  ReaderDebugSink,
  ReaderState,
} from "./reader.js";
export { AnnotatedLogReader, createReader } from "./reader.js";

export type { DecodedLine } from "./decoded-line.js";
export {
  createDecodedLine,
  decodedLineKey,
  decodedLinesEqual,
  formatDecodedLine,
} from "./decoded-line.js";

// ============================================================================
// Log Sources
// ============================================================================

export type {
  BuildInfo,
  BuildLog,
  FileBuildLogOptions,
  LogCharset,
} from "./log-source.js";
export {
  createFileBuildLog,
  createMemoryBuildLog,
  FileBuildLog,
  isLogCharset,
  LOG_CHARSETS,
  MemoryBuildLog,
} from "./log-source.js";

// ============================================================================
// Annotations
// ============================================================================

export type {
  Annotation,
  AnnotationCodec,
  AnnotationDecoder,
  AnnotationReadResult,
  HyperlinkNote,
  MalformedReason,
  SkippedAnnotation,
  TimestampNote,
} from "./annotations/index.js";
export {
  AnnotationRegistry,
  containsAnnotation,
  createDefaultRegistry,
  createRegistry,
  encodeAnnotation,
  HYPERLINK_ANNOTATION_TYPE,
  hyperlinkCodec,
  isTimestampAnnotation,
  isTimestampNote,
  POSTAMBLE,
  PREAMBLE,
  readAnnotation,
  removeAnnotations,
  scanAnnotations,
  stripAnnotations,
  TIMESTAMP_ANNOTATION_TYPE,
  timestampCodec,
} from "./annotations/index.js";

// ============================================================================
// Timestamps
// ============================================================================

export type {
  Timestamp,
  TimestampFormat,
  TimestampResolver,
} from "./timestamp.js";
export {
  formatElapsed,
  formatSystemTime,
  formatTimestamp,
  isTimestampFormat,
  resolveTimestamp,
  TIMESTAMP_FORMATS,
  timestampsEqual,
} from "./timestamp.js";

// ============================================================================
// Errors & Utilities
// ============================================================================

export { ByteCursor } from "./byte-cursor.js";
export { AnnotationDecodeError, LogReadError } from "./errors.js";
