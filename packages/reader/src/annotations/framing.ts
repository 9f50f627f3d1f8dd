/**
 * Annotation frame format.
 *
 * An annotation sits inline in a log line as:
 *
 *   ESC[8mha:  <base64 body>  ESC[0m
 *
 * The SGR sequences conceal the frame on ANSI terminals. The body is
 *
 *   u32be bodyLength | u8 typeLength | type (ASCII) | payload
 *
 * where bodyLength counts every byte after itself. Base64 never contains a
 * line terminator, so a frame never spans two lines.
 */

import { ByteCursor } from "../byte-cursor.js";
import type { LogCharset } from "../log-source.js";
import type {
  Annotation,
  AnnotationDecoder,
  AnnotationReadResult,
  MalformedReason,
  SkippedAnnotation,
} from "./types.js";

// ============================================================================
// Constants
// ============================================================================

/** Bytes that open every frame: ESC [ 8 m h a : */
export const PREAMBLE: Uint8Array = Buffer.from("\x1b[8mha:", "latin1");

/** First byte of PREAMBLE; the only byte the scanner stops on */
const ESC = 0x1b;

/** Bytes that close every frame: ESC [ 0 m */
export const POSTAMBLE: Uint8Array = Buffer.from("\x1b[0m", "latin1");

const HEADER_LENGTH = 5; // u32 body length + u8 type length
const MAX_TYPE_LENGTH = 255;

const BASE64_PATTERN =
  /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;
const TYPE_PATTERN = /^[\x21-\x7e]+$/;

const NOT_ANNOTATION: AnnotationReadResult = Object.freeze({
  status: "not-annotation",
});

// ============================================================================
// Helpers
// ============================================================================

const isBase64Byte = (b: number | undefined): boolean =>
  b !== undefined &&
  ((b >= 0x41 && b <= 0x5a) || // A-Z
    (b >= 0x61 && b <= 0x7a) || // a-z
    (b >= 0x30 && b <= 0x39) || // 0-9
    b === 0x2b || // +
    b === 0x2f || // /
    b === 0x3d); // =

const startsWithAt = (
  bytes: Uint8Array,
  sequence: Uint8Array,
  start: number
): boolean => {
  if (start + sequence.length > bytes.length) {
    return false;
  }
  for (let i = 0; i < sequence.length; i++) {
    if (bytes[start + i] !== sequence[i]) {
      return false;
    }
  }
  return true;
};

const malformed = (
  reason: MalformedReason,
  detail: string
): AnnotationReadResult => ({ status: "malformed", reason, detail });

/**
 * Index just past the frame starting at `start`, or undefined when no
 * complete frame starts there.
 */
const findFrameEnd = (
  bytes: Uint8Array,
  start: number
): number | undefined => {
  if (!startsWithAt(bytes, PREAMBLE, start)) {
    return undefined;
  }
  let i = start + PREAMBLE.length;
  while (i < bytes.length && isBase64Byte(bytes[i])) {
    i++;
  }
  return startsWithAt(bytes, POSTAMBLE, i) ? i + POSTAMBLE.length : undefined;
};

// ============================================================================
// Encoding
// ============================================================================

/**
 * Build a complete frame for an annotation of `type` carrying `payload`.
 */
export const encodeAnnotation = (
  type: string,
  payload: Uint8Array
): Buffer => {
  if (
    type.length === 0 ||
    type.length > MAX_TYPE_LENGTH ||
    !TYPE_PATTERN.test(type)
  ) {
    throw new RangeError(`invalid annotation type: ${JSON.stringify(type)}`);
  }

  const body = Buffer.alloc(HEADER_LENGTH + type.length + payload.length);
  body.writeUInt32BE(body.length - 4, 0);
  body.writeUInt8(type.length, 4);
  body.write(type, HEADER_LENGTH, "latin1");
  body.set(payload, HEADER_LENGTH + type.length);

  return Buffer.concat([
    PREAMBLE,
    Buffer.from(body.toString("base64"), "latin1"),
    POSTAMBLE,
  ]);
};

// ============================================================================
// Decoding
// ============================================================================

/**
 * Read one frame at the cursor.
 *
 * Never throws. On not-annotation nothing is consumed. On unterminated
 * frames the cursor stops after the base64 run, so a frame that begins
 * right there is still found by the next scan step. Every other outcome
 * leaves the cursor just past the postamble.
 */
export const readAnnotation = (
  cursor: ByteCursor,
  decoder: AnnotationDecoder
): AnnotationReadResult => {
  if (!cursor.matches(PREAMBLE)) {
    return NOT_ANNOTATION;
  }
  cursor.skip(PREAMBLE.length);

  const encoded: number[] = [];
  while (isBase64Byte(cursor.peekByte())) {
    encoded.push(cursor.readByte());
  }

  if (!cursor.matches(POSTAMBLE)) {
    return malformed("unterminated", "frame has no closing sequence");
  }
  cursor.skip(POSTAMBLE.length);

  const text = Buffer.from(encoded).toString("latin1");
  if (!BASE64_PATTERN.test(text)) {
    return malformed(
      "invalid-base64",
      `body is not base64 (${text.length} chars)`
    );
  }

  const body = Buffer.from(text, "base64");
  if (body.length < HEADER_LENGTH) {
    return malformed(
      "invalid-header",
      `body too short (${body.length} bytes)`
    );
  }

  const declared = body.readUInt32BE(0);
  if (declared !== body.length - 4) {
    return malformed(
      "invalid-header",
      `declared length ${declared} but body holds ${body.length - 4}`
    );
  }

  const typeLength = body.readUInt8(4);
  if (typeLength === 0 || HEADER_LENGTH + typeLength > body.length) {
    return malformed("invalid-header", `bad type length ${typeLength}`);
  }

  const type = body.toString(
    "latin1",
    HEADER_LENGTH,
    HEADER_LENGTH + typeLength
  );
  if (!TYPE_PATTERN.test(type)) {
    return malformed("invalid-header", "type is not printable ASCII");
  }

  const payload = body.subarray(HEADER_LENGTH + typeLength);

  let annotation: Annotation | undefined;
  try {
    annotation = decoder.decode(type, payload);
  } catch (error) {
    return malformed(
      "invalid-payload",
      error instanceof Error ? error.message : String(error)
    );
  }

  if (!annotation) {
    return { status: "unknown", type };
  }
  return { status: "decoded", annotation };
};

// ============================================================================
// Stripping
// ============================================================================

/**
 * Remove every complete frame from `bytes`, whatever its type or payload.
 * A preamble without a closing sequence is kept as literal content.
 */
export const removeAnnotations = (bytes: Uint8Array): Buffer => {
  const kept: Uint8Array[] = [];
  let segmentStart = 0;
  let i = bytes.indexOf(ESC);

  while (i !== -1) {
    const end = findFrameEnd(bytes, i);
    if (end === undefined) {
      i = bytes.indexOf(ESC, i + 1);
      continue;
    }
    kept.push(bytes.subarray(segmentStart, i));
    segmentStart = end;
    i = bytes.indexOf(ESC, end);
  }

  if (segmentStart === 0) {
    return Buffer.from(bytes);
  }
  kept.push(bytes.subarray(segmentStart));
  return Buffer.concat(kept);
};

/**
 * Remove every complete frame from a line of text.
 * The text is re-encoded with the log's charset so byte offsets match the
 * scan that extracted the timestamp.
 */
export const stripAnnotations = (
  text: string,
  charset: LogCharset
): string => {
  if (!text.includes("\x1b")) {
    return text;
  }
  return removeAnnotations(Buffer.from(text, charset)).toString(charset);
};

/**
 * True when `text` holds at least one complete frame.
 */
export const containsAnnotation = (
  text: string,
  charset: LogCharset
): boolean => {
  if (!text.includes("\x1b")) {
    return false;
  }
  const bytes = Buffer.from(text, charset);
  let i = bytes.indexOf(ESC);
  while (i !== -1) {
    if (findFrameEnd(bytes, i) !== undefined) {
      return true;
    }
    i = bytes.indexOf(ESC, i + 1);
  }
  return false;
};

/**
 * Scan a line for its first annotation accepted by `select`.
 *
 * Marks each position before reading one byte; a byte that only looks like
 * the start of a preamble is skipped on its own and scanning resumes at
 * the next byte. `onSkipped` receives every unknown or malformed frame.
 */
export const scanAnnotations = <T>(
  bytes: Uint8Array,
  decoder: AnnotationDecoder,
  select: (annotation: Annotation) => T | undefined,
  onSkipped?: (skipped: SkippedAnnotation) => void
): T | undefined => {
  const cursor = new ByteCursor(bytes);
  let found: T | undefined;

  while (cursor.remaining > 0) {
    cursor.mark();
    if (cursor.readByte() !== ESC) {
      continue;
    }
    cursor.reset();

    const result = readAnnotation(cursor, decoder);
    switch (result.status) {
      case "not-annotation":
        cursor.reset();
        cursor.skip(1);
        break;
      case "unknown":
      case "malformed":
        onSkipped?.(result);
        break;
      case "decoded":
        if (found === undefined) {
          found = select(result.annotation);
        }
        break;
    }
  }

  return found;
};
