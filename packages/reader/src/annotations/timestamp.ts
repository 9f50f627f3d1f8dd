/**
 * Timestamp annotation codec.
 *
 * Payload layout:
 *   u8 flags            bit 0 set when elapsedMillis follows
 *   i64be millisSinceEpoch
 *   i64be elapsedMillis  (optional)
 */

import { AnnotationDecodeError } from "../errors.js";
import type { Annotation, AnnotationCodec } from "./types.js";

export const TIMESTAMP_ANNOTATION_TYPE = "timestamp";

const FLAG_ELAPSED = 0x01;
const SHORT_LENGTH = 9;
const FULL_LENGTH = 17;

/**
 * Value carried by a timestamp annotation.
 * Writers that know the build start record elapsedMillis directly.
 */
export interface TimestampNote {
  readonly millisSinceEpoch: number;
  readonly elapsedMillis?: number;
}

const readMillis = (
  payload: Buffer,
  offset: number,
  field: string
): number => {
  const value = Number(payload.readBigInt64BE(offset));
  if (!Number.isSafeInteger(value)) {
    throw new AnnotationDecodeError(
      TIMESTAMP_ANNOTATION_TYPE,
      `${field} out of range`
    );
  }
  return value;
};

export const timestampCodec: AnnotationCodec<TimestampNote> = {
  type: TIMESTAMP_ANNOTATION_TYPE,

  encode(note: TimestampNote): Uint8Array {
    const hasElapsed = note.elapsedMillis !== undefined;
    const payload = Buffer.alloc(hasElapsed ? FULL_LENGTH : SHORT_LENGTH);
    payload.writeUInt8(hasElapsed ? FLAG_ELAPSED : 0, 0);
    payload.writeBigInt64BE(BigInt(Math.trunc(note.millisSinceEpoch)), 1);
    if (note.elapsedMillis !== undefined) {
      payload.writeBigInt64BE(BigInt(Math.trunc(note.elapsedMillis)), 9);
    }
    return payload;
  },

  decode(bytes: Uint8Array): TimestampNote {
    const payload = Buffer.from(
      bytes.buffer,
      bytes.byteOffset,
      bytes.byteLength
    );
    if (payload.length < 1) {
      throw new AnnotationDecodeError(
        TIMESTAMP_ANNOTATION_TYPE,
        "empty payload"
      );
    }

    const flags = payload.readUInt8(0);
    if ((flags & ~FLAG_ELAPSED) !== 0) {
      throw new AnnotationDecodeError(
        TIMESTAMP_ANNOTATION_TYPE,
        `unknown flags 0x${flags.toString(16).padStart(2, "0")}`
      );
    }

    const expected = flags & FLAG_ELAPSED ? FULL_LENGTH : SHORT_LENGTH;
    if (payload.length !== expected) {
      throw new AnnotationDecodeError(
        TIMESTAMP_ANNOTATION_TYPE,
        `expected ${expected} bytes, got ${payload.length}`
      );
    }

    const millisSinceEpoch = readMillis(payload, 1, "millisSinceEpoch");
    if (expected === SHORT_LENGTH) {
      return { millisSinceEpoch };
    }
    return {
      millisSinceEpoch,
      elapsedMillis: readMillis(payload, 9, "elapsedMillis"),
    };
  },
};

/**
 * Check whether a value has the shape of a TimestampNote.
 */
export const isTimestampNote = (value: unknown): value is TimestampNote => {
  if (typeof value !== "object" || value === null) {
    return false;
  }
  if (
    !("millisSinceEpoch" in value) ||
    typeof value.millisSinceEpoch !== "number"
  ) {
    return false;
  }
  return (
    !("elapsedMillis" in value) ||
    value.elapsedMillis === undefined ||
    typeof value.elapsedMillis === "number"
  );
};

/**
 * Narrow a decoded annotation to a timestamp annotation.
 */
export const isTimestampAnnotation = (
  annotation: Annotation
): annotation is Annotation<TimestampNote> =>
  annotation.type === TIMESTAMP_ANNOTATION_TYPE &&
  isTimestampNote(annotation.value);
