/**
 * Annotation types.
 * Annotations are typed records embedded inline in log lines. The type
 * string inside each frame selects the codec that reads its payload.
 */

/**
 * AnnotationCodec converts one annotation type to and from its payload bytes.
 *
 * decode() throws AnnotationDecodeError when the payload is corrupt; the
 * reader treats that the same as an unknown type.
 */
export interface AnnotationCodec<T> {
  /** Discriminator written into every frame (printable ASCII, 1-255 chars) */
  readonly type: string;
  encode(value: T): Uint8Array;
  decode(payload: Uint8Array): T;
}

/**
 * A decoded annotation: its type and the value its codec produced.
 */
export interface Annotation<T = unknown> {
  readonly type: string;
  readonly value: T;
}

/**
 * Why a frame was consumed without producing an annotation.
 */
export type MalformedReason =
  | "unterminated"
  | "invalid-base64"
  | "invalid-header"
  | "invalid-payload";

/**
 * Outcome of reading one frame at a cursor positioned on a preamble byte.
 *
 * - decoded: a registered codec read the payload
 * - unknown: well-formed frame whose type has no codec
 * - malformed: frame structure or payload is corrupt
 * - not-annotation: the bytes at the cursor are not a preamble
 */
export type AnnotationReadResult =
  | { readonly status: "decoded"; readonly annotation: Annotation }
  | { readonly status: "unknown"; readonly type: string }
  | {
      readonly status: "malformed";
      readonly reason: MalformedReason;
      readonly detail: string;
    }
  | { readonly status: "not-annotation" };

/**
 * A frame the scanner consumed and discarded.
 */
export type SkippedAnnotation = Extract<
  AnnotationReadResult,
  { readonly status: "unknown" | "malformed" }
>;

/**
 * Resolves a payload type to a decoded annotation.
 * Returns undefined when no codec is registered for the type.
 */
export interface AnnotationDecoder {
  decode(type: string, payload: Uint8Array): Annotation | undefined;
}
