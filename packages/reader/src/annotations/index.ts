// biome-ignore-all lint/performance/noBarrelFile: This is the annotations module's public API

/**
 * Annotation framing, codecs and registry.
 */

export {
  containsAnnotation,
  encodeAnnotation,
  POSTAMBLE,
  PREAMBLE,
  readAnnotation,
  removeAnnotations,
  scanAnnotations,
  stripAnnotations,
} from "./framing.js";
export { HYPERLINK_ANNOTATION_TYPE, hyperlinkCodec } from "./hyperlink.js";
export type { HyperlinkNote } from "./hyperlink.js";
export {
  AnnotationRegistry,
  createDefaultRegistry,
  createRegistry,
} from "./registry.js";
export {
  isTimestampAnnotation,
  isTimestampNote,
  TIMESTAMP_ANNOTATION_TYPE,
  timestampCodec,
} from "./timestamp.js";
export type { TimestampNote } from "./timestamp.js";
export type {
  Annotation,
  AnnotationCodec,
  AnnotationDecoder,
  AnnotationReadResult,
  MalformedReason,
  SkippedAnnotation,
} from "./types.js";
