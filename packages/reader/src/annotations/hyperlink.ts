/**
 * Hyperlink annotation codec.
 * Marks the next `length` characters of visible text as a link to `url`.
 *
 * Payload layout: u16be length | UTF-8 url
 */

import { AnnotationDecodeError } from "../errors.js";
import type { AnnotationCodec } from "./types.js";

export const HYPERLINK_ANNOTATION_TYPE = "hyperlink";

const MAX_LENGTH = 0xff_ff;

export interface HyperlinkNote {
  readonly url: string;
  readonly length: number;
}

export const hyperlinkCodec: AnnotationCodec<HyperlinkNote> = {
  type: HYPERLINK_ANNOTATION_TYPE,

  encode(note: HyperlinkNote): Uint8Array {
    if (
      !Number.isInteger(note.length) ||
      note.length < 0 ||
      note.length > MAX_LENGTH
    ) {
      throw new RangeError(`hyperlink length out of range: ${note.length}`);
    }
    const url = Buffer.from(note.url, "utf8");
    const payload = Buffer.alloc(2 + url.length);
    payload.writeUInt16BE(note.length, 0);
    payload.set(url, 2);
    return payload;
  },

  decode(bytes: Uint8Array): HyperlinkNote {
    if (bytes.length < 3) {
      throw new AnnotationDecodeError(
        HYPERLINK_ANNOTATION_TYPE,
        `payload too short (${bytes.length} bytes)`
      );
    }
    const payload = Buffer.from(
      bytes.buffer,
      bytes.byteOffset,
      bytes.byteLength
    );
    return {
      length: payload.readUInt16BE(0),
      url: payload.toString("utf8", 2),
    };
  },
};
