/**
 * Annotation codec registry.
 * Maps the type string carried by each frame to the codec that reads it.
 * An unregistered type is a normal outcome: logs may carry annotations
 * written by producers this reader does not know about.
 */

import { encodeAnnotation } from "./framing.js";
import { hyperlinkCodec } from "./hyperlink.js";
import { timestampCodec } from "./timestamp.js";
import type {
  Annotation,
  AnnotationCodec,
  AnnotationDecoder,
} from "./types.js";

/**
 * AnnotationRegistry holds the codecs used to decode annotation payloads.
 */
export class AnnotationRegistry implements AnnotationDecoder {
  private readonly codecs = new Map<string, AnnotationCodec<unknown>>();

  /**
   * Register a codec. A later registration for the same type replaces the
   * earlier one.
   */
  register<T>(codec: AnnotationCodec<T>): this {
    this.codecs.set(codec.type, codec);
    return this;
  }

  unregister(type: string): boolean {
    return this.codecs.delete(type);
  }

  get(type: string): AnnotationCodec<unknown> | undefined {
    return this.codecs.get(type);
  }

  has(type: string): boolean {
    return this.codecs.has(type);
  }

  /**
   * Registered types, in registration order.
   */
  types(): string[] {
    return [...this.codecs.keys()];
  }

  /**
   * Decode a payload of the given type.
   * Returns undefined for unregistered types; throws whatever the codec
   * throws for a corrupt payload.
   */
  decode(type: string, payload: Uint8Array): Annotation | undefined {
    const codec = this.codecs.get(type);
    if (!codec) {
      return undefined;
    }
    return { type, value: codec.decode(payload) };
  }

  /**
   * Encode a value as a complete frame using `codec`.
   * The codec does not need to be registered.
   */
  encode<T>(codec: AnnotationCodec<T>, value: T): Buffer {
    return encodeAnnotation(codec.type, codec.encode(value));
  }
}

/**
 * Create an empty registry.
 */
export const createRegistry = (): AnnotationRegistry =>
  new AnnotationRegistry();

/**
 * Create a registry with the built-in codecs (timestamp, hyperlink).
 */
export const createDefaultRegistry = (): AnnotationRegistry =>
  createRegistry().register(timestampCodec).register(hyperlinkCodec);
