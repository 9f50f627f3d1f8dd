import { describe, expect, it, vi } from "vitest";
import {
  containsAnnotation,
  encodeAnnotation,
  POSTAMBLE,
  PREAMBLE,
  readAnnotation,
  removeAnnotations,
  scanAnnotations,
  stripAnnotations,
} from "../annotations/framing.js";
import { hyperlinkCodec } from "../annotations/hyperlink.js";
import { createDefaultRegistry } from "../annotations/registry.js";
import {
  isTimestampAnnotation,
  TIMESTAMP_ANNOTATION_TYPE,
  timestampCodec,
} from "../annotations/timestamp.js";
import type {
  Annotation,
  AnnotationDecoder,
} from "../annotations/types.js";
import { ByteCursor } from "../byte-cursor.js";

// ============================================================================
// Test Helpers
// ============================================================================

const registry = createDefaultRegistry();

/** Frame around an arbitrary body, bypassing header validation */
const rawFrame = (body: number[]): Buffer =>
  Buffer.concat([
    PREAMBLE,
    Buffer.from(Buffer.from(body).toString("base64"), "latin1"),
    POSTAMBLE,
  ]);

const timestampFrame = (millisSinceEpoch: number): Buffer =>
  encodeAnnotation(
    TIMESTAMP_ANNOTATION_TYPE,
    timestampCodec.encode({ millisSinceEpoch })
  );

const text = (value: string): Buffer => Buffer.from(value, "latin1");

const read = (bytes: Uint8Array, decoder: AnnotationDecoder = registry) => {
  const cursor = new ByteCursor(bytes);
  return { result: readAnnotation(cursor, decoder), cursor };
};

// ============================================================================
// Encoding
// ============================================================================

describe("encodeAnnotation", () => {
  it("wraps a base64 body between preamble and postamble", () => {
    const frame = encodeAnnotation("t", Uint8Array.from([0xff]));

    // body: length 3 | type length 1 | "t" | 0xff
    const body = Buffer.from([0, 0, 0, 3, 1, 0x74, 0xff]).toString("base64");
    expect(frame.toString("latin1")).toBe(`\x1b[8mha:${body}\x1b[0m`);
  });

  it.each([
    ["an empty type", ""],
    ["a type with spaces", "two words"],
    ["a non-ASCII type", "tïmestamp"],
    ["a type over 255 characters", "x".repeat(256)],
  ])("rejects %s", (_label, type) => {
    expect(() => encodeAnnotation(type, new Uint8Array(0))).toThrow(
      RangeError
    );
  });

  it("accepts a 255 character type", () => {
    const type = "x".repeat(255);
    const { result } = read(encodeAnnotation(type, new Uint8Array(0)));

    expect(result).toEqual({ status: "unknown", type });
  });
});

// ============================================================================
// Reading
// ============================================================================

describe("readAnnotation", () => {
  it("decodes a registered type and stops after the postamble", () => {
    const frame = timestampFrame(1234);
    const { result, cursor } = read(Buffer.concat([frame, text("rest")]));

    expect(result).toEqual({
      status: "decoded",
      annotation: { type: "timestamp", value: { millisSinceEpoch: 1234 } },
    });
    expect(cursor.position).toBe(frame.length);
  });

  it("consumes nothing when no preamble is at the cursor", () => {
    const { result, cursor } = read(text("\x1b[31mred"));

    expect(result).toEqual({ status: "not-annotation" });
    expect(cursor.position).toBe(0);
  });

  it("reports well-formed frames of unregistered types as unknown", () => {
    const { result } = read(encodeAnnotation("x-other", Uint8Array.from([1])));

    expect(result).toEqual({ status: "unknown", type: "x-other" });
  });

  it("stops after the base64 run when the postamble is missing", () => {
    const { result, cursor } = read(text("\x1b[8mha:QUJD tail"));

    expect(result).toMatchObject({
      status: "malformed",
      reason: "unterminated",
    });
    expect(cursor.position).toBe(PREAMBLE.length + 4);
  });

  it("rejects a body that is not valid base64", () => {
    const { result, cursor } = read(text("\x1b[8mha:QUJ\x1b[0m"));

    expect(result).toEqual({
      status: "malformed",
      reason: "invalid-base64",
      detail: "body is not base64 (3 chars)",
    });
    expect(cursor.position).toBe(PREAMBLE.length + 3 + POSTAMBLE.length);
  });

  it.each([
    ["a body shorter than the header", [0, 0, 0, 0], "body too short (4 bytes)"],
    [
      "a length that disagrees with the body",
      [0, 0, 0, 9, 1, 0x78],
      "declared length 9 but body holds 2",
    ],
    ["an empty type", [0, 0, 0, 1, 0], "bad type length 0"],
    [
      "a type running past the body",
      [0, 0, 0, 2, 5, 0x78],
      "bad type length 5",
    ],
    [
      "a type that is not printable",
      [0, 0, 0, 2, 1, 0x20],
      "type is not printable ASCII",
    ],
  ])("rejects %s as an invalid header", (_label, body, detail) => {
    const { result } = read(rawFrame(body));

    expect(result).toEqual({
      status: "malformed",
      reason: "invalid-header",
      detail,
    });
  });

  it("reports codec failures as invalid payloads", () => {
    const frame = encodeAnnotation(hyperlinkCodec.type, Uint8Array.from([0]));

    const { result } = read(frame);

    expect(result).toEqual({
      status: "malformed",
      reason: "invalid-payload",
      detail: "invalid hyperlink annotation: payload too short (1 bytes)",
    });
  });

  it("does not let an unexpected decoder error escape", () => {
    const decoder: AnnotationDecoder = {
      decode: () => {
        throw new TypeError("boom");
      },
    };
    const frame = timestampFrame(1);

    const { result, cursor } = read(frame, decoder);

    expect(result).toEqual({
      status: "malformed",
      reason: "invalid-payload",
      detail: "boom",
    });
    expect(cursor.position).toBe(frame.length);
  });
});

// ============================================================================
// Stripping
// ============================================================================

describe("removeAnnotations", () => {
  it("removes every complete frame", () => {
    const bytes = Buffer.concat([
      text("a"),
      timestampFrame(1),
      text("b"),
      encodeAnnotation("x-other", Uint8Array.from([1, 2])),
    ]);

    expect(removeAnnotations(bytes).toString("latin1")).toBe("ab");
  });

  it("removes terminated frames with corrupt bodies", () => {
    const bytes = text("x\x1b[8mha:QUJ\x1b[0my");

    expect(removeAnnotations(bytes).toString("latin1")).toBe("xy");
  });

  it("keeps an unterminated preamble and other escape sequences", () => {
    const input = "\x1b[1mbold\x1b[0m \x1b[8mha:QUJD";

    expect(removeAnnotations(text(input)).toString("latin1")).toBe(input);
  });

  it("finds a frame right after an unterminated one", () => {
    const bytes = Buffer.concat([text("\x1b[8mha:QUJD"), timestampFrame(1)]);

    expect(removeAnnotations(bytes).toString("latin1")).toBe(
      "\x1b[8mha:QUJD"
    );
  });
});

describe("stripAnnotations", () => {
  it("returns text without escapes unchanged", () => {
    expect(stripAnnotations("plain text", "utf8")).toBe("plain text");
  });

  it("strips frames from multi-byte text", () => {
    const line = `ünïcode${timestampFrame(5).toString("latin1")} ✓`;

    expect(stripAnnotations(line, "utf8")).toBe("ünïcode ✓");
  });
});

describe("containsAnnotation", () => {
  it("detects a complete frame", () => {
    const line = `a${timestampFrame(5).toString("latin1")}`;

    expect(containsAnnotation(line, "utf8")).toBe(true);
  });

  it.each([
    ["plain text", "plain"],
    ["color codes", "\x1b[32mok\x1b[0m"],
    ["an unterminated frame", "\x1b[8mha:QUJD"],
  ])("is false for %s", (_label, line) => {
    expect(containsAnnotation(line, "utf8")).toBe(false);
  });
});

// ============================================================================
// Scanning
// ============================================================================

describe("scanAnnotations", () => {
  const selectTimestamp = (annotation: Annotation): number | undefined =>
    isTimestampAnnotation(annotation)
      ? annotation.value.millisSinceEpoch
      : undefined;

  it("returns the first selected annotation", () => {
    const bytes = Buffer.concat([
      text("a"),
      timestampFrame(10),
      text("b"),
      timestampFrame(20),
    ]);

    expect(scanAnnotations(bytes, registry, selectTimestamp)).toBe(10);
  });

  it("passes over decoded annotations the selector rejects", () => {
    const bytes = Buffer.concat([
      encodeAnnotation(
        hyperlinkCodec.type,
        hyperlinkCodec.encode({ url: "https://example.test", length: 1 })
      ),
      timestampFrame(30),
    ]);

    expect(scanAnnotations(bytes, registry, selectTimestamp)).toBe(30);
  });

  it("returns undefined when nothing is selected", () => {
    expect(
      scanAnnotations(text("no frames"), registry, selectTimestamp)
    ).toBeUndefined();
  });

  it("reports every skipped frame, including those after the match", () => {
    const onSkipped = vi.fn();
    const bytes = Buffer.concat([
      encodeAnnotation("x-first", Uint8Array.from([1])),
      timestampFrame(40),
      text("\x1b[8mha:QUJ\x1b[0m"),
    ]);

    const found = scanAnnotations(bytes, registry, selectTimestamp, onSkipped);

    expect(found).toBe(40);
    expect(onSkipped.mock.calls).toEqual([
      [{ status: "unknown", type: "x-first" }],
      [
        {
          status: "malformed",
          reason: "invalid-base64",
          detail: "body is not base64 (3 chars)",
        },
      ],
    ]);
  });

  it("resumes after a lone escape byte", () => {
    const bytes = Buffer.concat([text("\x1b\x1b[8"), timestampFrame(50)]);

    expect(scanAnnotations(bytes, registry, selectTimestamp)).toBe(50);
  });

  it("finds a frame that starts where an unterminated one stopped", () => {
    const onSkipped = vi.fn();
    const bytes = Buffer.concat([text("\x1b[8mha:QUJD"), timestampFrame(60)]);

    expect(scanAnnotations(bytes, registry, selectTimestamp, onSkipped)).toBe(
      60
    );
    expect(onSkipped).toHaveBeenCalledWith({
      status: "malformed",
      reason: "unterminated",
      detail: "frame has no closing sequence",
    });
  });
});
