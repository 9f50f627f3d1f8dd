import { describe, expect, it } from "vitest";
import {
  ANSI_RESET,
  colors,
  hexToAnsi,
  paint,
  shouldUseColor,
} from "./styles.js";

describe("hexToAnsi", () => {
  it("converts hex colors to 24-bit escape codes", () => {
    expect(hexToAnsi("#585858")).toBe("\x1b[38;2;88;88;88m");
    expect(hexToAnsi("ff5f5f")).toBe("\x1b[38;2;255;95;95m");
  });
});

describe("paint", () => {
  it("wraps text when enabled", () => {
    expect(paint("x", colors.muted, true)).toBe(
      `\x1b[38;2;88;88;88mx${ANSI_RESET}`
    );
  });

  it("returns text unchanged when disabled", () => {
    expect(paint("x", colors.muted, false)).toBe("x");
  });
});

describe("shouldUseColor", () => {
  it("requires a terminal", () => {
    expect(shouldUseColor({ isTTY: true }, {})).toBe(true);
    expect(shouldUseColor({ isTTY: false }, {})).toBe(false);
    expect(shouldUseColor({}, {})).toBe(false);
  });

  it("respects NO_COLOR", () => {
    expect(shouldUseColor({ isTTY: true }, { NO_COLOR: "1" })).toBe(false);
  });
});
