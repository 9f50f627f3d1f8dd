import { mkdirSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  openBuildLog,
  parseStartedAt,
  resolveCharset,
  resolveTimestampFormat,
} from "./build-log.js";

describe("parseStartedAt", () => {
  it("accepts epoch milliseconds", () => {
    expect(parseStartedAt("1700000000000")).toBe(1_700_000_000_000);
    expect(parseStartedAt(" 42 ")).toBe(42);
  });

  it("accepts ISO dates", () => {
    expect(parseStartedAt("2026-10-18T00:00:00Z")).toBe(
      Date.UTC(2026, 9, 18)
    );
  });

  it("rejects anything else", () => {
    expect(parseStartedAt("soon")).toBeUndefined();
    expect(parseStartedAt("")).toBeUndefined();
  });
});

describe("resolveTimestampFormat", () => {
  it("falls back when the flag is absent", () => {
    expect(resolveTimestampFormat(undefined, "system")).toBe("system");
    expect(resolveTimestampFormat("", "system")).toBe("system");
  });

  it("validates the flag", () => {
    expect(resolveTimestampFormat("none", "elapsed")).toBe("none");
    expect(() => resolveTimestampFormat("iso", "elapsed")).toThrow(
      'invalid format "iso" (expected elapsed, system, none)'
    );
  });
});

describe("resolveCharset", () => {
  it("falls back when the flag is absent", () => {
    expect(resolveCharset(undefined, "latin1")).toBe("latin1");
  });

  it("validates the flag", () => {
    expect(resolveCharset("ascii", "utf8")).toBe("ascii");
    expect(() => resolveCharset("utf16le", "utf8")).toThrow(
      'invalid charset "utf16le" (expected utf8, utf-8, latin1, ascii)'
    );
  });
});

describe("openBuildLog", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = join(
      tmpdir(),
      `stampline-cli-log-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    mkdirSync(tempDir, { recursive: true });
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("names the build after the file and uses --started-at", async () => {
    const path = join(tempDir, "build.log");
    writeFileSync(path, "x\n");

    const log = await openBuildLog(path, {
      charset: "latin1",
      startedAt: "5000",
    });

    expect(log.path).toBe(path);
    expect(log.charset).toBe("latin1");
    expect(log.build).toEqual({ id: "build.log", startTimeMillis: 5000 });
  });

  it("defaults the build start to the file's creation time", async () => {
    const path = join(tempDir, "build.log");
    writeFileSync(path, "x\n");
    const stats = statSync(path);
    const expected = Math.trunc(
      stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.mtimeMs
    );

    const log = await openBuildLog(path, { charset: "utf8" });

    expect(log.build.startTimeMillis).toBe(expected);
  });

  it("rejects a missing file", async () => {
    const path = join(tempDir, "missing.log");

    await expect(openBuildLog(path, { charset: "utf8" })).rejects.toThrow(
      `log not found: ${path}`
    );
  });

  it("rejects an unparseable start time", async () => {
    const path = join(tempDir, "build.log");
    writeFileSync(path, "x\n");

    await expect(
      openBuildLog(path, { charset: "utf8", startedAt: "soon" })
    ).rejects.toThrow("invalid --started-at value: soon");
  });
});
