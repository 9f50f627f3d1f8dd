import {
  existsSync,
  mkdirSync,
  readdirSync,
  readFileSync,
  rmSync,
  utimesSync,
  writeFileSync,
} from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createSessionId,
  DebugLogger,
  getDebugDir,
  MAX_LOG_FILES,
} from "./debug-logger.js";

describe("DebugLogger", () => {
  let tempDir: string;
  let debugDir: string;

  beforeEach(() => {
    tempDir = join(
      tmpdir(),
      `stampline-debug-test-${Date.now()}-${Math.random().toString(36).slice(2)}`
    );
    debugDir = join(tempDir, "debug");
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("creates the debug directory and a log file with a header", () => {
    const logger = new DebugLogger("session-1", debugDir);

    expect(logger.path).toBe(join(debugDir, "session-1.log"));
    expect(logger.id).toBe("session-1");
    const content = readFileSync(logger.path, "utf-8");
    expect(content).toContain("stampline Debug Log\nSession ID: session-1\n");
    expect(content).toContain(" DebugLogger initialized\n");
  });

  it("appends timestamped messages", () => {
    const logger = new DebugLogger("session-2", debugDir);

    logger.log("line 3: skipped annotation of unknown type \"x\"");
    logger.logPhase("lines", "opened build.log");

    const content = readFileSync(logger.path, "utf-8");
    expect(content).toMatch(
      /\n\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}[+-]\d{2}:\d{2} line 3: skipped annotation of unknown type "x"\n/
    );
    expect(content).toContain(" [lines] opened build.log\n");
  });

  it("logs errors with their context and stack", () => {
    const logger = new DebugLogger("session-3", debugDir);

    logger.logError(new Error("boom"), "release log stream");
    logger.logError("not an error");

    const content = readFileSync(logger.path, "utf-8");
    expect(content).toContain(" [release log stream] Error: boom\n");
    expect(content).toContain(" Stack trace:\nError: boom\n");
    expect(content).toContain(" Error: not an error\n");
  });

  it("ignores messages after close", () => {
    const logger = new DebugLogger("session-4", debugDir);

    logger.close();
    logger.close();
    logger.log("late message");

    const content = readFileSync(logger.path, "utf-8");
    expect(content).toContain(" DebugLogger closed\n");
    expect(content).not.toContain("late message");
    expect(content.match(/DebugLogger closed/g)).toHaveLength(1);
  });

  it("keeps only the most recent log files", () => {
    mkdirSync(debugDir, { recursive: true });
    const base = Date.now() / 1000 - 1000;
    for (let i = 0; i < 12; i++) {
      const file = join(debugDir, `old-${i}.log`);
      writeFileSync(file, "");
      utimesSync(file, base + i, base + i);
    }
    writeFileSync(join(debugDir, "notes.txt"), "");

    new DebugLogger("session-5", debugDir);

    const logs = readdirSync(debugDir).filter((file) => file.endsWith(".log"));
    expect(logs).toHaveLength(MAX_LOG_FILES);
    expect(logs).toContain("session-5.log");
    expect(existsSync(join(debugDir, "old-2.log"))).toBe(false);
    expect(existsSync(join(debugDir, "old-3.log"))).toBe(true);
    expect(existsSync(join(debugDir, "notes.txt"))).toBe(true);
  });
});

describe("getDebugDir", () => {
  const original = process.env.STAMPLINE_HOME;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.STAMPLINE_HOME;
    } else {
      process.env.STAMPLINE_HOME = original;
    }
  });

  it("lives under the stampline directory", () => {
    process.env.STAMPLINE_HOME = "/srv/stampline";

    expect(getDebugDir()).toBe(join("/srv/stampline", "debug"));
  });
});

describe("createSessionId", () => {
  it("starts with the UTC start time", () => {
    const id = createSessionId(new Date("2026-10-18T14:22:33.000Z"));

    expect(id).toMatch(/^20261018-142233-[0-9a-z]{1,4}$/);
  });
});
