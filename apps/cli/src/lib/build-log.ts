/**
 * Opens build logs from the file system for the CLI commands.
 */

import { stat } from "node:fs/promises";
import { basename, resolve } from "node:path";
import {
  createFileBuildLog,
  type FileBuildLog,
  isLogCharset,
  isTimestampFormat,
  LOG_CHARSETS,
  type LogCharset,
  TIMESTAMP_FORMATS,
  type TimestampFormat,
} from "@stampline/reader";

const EPOCH_MILLIS_PATTERN = /^\d+$/;

export interface OpenBuildLogOptions {
  charset: LogCharset;
  /** Build start as epoch millis or a date string */
  startedAt?: string;
}

/**
 * Parses a build start given as epoch millis or an ISO 8601 date.
 */
export const parseStartedAt = (value: string): number | undefined => {
  const trimmed = value.trim();
  if (EPOCH_MILLIS_PATTERN.test(trimmed)) {
    return Number(trimmed);
  }
  const parsed = Date.parse(trimmed);
  return Number.isNaN(parsed) ? undefined : parsed;
};

/**
 * Resolves the --format flag, falling back to the configured format.
 */
export const resolveTimestampFormat = (
  value: string | undefined,
  fallback: TimestampFormat
): TimestampFormat => {
  if (!value) {
    return fallback;
  }
  if (!isTimestampFormat(value)) {
    throw new Error(
      `invalid format "${value}" (expected ${TIMESTAMP_FORMATS.join(", ")})`
    );
  }
  return value;
};

/**
 * Resolves the --charset flag, falling back to the configured charset.
 */
export const resolveCharset = (
  value: string | undefined,
  fallback: LogCharset
): LogCharset => {
  if (!value) {
    return fallback;
  }
  if (!isLogCharset(value)) {
    throw new Error(
      `invalid charset "${value}" (expected ${LOG_CHARSETS.join(", ")})`
    );
  }
  return value;
};

/**
 * Opens the log at `path`. Without --started-at the build is taken to have
 * started when the file was created, or last modified where the file
 * system does not record creation times.
 */
export const openBuildLog = async (
  path: string,
  options: OpenBuildLogOptions
): Promise<FileBuildLog> => {
  const absolute = resolve(path);
  const stats = await stat(absolute).catch((error: unknown) => {
    throw new Error(`log not found: ${absolute}`, { cause: error });
  });

  let startTimeMillis = Math.trunc(
    stats.birthtimeMs > 0 ? stats.birthtimeMs : stats.mtimeMs
  );
  if (options.startedAt !== undefined) {
    const parsed = parseStartedAt(options.startedAt);
    if (parsed === undefined) {
      throw new Error(`invalid --started-at value: ${options.startedAt}`);
    }
    startTimeMillis = parsed;
  }

  return createFileBuildLog(absolute, {
    build: { id: basename(absolute), startTimeMillis },
    charset: options.charset,
  });
};
