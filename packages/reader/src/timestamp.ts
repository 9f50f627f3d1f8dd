/**
 * Line timestamps.
 * A timestamp annotation stores the wall-clock time of a line and, when the
 * writer knew it, the time elapsed since the build started. Resolution
 * fills in the elapsed time from the build's start when it is missing.
 */

import type { TimestampNote } from "./annotations/timestamp.js";
import type { BuildInfo } from "./log-source.js";

/**
 * Timestamp of one log line.
 */
export interface Timestamp {
  /** Milliseconds since the build started */
  readonly elapsedMillis: number;
  /** Milliseconds since the Unix epoch */
  readonly millisSinceEpoch: number;
}

/**
 * Turns a decoded timestamp annotation into a Timestamp for a build.
 */
export type TimestampResolver = (
  note: TimestampNote,
  build: BuildInfo
) => Timestamp;

export type TimestampFormat = "elapsed" | "system" | "none";

export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = [
  "elapsed",
  "system",
  "none",
];

export const isTimestampFormat = (value: string): value is TimestampFormat =>
  TIMESTAMP_FORMATS.some((format) => format === value);

/**
 * Default resolver: elapsed time as recorded, or derived from the build's
 * start time.
 */
export const resolveTimestamp: TimestampResolver = (note, build) => ({
  elapsedMillis:
    note.elapsedMillis ?? note.millisSinceEpoch - build.startTimeMillis,
  millisSinceEpoch: note.millisSinceEpoch,
});

export const timestampsEqual = (
  a: Timestamp | undefined,
  b: Timestamp | undefined
): boolean => {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return (
    a.elapsedMillis === b.elapsedMillis &&
    a.millisSinceEpoch === b.millisSinceEpoch
  );
};

const pad = (value: number, width: number): string =>
  String(value).padStart(width, "0");

/**
 * Formats elapsed milliseconds as HH:MM:SS.mmm.
 *
 * Examples:
 * - 0 -> "00:00:00.000"
 * - 1500 -> "00:00:01.500"
 * - 3_723_004 -> "01:02:03.004"
 * - -250 -> "-00:00:00.250"
 */
export const formatElapsed = (ms: number): string => {
  const sign = ms < 0 ? "-" : "";
  const total = Math.abs(Math.trunc(ms));
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = Math.floor((total % 60_000) / 1000);
  const millis = total % 1000;
  return `${sign}${pad(hours, 2)}:${pad(minutes, 2)}:${pad(seconds, 2)}.${pad(millis, 3)}`;
};

/**
 * Formats epoch milliseconds as an ISO 8601 UTC string.
 */
export const formatSystemTime = (ms: number): string =>
  new Date(ms).toISOString();

/**
 * Formats a timestamp for display. Returns "" for the "none" format.
 */
export const formatTimestamp = (
  timestamp: Timestamp,
  format: TimestampFormat
): string => {
  switch (format) {
    case "elapsed":
      return formatElapsed(timestamp.elapsedMillis);
    case "system":
      return formatSystemTime(timestamp.millisSinceEpoch);
    case "none":
      return "";
  }
};
