/**
 * DecodedLine is one line of a build log after annotation removal.
 */

import { type Timestamp, timestampsEqual } from "./timestamp.js";

export interface DecodedLine {
  /** Line content with every annotation frame removed */
  readonly text: string;
  /** Timestamp from the first timestamp annotation on the line, if any */
  readonly timestamp: Timestamp | undefined;
}

/**
 * Create a frozen DecodedLine.
 */
export const createDecodedLine = (
  text: string,
  timestamp?: Timestamp
): DecodedLine =>
  Object.freeze({
    text,
    timestamp: timestamp ? Object.freeze({ ...timestamp }) : undefined,
  });

/**
 * Structural equality over text and timestamp.
 */
export const decodedLinesEqual = (a: DecodedLine, b: DecodedLine): boolean =>
  a.text === b.text && timestampsEqual(a.timestamp, b.timestamp);

/**
 * Key that is equal for structurally equal lines. Suitable for Map/Set
 * deduplication.
 */
export const decodedLineKey = (line: DecodedLine): string =>
  JSON.stringify([
    line.text,
    line.timestamp?.elapsedMillis ?? null,
    line.timestamp?.millisSinceEpoch ?? null,
  ]);

/**
 * Debug representation, e.g.
 * DecodedLine{text="done", timestamp={elapsedMillis=5, millisSinceEpoch=1005}}
 */
export const formatDecodedLine = (line: DecodedLine): string => {
  const timestamp = line.timestamp
    ? `{elapsedMillis=${line.timestamp.elapsedMillis}, millisSinceEpoch=${line.timestamp.millisSinceEpoch}}`
    : "absent";
  return `DecodedLine{text=${JSON.stringify(line.text)}, timestamp=${timestamp}}`;
};
