/**
 * Line rendering for terminal output.
 */

import {
  type DecodedLine,
  formatTimestamp,
  type TimestampFormat,
} from "@stampline/reader";
import { colors, paint } from "../tui/styles.js";

export interface RenderOptions {
  format: TimestampFormat;
  color: boolean;
}

// Width of a formatted timestamp, used to pad lines without one
const PREFIX_WIDTH: Record<TimestampFormat, number> = {
  elapsed: "00:00:00.000".length,
  system: "1970-01-01T00:00:00.000Z".length,
  none: 0,
};

/**
 * Renders a decoded line as "[timestamp] text".
 * Lines without a timestamp are indented to keep the text aligned.
 */
export const renderLine = (
  line: DecodedLine,
  options: RenderOptions
): string => {
  if (options.format === "none") {
    return line.text;
  }
  if (!line.timestamp) {
    return `${" ".repeat(PREFIX_WIDTH[options.format] + 2)} ${line.text}`;
  }
  const prefix = `[${formatTimestamp(line.timestamp, options.format)}]`;
  return `${paint(prefix, colors.muted, options.color)} ${line.text}`;
};
