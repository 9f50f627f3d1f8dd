/**
 * stampline CLI colors
 *
 * - brand: headers
 * - muted: timestamp prefixes
 * - error: errors only
 */

export const colors = {
  brand: "#17DB4E",
  muted: "#585858", // Gray (ANSI 240)
  error: "#ff5f5f", // Red (ANSI 203)
} as const;

export type Color = (typeof colors)[keyof typeof colors];

/**
 * Converts a hex color to ANSI escape code for true color (24-bit) terminals.
 */
export const hexToAnsi = (hex: string): string => {
  const cleaned = hex.replace("#", "");
  const r = Number.parseInt(cleaned.slice(0, 2), 16);
  const g = Number.parseInt(cleaned.slice(2, 4), 16);
  const b = Number.parseInt(cleaned.slice(4, 6), 16);
  return `\x1b[38;2;${r};${g};${b}m`;
};

export const ANSI_RESET = "\x1b[0m";

/**
 * Wraps text in a color, or returns it unchanged when color is off.
 */
export const paint = (text: string, color: Color, enabled: boolean): string =>
  enabled ? `${hexToAnsi(color)}${text}${ANSI_RESET}` : text;

/**
 * Color is on for terminals unless NO_COLOR is set.
 */
export const shouldUseColor = (
  stream: { isTTY?: boolean } = process.stdout,
  env: NodeJS.ProcessEnv = process.env
): boolean => Boolean(stream.isTTY) && !env.NO_COLOR;
