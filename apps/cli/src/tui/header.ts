import { getVersion } from "../utils/version.js";
import { ANSI_RESET, colors, hexToAnsi } from "./styles.js";

/**
 * Prints the branded header shown above command output.
 */
export const printHeader = (command: string): void => {
  const brandAnsi = hexToAnsi(colors.brand);
  console.log();
  console.log(`${brandAnsi}stampline v${getVersion()}${ANSI_RESET} ${command}`);
  console.log();
};
