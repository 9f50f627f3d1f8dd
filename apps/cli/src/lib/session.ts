import { exitWithError } from "../utils/error.js";
import { createSessionId, DebugLogger } from "../utils/debug-logger.js";

/**
 * Runs a command body with an optional per-session debug logger.
 * Failures are logged, reported to the user and exit with status 1.
 */
export const runWithDebug = async (
  command: string,
  enabled: boolean,
  task: (debug: DebugLogger | undefined) => Promise<void>
): Promise<void> => {
  const debug = enabled ? new DebugLogger(createSessionId()) : undefined;
  if (debug) {
    console.error(`debug log: ${debug.path}`);
  }

  try {
    await task(debug);
  } catch (error) {
    debug?.logError(error, command);
    debug?.close();
    exitWithError(error);
  }
  debug?.close();
};
