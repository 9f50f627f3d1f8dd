/**
 * Formats an unknown error into a string message.
 */
export const formatError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

/**
 * Prints an error for the user and exits with status 1.
 */
export const exitWithError = (error: unknown): never => {
  console.error(`Error: ${formatError(error)}`);
  process.exit(1);
};
