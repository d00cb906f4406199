/* eslint-disable no-console */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/**
 * Writes `[LEVEL] message` lines to stderr so stdout stays free for command output.
 * Debug lines are only written when `verbose` is set.
 */
export function createConsoleLogger(verbose = false): Logger {
  return {
    debug: (message) => {
      if (verbose) console.error(`[DEBUG] ${message}`);
    },
    info: (message) => console.error(`[INFO] ${message}`),
    warn: (message) => console.error(`[WARN] ${message}`),
    error: (message) => console.error(`[ERROR] ${message}`),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
