/**
 * Default logger
 */

import { Logger } from "../types";

export const getLogger: (verbose?: boolean) => Logger = (verbose?: boolean) => ({
  info: (...args) => console.info(...args),
  warn: (...args) => console.warn(...args),
  error: (...args) => console.error(...args),
  debug: (...args) => {
    if (verbose) console.debug(...args);
  },
});

export const defaultLogger: Logger = getLogger(false);

/**
 * Log each non-empty line of a command's output
 */
export function logLines(output: string, log: (line: string) => void): void {
  output.split("\n").forEach((line) => {
    if (line.trim()) {
      log(line);
    }
  });
}
