export type Logger = Pick<typeof console, "debug" | "log" | "warn" | "error">;

/**
 * Debug lines go to stderr and `log` lines to stdout.
 */
export function consoleLogger(verbose: boolean): Logger {
  return {
    debug(...params: unknown[]) {
      if (verbose) {
        console.error(`[${new Date().toISOString()}]`, ...params);
      }
    },
    log(...params: unknown[]) {
      console.log(`[${new Date().toISOString()}]`, ...params);
    },
    warn(...params: unknown[]) {
      console.warn(`[${new Date().toISOString()}]`, ...params);
    },
    error(...params: unknown[]) {
      console.error(`[${new Date().toISOString()}]`, ...params);
    },
  };
}

