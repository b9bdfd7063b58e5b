/**
 * Console logging. Debug output only appears when DEBUG is set (or the
 * navigator is created with debug: true).
 */

export interface Logger {
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(debug: boolean): Logger {
  return {
    debug(message) {
      if (debug) console.error(`🔎 ${message}`);
    },
    warn(message) {
      console.warn(`⚠️ ${message}`);
    },
  };
}
