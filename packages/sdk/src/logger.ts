/**
 * Injectable logger. Tests pass their own sink; the default goes to console.
 */

export interface ClientLogger {
  debug(message: string): void;
  warn(message: string): void;
}

const PREFIX = '[telegram-client]';

/** Default logger: console.warn, plus console.debug when enabled. */
export function createConsoleLogger(debug = false): ClientLogger {
  return {
    debug(message) {
      if (debug) console.debug(`${PREFIX} ${message}`);
    },
    warn(message) {
      console.warn(`${PREFIX} ${message}`);
    },
  };
}
