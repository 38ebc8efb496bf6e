/**
 * Library-wide logger. Tools replace it with setLog().
 */

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Default logger: console for info/warn/error, debug dropped.
 * Override debug to see per-record diagnostics.
 */
export const consoleLog: Logger = {
  info(message: string): void {
    console.log(message);
  },
  warn(message: string): void {
    console.warn(message);
  },
  error(message: string): void {
    console.error(message);
  },
  debug(_message: string): void {},
};

export let log: Logger = consoleLog;

/**
 * Sets the global log
 */
export function setLog(logger: Logger): void {
  log = logger;
}
