/**
 * Sink for what this library reports without failing a request: selectors
 * dropped under `ignoreParseErrors`, JSON bodies it could not filter, and
 * errors the error handler turns into a 500. Messages go to the console,
 * tagged with the package name, until `setLogger` installs something else.
 *
 * @example
 * ```ts
 * setLogger({
 *   warn: (message, context) => pino.warn(context, message),
 *   error: (message, context) => pino.error(context, message),
 * });
 * ```
 */

export interface Logger {
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
}

const PREFIX = '[hono-partial-response]';

const defaultLogger: Logger = {
  warn(message, context) {
    if (context && Object.keys(context).length > 0) {
      console.warn(`${PREFIX} ${message}`, context);
    } else {
      console.warn(`${PREFIX} ${message}`);
    }
  },
  error(message, context) {
    if (context && Object.keys(context).length > 0) {
      console.error(`${PREFIX} ${message}`, context);
    } else {
      console.error(`${PREFIX} ${message}`);
    }
  },
};

let currentLogger: Logger = defaultLogger;

/** Send library messages to `logger` from now on. */
export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

/** The logger messages currently go to. */
export function getLogger(): Logger {
  return currentLogger;
}

/** Restore the console logger. */
export function resetLogger(): void {
  currentLogger = defaultLogger;
}
