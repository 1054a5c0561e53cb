/***
 * Logger — Minimal context-tagged logging.
 *
 * The World never writes to the console on its own: it logs through the
 * Logger handed to it in WorldOptions, or through SILENT_LOGGER when none
 * is given. `debug: true` swaps in a console logger.
 *
 * Console output format:
 *
 *   [12:34:56] [DEBUG] [ecs] created store for Position
 *   [12:34:56] [WARN] [ecs] retired entity slot 7 at generation 2097151
 *
 ***/

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
}

const noop = (): void => {};

export const SILENT_LOGGER: Logger = Object.freeze({
  debug: noop,
  warn: noop,
});

export function format_log_line(
  level: "DEBUG" | "WARN",
  scope: string,
  message: string,
  now: Date = new Date(),
): string {
  const timestamp = now.toISOString().slice(11, 19);
  return `[${timestamp}] [${level}] [${scope}] ${message}`;
}

/** Logger that writes formatted lines to console.debug / console.warn. */
export function create_console_logger(scope = "ecs"): Logger {
  return {
    debug(message, context) {
      const line = format_log_line("DEBUG", scope, message);
      if (context === undefined) console.debug(line);
      else console.debug(line, context);
    },
    warn(message, context) {
      const line = format_log_line("WARN", scope, message);
      if (context === undefined) console.warn(line);
      else console.warn(line, context);
    },
  };
}
