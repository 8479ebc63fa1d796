/**
 * Minimal logger used across commands. Defaults to console; every line carries the tool prefix.
 */

export type Logger = {
  info: (msg: string) => void;
  warn: (msg: string) => void;
  error: (msg: string) => void;
};

export const LOG_PREFIX = "commit-bump:";

export type LoggerOptions = {
  /** Drop info lines (warnings and errors still print) */
  quiet?: boolean;
  /** Underlying sink; console when omitted */
  sink?: Logger;
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const sink: Logger = opts.sink ?? {
    info: (msg) => console.log(msg),
    warn: (msg) => console.warn(msg),
    error: (msg) => console.error(msg),
  };
  return {
    info: (msg) => {
      if (!opts.quiet) sink.info(`${LOG_PREFIX} ${msg}`);
    },
    warn: (msg) => sink.warn(`${LOG_PREFIX} ${msg}`),
    error: (msg) => sink.error(`${LOG_PREFIX} ${msg}`),
  };
}
