/**
 * Console logging with a verbosity threshold.
 *
 * - error: always printed
 * - warn: default threshold
 * - info: --verbose
 * - debug: --debug
 */

export const LOG_LEVELS = ["error", "warn", "info", "debug"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type Logger = {
  level: LogLevel;
  error: (message: string, ...details: unknown[]) => void;
  warn: (message: string, ...details: unknown[]) => void;
  info: (message: string, ...details: unknown[]) => void;
  debug: (message: string, ...details: unknown[]) => void;
  /** Final run summary; hidden by --quiet. */
  result: (message: string) => void;
};

export type VerbosityFlags = {
  quiet?: boolean;
  verbose?: boolean;
  debug?: boolean;
};

/** Quiet wins over verbose and debug. */
export const levelFromFlags = ({ quiet, verbose, debug }: VerbosityFlags): LogLevel => {
  if (quiet) return "error";
  if (debug) return "debug";
  if (verbose) return "info";
  return "warn";
};

const SINKS: Record<LogLevel, (...args: unknown[]) => void> = {
  error: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  info: (...args) => console.info(...args),
  debug: (...args) => console.debug(...args),
};

const enabled = (threshold: LogLevel, level: LogLevel): boolean =>
  LOG_LEVELS.indexOf(level) <= LOG_LEVELS.indexOf(threshold);

export const createLogger = (level: LogLevel): Logger => {
  const write =
    (target: LogLevel) =>
    (message: string, ...details: unknown[]): void => {
      if (!enabled(level, target)) return;
      SINKS[target](`[${target.toUpperCase()}] ${message}`, ...details);
    };

  return {
    level,
    error: write("error"),
    warn: write("warn"),
    info: write("info"),
    debug: write("debug"),
    result: (message) => {
      if (level === "error") return;
      console.log(message);
    },
  };
};

const noop = (): void => {};

export const silentLogger: Logger = {
  level: "error",
  error: noop,
  warn: noop,
  info: noop,
  debug: noop,
  result: noop,
};
