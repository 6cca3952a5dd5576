/**
 * Subsystem loggers backed by tslog.
 *
 * Output goes to stderr so command output on stdout stays machine-readable.
 */

import { Logger, type ILogObj } from "tslog";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_IDS: Record<LogLevel, number> = {
  debug: 2,
  info: 3,
  warn: 4,
  error: 5,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some((l) => l === value);
}

const envLevel = process.env.SCOPELEDGER_LOG_LEVEL?.toLowerCase();

// Sub-loggers copy their parent's settings, so the threshold is kept here.
let minLevel = LEVEL_IDS[isLogLevel(envLevel) ? envLevel : "warn"];

const rootLogger = new Logger<ILogObj>({
  name: "scopeledger",
  type: "pretty",
  overwrite: {
    transportFormatted: (logMetaMarkup, logArgs, logErrors) => {
      const rest = [...logArgs, ...logErrors].map((a) =>
        typeof a === "string" ? a : JSON.stringify(a),
      );
      process.stderr.write(`${logMetaMarkup}${rest.join(" ")}\n`);
    },
  },
});

/**
 * Change the minimum level for every subsystem logger.
 * SCOPELEDGER_LOG_LEVEL wins over configuration.
 */
export function setLogLevel(level: LogLevel): void {
  if (isLogLevel(envLevel)) return;
  minLevel = LEVEL_IDS[level];
}

export type SubsystemLogger = {
  debug: (message: string, ...meta: unknown[]) => void;
  info: (message: string, ...meta: unknown[]) => void;
  warn: (message: string, ...meta: unknown[]) => void;
  error: (message: string, ...meta: unknown[]) => void;
  child: (name: string) => SubsystemLogger;
};

function wrap(logger: Logger<ILogObj>): SubsystemLogger {
  return {
    debug: (message, ...meta) => {
      if (LEVEL_IDS.debug >= minLevel) logger.debug(message, ...meta);
    },
    info: (message, ...meta) => {
      if (LEVEL_IDS.info >= minLevel) logger.info(message, ...meta);
    },
    warn: (message, ...meta) => {
      if (LEVEL_IDS.warn >= minLevel) logger.warn(message, ...meta);
    },
    error: (message, ...meta) => {
      if (LEVEL_IDS.error >= minLevel) logger.error(message, ...meta);
    },
    child: (name) => wrap(logger.getSubLogger({ name })),
  };
}

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  return wrap(rootLogger.getSubLogger({ name: subsystem }));
}
