import pino from "pino";

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogData = Record<string, unknown>;

/**
 * Log sink handed to every stage through the session. The CLI backs it with
 * pino on stderr so stdout stays free for command results.
 */
export interface Logger {
  debug(msg: string, data?: LogData): void;
  info(msg: string, data?: LogData): void;
  warn(msg: string, data?: LogData): void;
  error(msg: string, data?: LogData): void;
}

export function createLogger(level: LogLevel = "info"): Logger {
  const base = pino({ level, base: { service: "tzdb-updater" } }, pino.destination(2));
  return {
    debug: (msg, data) => (data ? base.debug(data, msg) : base.debug(msg)),
    info: (msg, data) => (data ? base.info(data, msg) : base.info(msg)),
    warn: (msg, data) => (data ? base.warn(data, msg) : base.warn(msg)),
    error: (msg, data) => (data ? base.error(data, msg) : base.error(msg))
  };
}
