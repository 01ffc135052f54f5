import pino from "pino";
import pretty from "pino-pretty";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

export interface LoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  noColor?: boolean;
  debug?: boolean;
  /** Drop everything, including errors. Used by tests and embedding callers. */
  silent?: boolean;
}

function resolveLevel(options: LoggerOptions): string {
  if (options.silent) return "silent";
  if (options.debug || options.verbose) return "debug";
  if (options.quiet) return "error";
  return "info";
}

function createPinoLogger(options: LoggerOptions = {}): pino.Logger {
  const level = resolveLevel(options);

  // --debug emits ndjson so output can be piped into other tooling
  if (options.debug) {
    return pino({
      level,
      timestamp: pino.stdTimeFunctions.isoTime,
    });
  }

  const stream = pretty({
    colorize: !(options.noColor ?? false),
    ignore: "pid,hostname,level",
    translateTime: "HH:MM:ss",
    messageFormat: (log, messageKey) => {
      const msg = String(log[messageKey]);
      if (log.level === 30) return msg;
      const levelLabel =
        log.level === 40 ? "WARN" : log.level === 50 ? "ERROR" : "DEBUG";
      return `${levelLabel}: ${msg}`;
    },
    singleLine: true,
  });

  return pino({ level }, stream);
}

function createFallbackLogger(options: LoggerOptions = {}): pino.Logger {
  return pino({
    level: resolveLevel(options),
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export function createLogger(options?: LoggerOptions): Logger {
  let pinoLogger: pino.Logger;

  try {
    pinoLogger = createPinoLogger(options);
  } catch {
    pinoLogger = createFallbackLogger(options);
  }

  const emit = (level: LogLevel, message: string, args: unknown[]): void => {
    if (args.length > 0) {
      pinoLogger[level]({ args }, message);
    } else {
      pinoLogger[level](message);
    }
  };

  return {
    debug: (message, ...args) => emit("debug", message, args),
    info: (message, ...args) => emit("info", message, args),
    warn: (message, ...args) => emit("warn", message, args),
    error: (message, ...args) => emit("error", message, args),
  };
}
