/**
 * Winston-based structured logging.
 *
 * `human` renders timestamped lines with trailing JSON metadata; `jsonl`
 * renders one JSON object per line so runs can be piped into other tools.
 */

import winston from "winston";

const { combine, timestamp, printf, errors, json } = winston.format;

export type LogFormat = "human" | "jsonl";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface LogMetadata {
  instrument?: string;
  operation?: string;
  runId?: string;
  [key: string]: unknown;
}

export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;
  info(message: string, metadata?: LogMetadata): void;
  warn(message: string, metadata?: LogMetadata): void;
  error(message: string, error?: unknown, metadata?: LogMetadata): void;
  child(defaultMetadata: LogMetadata): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  format?: LogFormat;
  silent?: boolean;
  /** Route output to a stream other than stderr (used by tests and piping). */
  stream?: NodeJS.WritableStream;
};

const humanFormat = printf(({ level, message, timestamp, stack, ...metadata }) => {
  const meta = Object.keys(metadata).length > 0 ? ` ${JSON.stringify(metadata)}` : "";
  const stackTrace = typeof stack === "string" ? `\n${stack}` : "";
  return `${String(timestamp)} [${level}] ${String(message)}${meta}${stackTrace}`;
});

function buildWinston(opts: LoggerOptions): winston.Logger {
  const format = opts.format === "jsonl"
    ? combine(errors({ stack: true }), timestamp(), json())
    : combine(errors({ stack: true }), timestamp({ format: "YYYY-MM-DD HH:mm:ss.SSS" }), humanFormat);

  // Results go to stdout, so diagnostics default to stderr.
  const transport = opts.stream
    ? new winston.transports.Stream({ stream: opts.stream })
    : new winston.transports.Console({ stderrLevels: ["error", "warn", "info", "debug"] });

  return winston.createLogger({
    level: opts.level ?? resolveLevel(process.env.SWEEP_LOG_LEVEL),
    format,
    silent: opts.silent ?? false,
    transports: [transport],
  });
}

function resolveLevel(value: string | undefined): LogLevel {
  switch (value) {
    case "error":
    case "warn":
    case "info":
    case "debug":
      return value;
    default:
      return "info";
  }
}

function wrap(base: winston.Logger, defaultMetadata: LogMetadata): Logger {
  return {
    debug(message: string, metadata?: LogMetadata): void {
      base.debug(message, { ...defaultMetadata, ...metadata });
    },

    info(message: string, metadata?: LogMetadata): void {
      base.info(message, { ...defaultMetadata, ...metadata });
    },

    warn(message: string, metadata?: LogMetadata): void {
      base.warn(message, { ...defaultMetadata, ...metadata });
    },

    error(message: string, error?: unknown, metadata?: LogMetadata): void {
      const detail = error instanceof Error
        ? { error: error.message, code: readCode(error), stack: error.stack }
        : error === undefined ? {} : { error: String(error) };
      base.error(message, { ...defaultMetadata, ...metadata, ...detail });
    },

    child(childMetadata: LogMetadata): Logger {
      return wrap(base, { ...defaultMetadata, ...childMetadata });
    },
  };
}

function readCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, "code");
  return typeof code === "string" ? code : undefined;
}

export function createLogger(opts: LoggerOptions = {}, defaultMetadata: LogMetadata = {}): Logger {
  return wrap(buildWinston(opts), defaultMetadata);
}

/** Logger that drops everything; the default for library use and tests. */
export function silentLogger(): Logger {
  return createLogger({ silent: true });
}
