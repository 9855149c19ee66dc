/**
 * Structured Logging
 *
 * Leveled logger that carries bound fields. Entries go to a pluggable
 * sink; the default sink prints JSON lines in production and coloured
 * single lines everywhere else.
 *
 * Every request gets its own logger from `forRequest()`, so anything a
 * handler logs is tagged with the request id, method and path.
 */

import { randomUUID } from 'node:crypto';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type LogFormat = 'json' | 'pretty';

export type LogFields = Record<string, unknown>;

export interface SerializedError {
  name: string;
  message: string;
  stack?: string;
}

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  context?: LogFields;
  error?: SerializedError;
}

export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  level?: LogLevel;
  format?: LogFormat;
  /** Fields attached to every entry */
  context?: LogFields;
  /** Replaces printing, e.g. to collect entries in tests */
  output?: LogSink;
}

/** Fields bound by `forRequest()` */
export interface RequestLogFields {
  method: string;
  path: string;
  requestId?: string;
}

const SEVERITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

const ANSI = {
  debug: '\x1b[36m',
  info: '\x1b[32m',
  warn: '\x1b[33m',
  error: '\x1b[31m',
  dim: '\x1b[2m',
  reset: '\x1b[0m',
} as const;

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && Object.hasOwn(SEVERITY, value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return value === 'json' || value === 'pretty';
}

export function serializeError(error: Error): SerializedError {
  return { name: error.name, message: error.message, stack: error.stack };
}

/**
 * One-line human rendering: time, padded level, message, then the
 * fields as JSON when there are any.
 */
export function formatPretty(entry: LogEntry): string {
  const { dim, reset } = ANSI;
  const level = ANSI[entry.level] + entry.level.toUpperCase().padEnd(5) + reset;
  let line = `${dim}${entry.timestamp}${reset} ${level} ${entry.message}`;

  if (entry.context && Object.keys(entry.context).length > 0) {
    line += ` ${dim}${JSON.stringify(entry.context)}${reset}`;
  }
  if (entry.error?.stack) {
    line += `\n${dim}${entry.error.stack}${reset}`;
  }
  return line;
}

function consoleSink(format: LogFormat): LogSink {
  return (entry) => {
    console.log(format === 'json' ? JSON.stringify(entry) : formatPretty(entry));
  };
}

export class Logger {
  private level: LogLevel;
  private readonly format: LogFormat;
  private readonly fields: LogFields;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? 'info';
    this.format = options.format ?? 'json';
    this.fields = options.context ?? {};
    this.sink = options.output ?? consoleSink(this.format);
  }

  debug(message: string, context?: LogFields): void {
    this.write('debug', message, context);
  }

  info(message: string, context?: LogFields): void {
    this.write('info', message, context);
  }

  warn(message: string, context?: LogFields): void {
    this.write('warn', message, context);
  }

  error(message: string, error?: Error, context?: LogFields): void {
    this.write('error', message, context, error);
  }

  /**
   * A logger sharing this one's level and sink, with extra bound fields.
   * Later fields override earlier ones of the same name.
   */
  child(context: LogFields): Logger {
    return new Logger({
      level: this.level,
      format: this.format,
      context: { ...this.fields, ...context },
      output: this.sink,
    });
  }

  /**
   * The logger for one request. A fresh id is generated unless the
   * caller passes one through.
   */
  forRequest({ method, path, requestId = randomUUID() }: RequestLogFields): Logger {
    return this.child({ requestId, method, path });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  isLevelEnabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.level];
  }

  private write(level: LogLevel, message: string, context?: LogFields, error?: Error): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      context: { ...this.fields, ...context },
    };
    if (error) {
      entry.error = serializeError(error);
    }

    this.sink(entry);
  }
}

let processLogger: Logger | null = null;

/**
 * The process-wide logger. Until `setLogger()` runs it is built from
 * APP_ENV: info/json in production, debug/pretty otherwise.
 */
export function getLogger(): Logger {
  if (!processLogger) {
    const production = process.env.APP_ENV === 'production';
    processLogger = new Logger({
      level: production ? 'info' : 'debug',
      format: production ? 'json' : 'pretty',
    });
  }
  return processLogger;
}

export function setLogger(logger: Logger): void {
  processLogger = logger;
}
