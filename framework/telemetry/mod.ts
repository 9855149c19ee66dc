/**
 * Telemetry
 *
 * Structured logging and OpenTelemetry span helpers.
 */

export {
  Logger,
  getLogger,
  setLogger,
  isLogLevel,
  isLogFormat,
  formatPretty,
  serializeError,
  type LogLevel,
  type LogFields,
  type LogSink,
  type RequestLogFields,
  type LogFormat,
  type LogEntry,
  type LoggerOptions,
} from './logger.ts';

export {
  isOTELEnabled,
  getActiveSpan,
  setRouteAttribute,
  recordSpanException,
  getOTELTracer,
  withSpan,
  withDbSpan,
  type CreateSpanOptions,
} from './otel.ts';
