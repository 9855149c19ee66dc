/**
 * HTTP Framework
 *
 * Router, middleware pipeline, request/response helpers, configuration
 * and telemetry used by the posts API.
 *
 * @module
 */

// Application
export { Application, type ApplicationOptions, type ListenOptions } from './app.ts';

// HTTP/Server
export {
  Server,
  AppRequest,
  AppResponse,
  JSON_MEDIA_TYPE,
  acceptsMediaType,
  parseAccept,
  type Context,
  type Middleware,
  type Next,
  type RouteHandler,
  type HttpMethod,
  type ServerOptions,
  type ListenAddress,
} from './http/mod.ts';

// Middleware
export {
  MiddlewarePipeline,
  loggingMiddleware,
  requireAccept,
  requireContentType,
  type LoggingOptions,
} from './middleware/mod.ts';

// Router
export { Router, type RouteDefinition, type RouteMatch, type RouteOptions } from './router/mod.ts';

// API
export {
  HttpStatus,
  HttpError,
  BadRequestError,
  NotFoundError,
  MethodNotAllowedError,
  NotAcceptableError,
  UnsupportedMediaTypeError,
  UnprocessableEntityError,
  isHttpError,
  toError,
  ok,
  created,
  errorResponse,
  serverError,
} from './api/mod.ts';

// Validation
export { validators, validate, isRecord, type Validator, type ValidationSchema } from './validation/validators.ts';

// Config
export { Config, ConfigError, loadConfig, type ConfigOptions, type DatabaseOptions } from './config/mod.ts';

// Telemetry
export { Logger, getLogger, setLogger, withSpan, withDbSpan, type LogLevel, type LogEntry } from './telemetry/mod.ts';
