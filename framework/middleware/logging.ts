/**
 * Logging Middleware
 *
 * Request/response logging through the context logger.
 */

import type { Middleware } from '../http/types.ts';
import { isHttpError } from '../api/errors.ts';

export interface LoggingOptions {
  logRequest?: boolean;
  logResponse?: boolean;
  logHeaders?: boolean;
  excludePaths?: string[];
}

const DEFAULT_OPTIONS: Required<LoggingOptions> = {
  logRequest: true,
  logResponse: true,
  logHeaders: false,
  excludePaths: [],
};

export function loggingMiddleware(options: LoggingOptions = {}): Middleware {
  const opts: Required<LoggingOptions> = { ...DEFAULT_OPTIONS, ...options };

  return async function requestLogger(ctx, next) {
    const path = ctx.url.pathname;
    if (opts.excludePaths.some((prefix) => path.startsWith(prefix))) {
      return await next();
    }

    const startTime = performance.now();
    const elapsed = () => Math.round((performance.now() - startTime) * 100) / 100;

    if (opts.logRequest) {
      const entry: Record<string, unknown> = { ip: ctx.request.ip };
      if (opts.logHeaders) {
        entry.headers = Object.fromEntries(ctx.request.headers.entries());
      }
      ctx.logger.debug(`→ ${ctx.method} ${path}`, entry);
    }

    let response: Response;
    try {
      response = await next();
    } catch (error) {
      // Rendered further out; log the status it will be rendered with.
      if (opts.logResponse) {
        const status = isHttpError(error) ? error.status : 500;
        ctx.logger.info(`← ${ctx.method} ${path} ${status}`, { status, duration: elapsed() });
      }
      throw error;
    }

    if (opts.logResponse) {
      ctx.logger.info(`← ${ctx.method} ${path} ${response.status}`, {
        status: response.status,
        duration: elapsed(),
      });
    }

    return response;
  };
}
