/**
 * Application Class
 *
 * Ties the router, the middleware pipeline and the HTTP server together.
 * `handle()` is a plain Fetch handler, so tests can drive the whole
 * stack with a Request and no socket.
 */

import { Server, type ListenAddress } from './http/server.ts';
import { AppRequest } from './http/request.ts';
import { Router, type RouteOptions } from './router/router.ts';
import { MiddlewarePipeline } from './middleware/pipeline.ts';
import { Config } from './config/config.ts';
import { getLogger, type Logger } from './telemetry/logger.ts';
import { recordSpanException, setRouteAttribute } from './telemetry/otel.ts';
import {
  MethodNotAllowedError,
  NotFoundError,
  isHttpError,
  toError,
  type HttpError,
} from './api/errors.ts';
import { errorResponse, serverError } from './api/response.ts';
import type { Context, Middleware, RouteHandler } from './http/types.ts';

export interface ApplicationOptions {
  config?: Config;
  logger?: Logger;
}

export interface ListenOptions {
  port?: number;
  hostname?: string;
}

export class Application {
  private server: Server | null = null;
  private router: Router;
  private middleware: MiddlewarePipeline;
  private config: Config;
  private logger: Logger;

  constructor(options: ApplicationOptions = {}) {
    this.config = options.config ?? new Config();
    this.logger = options.logger ?? getLogger();
    this.router = new Router();
    this.middleware = new MiddlewarePipeline();
  }

  /**
   * Add global middleware. Global middleware runs for every request,
   * before routing.
   */
  use(middleware: Middleware): this {
    this.middleware.use(middleware);
    return this;
  }

  get(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.get(path, handler, options);
    return this;
  }

  post(path: string, handler: RouteHandler, options?: RouteOptions): this {
    this.router.post(path, handler, options);
    return this;
  }

  /**
   * Handle a single request
   */
  async handle(request: Request): Promise<Response> {
    const url = new URL(request.url);
    const method = request.method;
    const logger = this.logger.forRequest({
      method,
      path: url.pathname,
      requestId: request.headers.get('X-Request-Id') ?? undefined,
    });

    const ctx: Context = {
      request: new AppRequest(request),
      url,
      params: {},
      query: url.searchParams,
      state: new Map(),
      logger,
      header: (name: string) => request.headers.get(name),
      method,
    };

    try {
      return await this.middleware.execute(ctx, (c) => this.dispatch(c));
    } catch (error) {
      if (isHttpError(error)) {
        this.logHttpError(logger, error);
        return errorResponse(error);
      }

      const err = toError(error);
      logger.error('Request error', err);
      recordSpanException(err);
      return serverError();
    }
  }

  /**
   * Route the request and run the matched route's own middleware
   */
  private async dispatch(ctx: Context): Promise<Response> {
    const path = ctx.url.pathname;
    const match = this.router.match(ctx.method, path);

    if (!match) {
      const allowed = this.router.allowedMethods(path);
      throw allowed.length > 0 ? new MethodNotAllowedError(allowed) : new NotFoundError();
    }

    setRouteAttribute(match.route.path, ctx.method);
    ctx.params = match.params;
    ctx.request.setParams(match.params);

    if (match.route.middleware.length === 0) {
      return await match.route.handler(ctx);
    }
    return await new MiddlewarePipeline(match.route.middleware).execute(ctx, match.route.handler);
  }

  private logHttpError(logger: Logger, error: HttpError): void {
    const context = { status: error.status };
    if (error.status === 404) {
      logger.debug(error.message, context);
    } else {
      logger.warn(error.message, context);
    }
  }

  /**
   * Start the HTTP server
   */
  async listen(options: ListenOptions = {}): Promise<ListenAddress> {
    const port = options.port ?? this.config.get('port');
    const hostname = options.hostname ?? this.config.get('host');

    this.server = new Server({
      port,
      hostname,
      logger: this.logger,
      handler: (request) => this.handle(request),
      onListen: (addr) => {
        this.logger.info(`Server listening on http://${addr.hostname}:${addr.port}`);
      },
    });

    return await this.server.serve();
  }

  /**
   * Stop the HTTP server
   */
  async stop(): Promise<void> {
    if (this.server) {
      await this.server.close();
      this.server = null;
    }
    this.logger.info('Application stopped');
  }
}
