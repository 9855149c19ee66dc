/**
 * URL Router
 *
 * Route matching on URLPattern. Path parameters may carry a regular
 * expression, e.g. `/posts/:id(\\d+)`.
 */

import { URLPattern } from 'urlpattern-polyfill';
import type { HttpMethod, Middleware, RouteHandler } from '../http/types.ts';

export interface RouteDefinition {
  method: HttpMethod;
  path: string;
  pattern: URLPattern;
  handler: RouteHandler;
  middleware: Middleware[];
}

export interface RouteMatch {
  route: RouteDefinition;
  params: Record<string, string>;
}

export interface RouteOptions {
  middleware?: Middleware[];
}

export class Router {
  private routes: RouteDefinition[] = [];
  private prefix: string;

  constructor(prefix: string = '') {
    this.prefix = prefix;
  }

  get(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('GET', path, handler, options);
  }

  post(path: string, handler: RouteHandler, options?: RouteOptions): this {
    return this.addRoute('POST', path, handler, options);
  }

  addRoute(
    method: HttpMethod,
    path: string,
    handler: RouteHandler,
    options: RouteOptions = {}
  ): this {
    const fullPath = this.prefix + path;
    const route: RouteDefinition = {
      method,
      path: fullPath,
      pattern: new URLPattern({ pathname: fullPath }),
      handler,
      middleware: options.middleware ?? [],
    };

    this.routes.push(route);

    return this;
  }

  /**
   * Match a request method and path to a route
   */
  match(method: string, path: string): RouteMatch | null {
    for (const route of this.routes) {
      if (route.method !== method) continue;

      const result = route.pattern.exec({ pathname: path });
      if (result) {
        return { route, params: definedGroups(result.pathname.groups) };
      }
    }

    return null;
  }

  /**
   * Methods registered for a path, whatever the request method was
   */
  allowedMethods(path: string): HttpMethod[] {
    const methods = new Set<HttpMethod>();
    for (const route of this.routes) {
      if (route.pattern.test({ pathname: path })) {
        methods.add(route.method);
      }
    }
    return [...methods];
  }

  getRoutes(): RouteDefinition[] {
    return [...this.routes];
  }
}

function definedGroups(groups: Record<string, string | undefined>): Record<string, string> {
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(groups)) {
    if (value !== undefined) {
      params[key] = value;
    }
  }
  return params;
}
