/**
 * HTTP Type Definitions
 */

import type { AppRequest } from './request.ts';
import type { Logger } from '../telemetry/logger.ts';

/**
 * Request context for middleware and handlers
 */
export interface Context {
  request: AppRequest;
  url: URL;
  params: Record<string, string>;
  query: URLSearchParams;
  state: Map<string, unknown>;
  logger: Logger;
  header(name: string): string | null;
  method: string;
}

/**
 * Middleware next function
 */
export type Next = () => Promise<Response>;

/**
 * Route handler using context
 */
export type RouteHandler = (ctx: Context) => Promise<Response> | Response;

/**
 * Middleware function signature
 */
export type Middleware = (
  ctx: Context,
  next: Next
) => Promise<Response> | Response;

/**
 * HTTP methods supported by the router
 */
export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'OPTIONS' | 'HEAD';
