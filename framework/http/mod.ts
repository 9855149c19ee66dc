/**
 * HTTP layer
 *
 * Node server bridge, request wrapper, response builder and
 * content negotiation.
 */

export { Server, toFetchRequest, writeFetchResponse, type ServerOptions, type ListenAddress, type FetchHandler } from './server.ts';
export { AppRequest, type RequestContext } from './request.ts';
export { AppResponse, JSON_MEDIA_TYPE, type ResponseOptions } from './response.ts';
export { acceptsMediaType, parseAccept, type MediaRange } from './negotiation.ts';
export type { Context, Middleware, Next, RouteHandler, HttpMethod } from './types.ts';
