/**
 * Middleware
 */

export { MiddlewarePipeline } from './pipeline.ts';
export { loggingMiddleware, type LoggingOptions } from './logging.ts';
export { requireAccept, requireContentType } from './negotiation.ts';
