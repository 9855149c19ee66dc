/**
 * Negotiation Middleware
 *
 * Gates that reject a request on its media types before any handler
 * runs. Both throw HttpErrors, which the Application renders as JSON.
 */

import type { Middleware } from '../http/types.ts';
import { NotAcceptableError, UnsupportedMediaTypeError } from '../api/errors.ts';

/**
 * Reject requests whose Accept header does not admit `mediaType` (406)
 */
export function requireAccept(
  mediaType: string,
  message = `Request must accept ${mediaType} data`
): Middleware {
  return async function acceptGate(ctx, next) {
    if (!ctx.request.accepts(mediaType)) {
      throw new NotAcceptableError(message);
    }
    return await next();
  };
}

/**
 * Reject requests whose body is not of `mediaType` (415)
 */
export function requireContentType(
  mediaType: string,
  message = `Request must contain ${mediaType} data`
): Middleware {
  return async function contentTypeGate(ctx, next) {
    if (ctx.request.contentType !== mediaType) {
      throw new UnsupportedMediaTypeError(message);
    }
    return await next();
  };
}
