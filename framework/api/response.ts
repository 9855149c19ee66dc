/**
 * API Response Utilities
 *
 * Standard JSON response shapes for the REST API.
 */

import { AppResponse } from '../http/response.ts';
import type { HttpError } from './errors.ts';

/**
 * HTTP status codes for common scenarios
 */
export const HttpStatus = {
  OK: 200,
  CREATED: 201,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  METHOD_NOT_ALLOWED: 405,
  NOT_ACCEPTABLE: 406,
  UNSUPPORTED_MEDIA_TYPE: 415,
  UNPROCESSABLE_ENTITY: 422,
  INTERNAL_SERVER_ERROR: 500,
} as const;

/**
 * 200 with a JSON body
 */
export function ok(data: unknown): Response {
  return new AppResponse().status(HttpStatus.OK).json(data);
}

/**
 * 201 with a JSON body and a Location header
 */
export function created(data: unknown, location: string): Response {
  return new AppResponse().status(HttpStatus.CREATED).location(location).json(data);
}

/**
 * Render an HttpError as `{ "message": ... }`
 */
export function errorResponse(error: HttpError): Response {
  return new AppResponse({ headers: error.headers }).message(error.status, error.message);
}

/**
 * 500 with a generic message. Internal details never reach the client.
 */
export function serverError(): Response {
  return new AppResponse().message(HttpStatus.INTERNAL_SERVER_ERROR, 'Internal Server Error');
}
