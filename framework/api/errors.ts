/**
 * HTTP Errors
 *
 * Errors that carry the status and message of the response they
 * should produce. The Application renders any HttpError as a JSON
 * `{ "message": ... }` body.
 */

import { HttpStatus } from './response.ts';

export class HttpError extends Error {
  readonly status: number;
  readonly headers: Record<string, string>;

  constructor(status: number, message: string, headers: Record<string, string> = {}) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.headers = headers;
  }

  /**
   * The JSON body this error is rendered as
   */
  toJSON(): { message: string } {
    return { message: this.message };
  }
}

export class BadRequestError extends HttpError {
  constructor(message = 'Bad Request') {
    super(HttpStatus.BAD_REQUEST, message);
    this.name = 'BadRequestError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not Found') {
    super(HttpStatus.NOT_FOUND, message);
    this.name = 'NotFoundError';
  }
}

export class MethodNotAllowedError extends HttpError {
  constructor(allowed: string[]) {
    super(HttpStatus.METHOD_NOT_ALLOWED, 'Method Not Allowed', { Allow: allowed.join(', ') });
    this.name = 'MethodNotAllowedError';
  }
}

export class NotAcceptableError extends HttpError {
  constructor(message = 'Not Acceptable') {
    super(HttpStatus.NOT_ACCEPTABLE, message);
    this.name = 'NotAcceptableError';
  }
}

export class UnsupportedMediaTypeError extends HttpError {
  constructor(message = 'Unsupported Media Type') {
    super(HttpStatus.UNSUPPORTED_MEDIA_TYPE, message);
    this.name = 'UnsupportedMediaTypeError';
  }
}

export class UnprocessableEntityError extends HttpError {
  readonly errors: string[];

  constructor(errors: string[]) {
    super(HttpStatus.UNPROCESSABLE_ENTITY, errors[0] ?? 'Unprocessable Entity');
    this.name = 'UnprocessableEntityError';
    this.errors = errors;
  }
}

export function isHttpError(error: unknown): error is HttpError {
  return error instanceof HttpError;
}

/**
 * Normalise a thrown value into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
