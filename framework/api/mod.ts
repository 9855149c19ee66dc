/**
 * API responses and errors
 */

export { HttpStatus, ok, created, errorResponse, serverError } from './response.ts';
export {
  HttpError,
  BadRequestError,
  NotFoundError,
  MethodNotAllowedError,
  NotAcceptableError,
  UnsupportedMediaTypeError,
  UnprocessableEntityError,
  isHttpError,
  toError,
} from './errors.ts';
