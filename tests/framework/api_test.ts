/**
 * API Response and Error Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  BadRequestError,
  HttpError,
  MethodNotAllowedError,
  NotFoundError,
  UnprocessableEntityError,
  isHttpError,
  toError,
  created,
  errorResponse,
  ok,
  serverError,
} from '../../framework/mod.ts';

test('ok - 200 JSON', async () => {
  const response = ok({ a: 1 });

  assert.equal(response.status, 200);
  assert.equal(response.headers.get('Content-Type'), 'application/json');
  assert.equal(await response.text(), '{"a":1}');
});

test('created - 201 with Location', async () => {
  const response = created({ id: 3 }, '/api/posts/3');

  assert.equal(response.status, 201);
  assert.equal(response.headers.get('Location'), '/api/posts/3');
  assert.deepEqual(await response.json(), { id: 3 });
});

test('errorResponse - message body and error headers', async () => {
  const response = errorResponse(new MethodNotAllowedError(['GET', 'POST']));

  assert.equal(response.status, 405);
  assert.equal(response.headers.get('Allow'), 'GET, POST');
  assert.equal(response.headers.get('Content-Type'), 'application/json');
  assert.deepEqual(await response.json(), { message: 'Method Not Allowed' });
});

test('serverError - generic 500', async () => {
  const response = serverError();

  assert.equal(response.status, 500);
  assert.deepEqual(await response.json(), { message: 'Internal Server Error' });
});

test('HttpError - subclasses carry status and message', () => {
  assert.equal(new BadRequestError().status, 400);
  assert.equal(new NotFoundError().message, 'Not Found');
  assert.deepEqual(new NotFoundError('gone').toJSON(), { message: 'gone' });
});

test('UnprocessableEntityError - first error is the message', () => {
  const error = new UnprocessableEntityError(['title is required', 'body is required']);

  assert.equal(error.status, 422);
  assert.equal(error.message, 'title is required');
  assert.deepEqual(error.errors, ['title is required', 'body is required']);
});

test('isHttpError and toError', () => {
  assert.equal(isHttpError(new HttpError(418, 'teapot')), true);
  assert.equal(isHttpError(new Error('plain')), false);
  assert.equal(toError('boom').message, 'boom');

  const original = new TypeError('kept');
  assert.equal(toError(original), original);
});
