/**
 * Validator Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { isRecord, validate, validators } from '../../framework/validation/validators.ts';

const schema = {
  title: [validators.required(), validators.string()],
  body: [validators.required(), validators.string()],
};

test('validate - passing data has no errors', () => {
  assert.deepEqual(validate({ title: 'a', body: '' }, schema), []);
});

test('validate - first failure per field, in schema order', () => {
  assert.deepEqual(validate({ body: 3 }, schema), ['title is required', 'body must be a string']);
});

test('validate - null counts as missing', () => {
  assert.deepEqual(validate({ title: null, body: 'b' }, schema), ['title is required']);
});

test('isRecord - plain objects only', () => {
  assert.equal(isRecord({}), true);
  assert.equal(isRecord([]), false);
  assert.equal(isRecord(null), false);
  assert.equal(isRecord('x'), false);
});
