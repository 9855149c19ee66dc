/**
 * Content Negotiation Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import { acceptsMediaType, parseAccept } from '../../framework/http/negotiation.ts';

test('parseAccept - ranges with quality', () => {
  assert.deepEqual(parseAccept('text/html, application/json;q=0.5, */*;q=0.1'), [
    { type: 'text', subtype: 'html', quality: 1 },
    { type: 'application', subtype: 'json', quality: 0.5 },
    { type: '*', subtype: '*', quality: 0.1 },
  ]);
});

test('parseAccept - lowercases and drops malformed entries', () => {
  assert.deepEqual(parseAccept('Application/JSON, garbage, ;q=1'), [
    { type: 'application', subtype: 'json', quality: 1 },
  ]);
});

test('parseAccept - clamps quality into [0, 1]', () => {
  assert.deepEqual(parseAccept('a/b;q=7, c/d;q=-1, e/f;q=x'), [
    { type: 'a', subtype: 'b', quality: 1 },
    { type: 'c', subtype: 'd', quality: 0 },
    { type: 'e', subtype: 'f', quality: 1 },
  ]);
});

test('acceptsMediaType - missing or blank header accepts', () => {
  assert.equal(acceptsMediaType(null, 'application/json'), true);
  assert.equal(acceptsMediaType('   ', 'application/json'), true);
});

test('acceptsMediaType - exact and wildcard ranges', () => {
  assert.equal(acceptsMediaType('application/json', 'application/json'), true);
  assert.equal(acceptsMediaType('application/*', 'application/json'), true);
  assert.equal(acceptsMediaType('*/*', 'application/json'), true);
  assert.equal(acceptsMediaType('text/html, application/json', 'application/json'), true);
});

test('acceptsMediaType - other types are refused', () => {
  assert.equal(acceptsMediaType('application/xml', 'application/json'), false);
  assert.equal(acceptsMediaType('text/*', 'application/json'), false);
  assert.equal(acceptsMediaType('garbage', 'application/json'), false);
});

test('acceptsMediaType - q=0 refuses even under a wildcard', () => {
  assert.equal(acceptsMediaType('application/json;q=0', 'application/json'), false);
  assert.equal(acceptsMediaType('*/*, application/json;q=0', 'application/json'), false);
  assert.equal(acceptsMediaType('application/json;q=0.2, */*;q=0', 'application/json'), true);
});
