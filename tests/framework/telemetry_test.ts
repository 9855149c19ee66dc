/**
 * Telemetry Tests
 */

import { test } from 'node:test';
import assert from 'node:assert/strict';
import {
  Logger,
  formatPretty,
  isLogFormat,
  isLogLevel,
  withDbSpan,
  withSpan,
  type LogEntry,
} from '../../framework/telemetry/mod.ts';

test('Logger - filters below its level', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level: 'warn', output: (entry) => entries.push(entry) });

  logger.debug('hidden');
  logger.info('hidden');
  logger.warn('shown');
  logger.error('also shown');

  assert.deepEqual(
    entries.map((entry) => entry.message),
    ['shown', 'also shown']
  );
});

test('Logger - child merges context', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ context: { service: 'posts' }, output: (entry) => entries.push(entry) });

  logger.child({ requestId: 'r-1' }).info('hello', { postId: 4 });

  assert.deepEqual(entries[0].context, { service: 'posts', requestId: 'r-1', postId: 4 });
});

test('Logger - forRequest binds request fields', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ context: { service: 'posts' }, output: (entry) => entries.push(entry) });

  logger.forRequest({ method: 'GET', path: '/api/posts', requestId: 'req-7' }).warn('slow');

  assert.deepEqual(entries[0].context, {
    service: 'posts',
    requestId: 'req-7',
    method: 'GET',
    path: '/api/posts',
  });
});

test('Logger - forRequest generates an id when none is given', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ output: (entry) => entries.push(entry) });

  logger.forRequest({ method: 'POST', path: '/api/posts' }).info('created');

  const requestId = entries[0].context?.requestId;
  assert.equal(typeof requestId === 'string' ? requestId.length : 0, 36);
});

test('formatPretty - level, message and fields', () => {
  const line = formatPretty({
    level: 'warn',
    message: 'slow',
    timestamp: '2024-01-01T00:00:00.000Z',
    context: { ms: 5 },
  });

  assert.equal(
    line,
    '\x1b[2m2024-01-01T00:00:00.000Z\x1b[0m \x1b[33mWARN \x1b[0m slow \x1b[2m{"ms":5}\x1b[0m'
  );
});

test('Logger - error details', () => {
  const entries: LogEntry[] = [];
  const logger = new Logger({ output: (entry) => entries.push(entry) });

  logger.error('failed', new TypeError('bad input'));

  assert.equal(entries[0].level, 'error');
  assert.equal(entries[0].error?.name, 'TypeError');
  assert.equal(entries[0].error?.message, 'bad input');
});

test('Logger - setLevel and isLevelEnabled', () => {
  const logger = new Logger({ output: () => {} });

  assert.equal(logger.isLevelEnabled('debug'), false);
  logger.setLevel('debug');
  assert.equal(logger.isLevelEnabled('debug'), true);
});

test('isLogLevel and isLogFormat', () => {
  assert.equal(isLogLevel('warn'), true);
  assert.equal(isLogLevel('verbose'), false);
  assert.equal(isLogFormat('pretty'), true);
  assert.equal(isLogFormat('xml'), false);
});

test('withSpan - passes the result through', async () => {
  const result = await withSpan('test.op', async () => 42);

  assert.equal(result, 42);
});

test('withDbSpan - rethrows', async () => {
  await assert.rejects(
    withDbSpan('select', 'posts', async () => {
      throw new Error('db down');
    }),
    { message: 'db down' }
  );
});
