/**
 * Test Helpers
 */

import { AppRequest } from '../framework/http/request.ts';
import { Logger, type LogEntry } from '../framework/telemetry/logger.ts';
import type { Context } from '../framework/http/types.ts';

/**
 * A logger that keeps its entries instead of printing them
 */
export function createTestLogger(level: LogEntry['level'] = 'debug'): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = new Logger({ level, output: (entry) => entries.push(entry) });
  return { logger, entries };
}

export function createTestContext(url = 'http://localhost/test', init: RequestInit = {}): Context {
  const request = new Request(url, init);
  const parsed = new URL(url);
  return {
    request: new AppRequest(request),
    url: parsed,
    params: {},
    query: parsed.searchParams,
    state: new Map(),
    logger: createTestLogger().logger,
    header: (name: string) => request.headers.get(name),
    method: request.method,
  };
}
