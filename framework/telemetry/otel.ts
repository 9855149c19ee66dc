/**
 * OpenTelemetry Integration
 *
 * Span helpers over @opentelemetry/api. Without a registered SDK the
 * API hands out no-op spans, so these helpers are safe to call anywhere.
 *
 * @module
 */

import {
  trace,
  context,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';
import { toError } from '../api/errors.ts';

const TRACER_NAME = 'posts-api';
const TRACER_VERSION = '0.1.0';

/**
 * Check if tracing is switched on via OTEL_ENABLED
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

export function getActiveSpan(): Span | undefined {
  if (!isOTELEnabled()) return undefined;
  return trace.getActiveSpan();
}

/**
 * Annotate the active server span with the matched route pattern
 */
export function setRouteAttribute(routePattern: string, method: string): void {
  const span = getActiveSpan();
  if (span) {
    span.setAttribute('http.route', routePattern);
    span.updateName(`${method} ${routePattern}`);
  }
}

/**
 * Record an exception on the active span and set error status
 */
export function recordSpanException(error: Error): void {
  const span = getActiveSpan();
  if (span) {
    span.recordException(error);
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
  }
}

let _tracer: Tracer | undefined;

export function getOTELTracer(): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);
  }
  return _tracer;
}

export interface CreateSpanOptions {
  kind?: SpanKind;
  attributes?: Attributes;
}

/**
 * Run a function inside a new active span. The span is ended when the
 * function settles and marked as errored if it throws.
 */
export async function withSpan<T>(
  name: string,
  fn: (span: Span | undefined) => Promise<T>,
  options: CreateSpanOptions = {},
): Promise<T> {
  if (!isOTELEnabled()) {
    return await fn(undefined);
  }

  return getOTELTracer().startActiveSpan(
    name,
    { kind: options.kind ?? SpanKind.INTERNAL, attributes: options.attributes },
    context.active(),
    async (span) => {
      try {
        const result = await fn(span);
        span.setStatus({ code: SpanStatusCode.OK });
        return result;
      } catch (error) {
        const err = toError(error);
        span.recordException(err);
        span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
        throw error;
      } finally {
        span.end();
      }
    },
  );
}

/**
 * Create a database operation span
 *
 * @param operation - Database operation name (e.g. 'select', 'insert')
 * @param table - Table being accessed
 */
export async function withDbSpan<T>(
  operation: string,
  table: string,
  fn: (span: Span | undefined) => Promise<T>,
): Promise<T> {
  return withSpan(`db.${operation}`, fn, {
    kind: SpanKind.CLIENT,
    attributes: {
      'db.system': 'sqlite',
      'db.operation': operation,
      'db.sql.table': table,
    },
  });
}
