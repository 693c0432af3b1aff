/**
 * OpenTelemetry Integration
 *
 * Spans around response rendering. Tracing is opt-in through
 * OTEL_ENABLED=true; without it spans are no-ops and no tracer
 * provider needs to be registered.
 *
 * @module
 */

import {
  trace,
  SpanKind,
  SpanStatusCode,
  type Tracer,
  type Span,
  type Attributes,
} from '@opentelemetry/api';

const TRACER_NAME = 'turbo-response';
const TRACER_VERSION = '0.1.0';

/**
 * Check if tracing is enabled via the OTEL_ENABLED environment variable
 */
export function isOTELEnabled(): boolean {
  return process.env.OTEL_ENABLED === 'true';
}

let _tracer: Tracer | undefined;

export function getOTELTracer(): Tracer {
  if (!_tracer) {
    _tracer = trace.getTracer(TRACER_NAME, TRACER_VERSION);
  }
  return _tracer;
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run a synchronous function inside a span.
 * The span is ended when the function returns or throws.
 */
export function withSpanSync<T>(
  name: string,
  fn: (span: Span) => T,
  attributes?: Attributes,
): T {
  if (!isOTELEnabled()) {
    const noopSpan = trace.getTracer('noop').startSpan('noop');
    try {
      return fn(noopSpan);
    } finally {
      noopSpan.end();
    }
  }

  const span = getOTELTracer().startSpan(name, {
    kind: SpanKind.INTERNAL,
    attributes,
  });

  try {
    const result = fn(span);
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
}
