import { trace, type Span, SpanStatusCode } from '@opentelemetry/api';

const TRACER_NAME = 'semdiff';

export function getTracer() {
  return trace.getTracer(TRACER_NAME);
}

export function startSpan(
  name: string,
  attributes?: Record<string, string | number | boolean>,
): Span {
  const tracer = getTracer();
  const span = tracer.startSpan(name);
  if (attributes) {
    for (const [key, value] of Object.entries(attributes)) {
      span.setAttribute(key, value);
    }
  }
  return span;
}

export function endSpan(span: Span, error?: Error): void {
  if (error) {
    span.setStatus({ code: SpanStatusCode.ERROR, message: error.message });
    span.recordException(error);
  } else {
    span.setStatus({ code: SpanStatusCode.OK });
  }
  span.end();
}

/**
 * Run a synchronous computation inside a span, recording any thrown error.
 */
export function traced<T>(
  name: string,
  attributes: Record<string, string | number | boolean>,
  fn: (span: Span) => T,
): T {
  const span = startSpan(name, attributes);
  try {
    const result = fn(span);
    endSpan(span);
    return result;
  } catch (error) {
    endSpan(span, error instanceof Error ? error : new Error(String(error)));
    throw error;
  }
}

export { SpanStatusCode } from '@opentelemetry/api';
