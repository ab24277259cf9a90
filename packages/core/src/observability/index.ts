export { getTracer, startSpan, endSpan, traced, SpanStatusCode } from './tracing.js';
