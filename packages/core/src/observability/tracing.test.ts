import { describe, it, expect } from 'vitest';
import { startSpan, traced } from './tracing.js';

describe('tracing', () => {
  it('should return the result of the traced computation', () => {
    expect(traced('test.compute', { 'test.attr': 1 }, () => 42)).toBe(42);
  });

  it('should rethrow errors raised inside the span', () => {
    expect(() =>
      traced('test.fail', {}, () => {
        throw new Error('boom');
      }),
    ).toThrow('boom');
  });

  it('should hand out a non-recording span without a registered SDK', () => {
    const span = startSpan('test.noop', { 'test.attr': 'x' });
    expect(span.isRecording()).toBe(false);
    span.end();
  });
});
