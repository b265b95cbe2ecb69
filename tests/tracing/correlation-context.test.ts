import { describe, it, expect } from 'vitest';
import {
  CorrelationContext,
  generateId,
  InvalidPayloadError,
  MAX_ID_LENGTH,
} from '../../src/index.js';

describe('generateId', () => {
  it('produces 16 alphanumeric characters by default', () => {
    expect(generateId()).toMatch(/^[A-Za-z0-9]{16}$/);
  });

  it('honours a custom length', () => {
    expect(generateId(8)).toHaveLength(8);
  });

  it('does not repeat', () => {
    const ids = new Set(Array.from({ length: 100 }, () => generateId()));
    expect(ids.size).toBe(100);
  });
});

describe('CorrelationContext', () => {
  it('starts with no identifiers', () => {
    expect(new CorrelationContext().current()).toEqual({ traceId: null, spanId: null });
  });

  describe('setTraceId', () => {
    it('replaces the active trace', () => {
      const context = new CorrelationContext();
      context.setTraceId('trace-1');
      context.setTraceId('trace-2');

      expect(context.current()).toEqual({ traceId: 'trace-2', spanId: null });
    });

    it('rejects an empty id', () => {
      expect(() => new CorrelationContext().setTraceId('')).toThrow(InvalidPayloadError);
    });

    it('rejects an id over the length limit', () => {
      expect(() => new CorrelationContext().setTraceId('x'.repeat(MAX_ID_LENGTH + 1))).toThrow(
        'Invalid argument: trace id exceeds maximum length of 64 characters',
      );
    });
  });

  describe('startSpan', () => {
    it('generates a trace when none is active', () => {
      const context = new CorrelationContext();
      const span = context.startSpan();

      expect(span.traceId).toMatch(/^[A-Za-z0-9]{16}$/);
      expect(span.spanId).toMatch(/^[A-Za-z0-9]{16}$/);
      expect(span.parentSpanId).toBeNull();
      expect(context.current()).toEqual({ traceId: span.traceId, spanId: span.spanId });
    });

    it('keeps the active trace and links the parent span', () => {
      const context = new CorrelationContext();
      context.setTraceId('trace-1');
      const outer = context.startSpan();
      const inner = context.startSpan();

      expect(outer.traceId).toBe('trace-1');
      expect(inner.traceId).toBe('trace-1');
      expect(inner.parentSpanId).toBe(outer.spanId);
    });

    it('switches to an explicit trace', () => {
      const context = new CorrelationContext();
      context.setTraceId('trace-1');
      const span = context.startSpan('trace-2');

      expect(span.traceId).toBe('trace-2');
      expect(context.current().traceId).toBe('trace-2');
    });
  });

  describe('planSpan', () => {
    it('computes ids without changing the active ones', () => {
      const context = new CorrelationContext();
      context.setTraceId('trace-1');

      const planned = context.planSpan();

      expect(planned.traceId).toBe('trace-1');
      expect(planned.parentSpanId).toBeNull();
      expect(context.current()).toEqual({ traceId: 'trace-1', spanId: null });

      context.enterSpan(planned);
      expect(context.current()).toEqual({ traceId: 'trace-1', spanId: planned.spanId });
    });
  });

  describe('endSpan', () => {
    it('clears the active span when it ends', () => {
      const context = new CorrelationContext();
      const span = context.startSpan('trace-1');

      expect(context.endSpan(span.spanId)).toBe(true);
      expect(context.current()).toEqual({ traceId: 'trace-1', spanId: null });
    });

    it('leaves the active span when another one ends', () => {
      const context = new CorrelationContext();
      const outer = context.startSpan('trace-1');
      const inner = context.startSpan();

      expect(context.endSpan(outer.spanId)).toBe(false);
      expect(context.current().spanId).toBe(inner.spanId);
    });
  });

  it('clear forgets both identifiers', () => {
    const context = new CorrelationContext();
    context.startSpan('trace-1');
    context.clear();

    expect(context.current()).toEqual({ traceId: null, spanId: null });
  });
});
