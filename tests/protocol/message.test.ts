import { describe, it, expect } from 'vitest';
import { clampPercent, createMessage, encodeMessage, isLogLevel } from '../../src/index.js';

describe('createMessage', () => {
  it('omits identifiers that are not set', () => {
    const message = createMessage('billing', 'heartbeat', {}, { traceId: null, spanId: null }, 1000);

    expect(message).toEqual({ v: 1, src: 'billing', ts: 1000, type: 'heartbeat', data: {} });
  });

  it('attaches trace, span and parent ids', () => {
    const message = createMessage(
      'billing',
      'event',
      { level: 'info', msg: 'started', ctx: {} },
      { traceId: 't1', spanId: 's2', parentSpanId: 's1' },
      1000,
    );

    expect(encodeMessage(message)).toBe(
      '{"v":1,"src":"billing","ts":1000,"type":"event","tid":"t1","sid":"s2","pid":"s1",' +
        '"data":{"level":"info","msg":"started","ctx":{}}}\n',
    );
  });
});

describe('encodeMessage', () => {
  it('produces exactly one line', () => {
    const line = encodeMessage(
      createMessage('billing', 'event', { level: 'warn', msg: 'a\nb', ctx: {} }, undefined, 1),
    );

    expect(line.endsWith('\n')).toBe(true);
    expect(line.indexOf('\n')).toBe(line.length - 1);
  });
});

describe('clampPercent', () => {
  it.each([
    [42.9, 42],
    [-5, 0],
    [150, 100],
    [100, 100],
    [Number.NaN, 0],
  ])('clamps %s to %s', (input, expected) => {
    expect(clampPercent(input)).toBe(expected);
  });
});

describe('isLogLevel', () => {
  it('recognizes known levels only', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
