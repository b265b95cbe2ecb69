import { describe, it, expect, vi } from 'vitest';
import {
  MessageBuffer,
  InvalidTransportConfigError,
  type BufferedMessage,
} from '../../src/index.js';

function msg(text: string): BufferedMessage {
  const payload = Buffer.from(text, 'utf8');
  return { payload, byteLength: payload.length };
}

function texts(messages: readonly BufferedMessage[]): string[] {
  return messages.map((message) => message.payload.toString('utf8'));
}

describe('MessageBuffer', () => {
  describe('constructor', () => {
    it.each([0, -1, 1.5, Number.NaN])('rejects capacity %s', (capacity) => {
      expect(() => new MessageBuffer(capacity)).toThrow(InvalidTransportConfigError);
    });

    it('starts empty', () => {
      const buffer = new MessageBuffer(3);
      expect(buffer.size).toBe(0);
      expect(buffer.isEmpty()).toBe(true);
      expect(buffer.isFull()).toBe(false);
      expect(buffer.peek()).toBeUndefined();
      expect(buffer.shift()).toBeUndefined();
    });
  });

  describe('push', () => {
    it('accepts up to capacity and drops the next one', () => {
      const buffer = new MessageBuffer(3);

      expect(buffer.push(msg('a'))).toBe('enqueued');
      expect(buffer.push(msg('b'))).toBe('enqueued');
      expect(buffer.push(msg('c'))).toBe('enqueued');
      expect(buffer.isFull()).toBe(true);
      expect(buffer.push(msg('d'))).toBe('dropped');

      expect(buffer.size).toBe(3);
      expect(texts(buffer.toArray())).toEqual(['a', 'b', 'c']);
    });

    it('keeps order across the end of the ring', () => {
      const buffer = new MessageBuffer(3);
      buffer.push(msg('a'));
      buffer.push(msg('b'));
      buffer.shift();
      buffer.push(msg('c'));
      buffer.push(msg('d'));

      expect(texts(buffer.toArray())).toEqual(['b', 'c', 'd']);
      expect(buffer.shift()?.payload.toString()).toBe('b');
      expect(buffer.shift()?.payload.toString()).toBe('c');
      expect(buffer.shift()?.payload.toString()).toBe('d');
      expect(buffer.isEmpty()).toBe(true);
    });
  });

  describe('peek', () => {
    it('returns the oldest payload without removing it', () => {
      const buffer = new MessageBuffer(2);
      buffer.push(msg('a'));
      buffer.push(msg('b'));

      expect(buffer.peek()?.payload.toString()).toBe('a');
      expect(buffer.size).toBe(2);
    });
  });

  describe('drain', () => {
    it('sends every payload oldest first', async () => {
      const buffer = new MessageBuffer(4);
      ['a', 'b', 'c'].forEach((text) => buffer.push(msg(text)));
      const sent: string[] = [];

      const delivered = await buffer.drain(async (message) => {
        sent.push(message.payload.toString());
        return true;
      });

      expect(delivered).toBe(3);
      expect(sent).toEqual(['a', 'b', 'c']);
      expect(buffer.isEmpty()).toBe(true);
    });

    it('stops at the first failure and keeps the failed payload at the head', async () => {
      const buffer = new MessageBuffer(4);
      ['a', 'b', 'c'].forEach((text) => buffer.push(msg(text)));
      const send = vi
        .fn(async (_message: BufferedMessage) => true)
        .mockResolvedValueOnce(true)
        .mockResolvedValueOnce(false);

      const delivered = await buffer.drain(send);

      expect(delivered).toBe(1);
      expect(send).toHaveBeenCalledTimes(2);
      expect(texts(buffer.toArray())).toEqual(['b', 'c']);
    });

    it('resumes in order after a failed drain', async () => {
      const buffer = new MessageBuffer(4);
      ['a', 'b', 'c'].forEach((text) => buffer.push(msg(text)));
      const sent: string[] = [];
      let failNext = false;

      await buffer.drain(async (message) => {
        if (failNext) {
          return false;
        }
        sent.push(message.payload.toString());
        failNext = true;
        return true;
      });
      buffer.push(msg('d'));
      await buffer.drain(async (message) => {
        sent.push(message.payload.toString());
        return true;
      });

      expect(sent).toEqual(['a', 'b', 'c', 'd']);
    });

    it('stops once canContinue returns false', async () => {
      const buffer = new MessageBuffer(4);
      ['a', 'b', 'c'].forEach((text) => buffer.push(msg(text)));
      let budget = 2;

      const delivered = await buffer.drain(
        async () => {
          budget--;
          return true;
        },
        () => budget > 0,
      );

      expect(delivered).toBe(2);
      expect(texts(buffer.toArray())).toEqual(['c']);
    });
  });

  describe('clear', () => {
    it('discards everything and reports the count', () => {
      const buffer = new MessageBuffer(3);
      buffer.push(msg('a'));
      buffer.push(msg('b'));

      expect(buffer.clear()).toBe(2);
      expect(buffer.isEmpty()).toBe(true);
      expect(buffer.push(msg('c'))).toBe('enqueued');
      expect(texts(buffer.toArray())).toEqual(['c']);
    });
  });
});
