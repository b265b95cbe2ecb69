/**
 * Fixed-capacity FIFO of serialized payloads.
 *
 * Backed by a ring of preallocated slots. A push into a full buffer is
 * rejected rather than evicting an older entry, so the caller can count the
 * loss and signal overflow.
 *
 * @module transport/message-buffer
 */

import type { BufferedMessage, PushResult } from './types.js';
import { InvalidTransportConfigError } from './types.js';

/**
 * Sends one buffered payload. Resolves to false when the payload could not
 * be delivered.
 */
export type DrainSendFn = (message: BufferedMessage) => Promise<boolean>;

export class MessageBuffer {
  private readonly slots: (BufferedMessage | undefined)[];
  private head = 0;
  private tail = 0;
  private count = 0;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new InvalidTransportConfigError('buffer capacity must be a positive integer');
    }
    this.slots = new Array<BufferedMessage | undefined>(capacity).fill(undefined);
  }

  /**
   * Number of payloads currently held.
   */
  get size(): number {
    return this.count;
  }

  isEmpty(): boolean {
    return this.count === 0;
  }

  isFull(): boolean {
    return this.count === this.capacity;
  }

  /**
   * Appends a payload at the tail.
   *
   * @returns `'dropped'` when the buffer is full, `'enqueued'` otherwise
   */
  push(message: BufferedMessage): PushResult {
    if (this.count === this.capacity) {
      return 'dropped';
    }

    this.slots[this.tail] = message;
    this.tail = (this.tail + 1) % this.capacity;
    this.count++;
    return 'enqueued';
  }

  /**
   * Returns the oldest payload without removing it.
   */
  peek(): BufferedMessage | undefined {
    return this.count === 0 ? undefined : this.slots[this.head];
  }

  /**
   * Removes and returns the oldest payload.
   */
  shift(): BufferedMessage | undefined {
    if (this.count === 0) {
      return undefined;
    }

    const message = this.slots[this.head];
    this.slots[this.head] = undefined;
    this.head = (this.head + 1) % this.capacity;
    this.count--;

    if (this.count === 0) {
      this.head = 0;
      this.tail = 0;
    }

    return message;
  }

  /**
   * Sends buffered payloads oldest first.
   *
   * A payload is removed only after `send` reports success. On the first
   * failure draining stops and the failed payload stays at the head, so
   * order is preserved for the next drain.
   *
   * @param send - Delivers one payload
   * @param canContinue - Checked before every payload; draining stops once it returns false
   * @returns Number of payloads delivered
   */
  async drain(send: DrainSendFn, canContinue: () => boolean = () => true): Promise<number> {
    let delivered = 0;

    while (this.count > 0 && canContinue()) {
      const message = this.slots[this.head];
      if (message === undefined) {
        break;
      }

      const ok = await send(message);
      if (!ok) {
        break;
      }

      this.shift();
      delivered++;
    }

    return delivered;
  }

  /**
   * Discards every payload.
   *
   * @returns Number of payloads discarded
   */
  clear(): number {
    const discarded = this.count;
    this.slots.fill(undefined);
    this.head = 0;
    this.tail = 0;
    this.count = 0;
    return discarded;
  }

  /**
   * Returns the held payloads oldest first.
   */
  toArray(): BufferedMessage[] {
    const result: BufferedMessage[] = [];
    for (let i = 0; i < this.count; i++) {
      const message = this.slots[(this.head + i) % this.capacity];
      if (message !== undefined) {
        result.push(message);
      }
    }
    return result;
  }
}
