/**
 * Active trace and span identifiers attached to outgoing records.
 *
 * @module tracing/correlation-context
 */

import { randomInt } from 'node:crypto';

import { InvalidPayloadError } from '../transport/types.js';

/** Longest identifier accepted for a trace or span */
export const MAX_ID_LENGTH = 64;

/** Length of generated identifiers */
export const GENERATED_ID_LENGTH = 16;

const ID_ALPHABET = 'abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789';

/**
 * Generates a random alphanumeric identifier.
 */
export function generateId(length: number = GENERATED_ID_LENGTH): string {
  let id = '';
  for (let i = 0; i < length; i++) {
    id += ID_ALPHABET.charAt(randomInt(ID_ALPHABET.length));
  }
  return id;
}

/**
 * Checks that an identifier is non-empty and within the length bound.
 *
 * @throws {InvalidPayloadError} If the identifier is unusable
 */
export function assertValidId(kind: 'trace' | 'span', id: string): void {
  if (typeof id !== 'string' || id.length === 0) {
    throw new InvalidPayloadError(`${kind} id must be a non-empty string`);
  }
  if (id.length > MAX_ID_LENGTH) {
    throw new InvalidPayloadError(`${kind} id exceeds maximum length of ${MAX_ID_LENGTH} characters`);
  }
}

/**
 * Identifiers in effect at the moment a record is formatted.
 */
export interface CorrelationIds {
  readonly traceId: string | null;
  readonly spanId: string | null;
}

/**
 * Result of starting a span.
 */
export interface StartedSpan {
  readonly traceId: string;
  readonly spanId: string;

  /** Span that was active when this one started */
  readonly parentSpanId: string | null;
}

/**
 * Holds the active trace id and span id.
 *
 * Not synchronized on its own; the monitoring client mutates it inside the
 * transport's exclusive section.
 */
export class CorrelationContext {
  private traceId: string | null = null;
  private spanId: string | null = null;

  /**
   * Returns the identifiers currently in effect.
   */
  current(): CorrelationIds {
    return { traceId: this.traceId, spanId: this.spanId };
  }

  setTraceId(traceId: string): void {
    assertValidId('trace', traceId);
    this.traceId = traceId;
  }

  /**
   * Makes a new span the active one.
   *
   * An explicit trace id replaces the active trace. Without one, the active
   * trace is kept, or a new trace id is generated if none is active.
   */
  startSpan(traceId?: string): StartedSpan {
    const span = this.planSpan(traceId);
    this.enterSpan(span);
    return span;
  }

  /**
   * Computes the identifiers `startSpan()` would apply, without applying them.
   */
  planSpan(traceId?: string): StartedSpan {
    if (traceId !== undefined) {
      assertValidId('trace', traceId);
    }

    return {
      traceId: traceId ?? this.traceId ?? generateId(),
      spanId: generateId(),
      parentSpanId: this.spanId,
    };
  }

  /**
   * Makes a planned span the active one.
   */
  enterSpan(span: StartedSpan): void {
    assertValidId('trace', span.traceId);
    assertValidId('span', span.spanId);

    this.traceId = span.traceId;
    this.spanId = span.spanId;
  }

  /**
   * Ends a span. The active span is cleared only when it is the one ending;
   * ending any other span leaves the active span in place.
   *
   * @returns Whether the active span was cleared
   */
  endSpan(spanId: string): boolean {
    assertValidId('span', spanId);

    if (this.spanId === spanId) {
      this.spanId = null;
      return true;
    }
    return false;
  }

  /**
   * Forgets the active trace and span.
   */
  clear(): void {
    this.traceId = null;
    this.spanId = null;
  }
}
