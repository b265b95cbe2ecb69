/**
 * Line-delimited JSON records understood by the collector.
 *
 * Each record is a single JSON object followed by a newline:
 *
 * ```
 * {"v":1,"src":"billing","ts":1700000000000,"type":"event","tid":"…","sid":"…","data":{…}}
 * ```
 *
 * @module protocol/message
 */

import type { CorrelationIds } from '../tracing/correlation-context.js';

export const PROTOCOL_VERSION = 1 as const;

/**
 * Record types accepted by the collector.
 */
export type MessageType =
  | 'event'
  | 'metric'
  | 'progress'
  | 'resource'
  | 'span'
  | 'heartbeat'
  | 'goodbye';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'fatal'];

/**
 * JSON value allowed in record data.
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | readonly JsonValue[]
  | { readonly [key: string]: JsonValue };

export type JsonObject = { readonly [key: string]: JsonValue };

// =============================================================================
// Record Data
// =============================================================================

export interface EventData {
  readonly level: LogLevel;
  readonly msg: string;
  readonly ctx: JsonObject;
}

export interface MetricData {
  readonly name: string;
  readonly value: number;
  readonly unit: string;
  readonly tags: Readonly<Record<string, string>>;
}

export interface ProgressData {
  readonly job_id: string;
  /** Integer percentage in [0, 100] */
  readonly percent: number;
  readonly status: string;
}

export interface ResourceData {
  readonly cpu: number;
  readonly mem: number;
  readonly disk: number;
  readonly net: number;
  readonly pid: number;
}

export interface SpanData {
  readonly name: string;
  readonly start: number;
  readonly end: number | null;
  readonly status: string;
  readonly tags: JsonObject;
}

/**
 * Data carried by each record type.
 */
export interface MessageDataMap {
  event: EventData;
  metric: MetricData;
  progress: ProgressData;
  resource: ResourceData;
  span: SpanData;
  heartbeat: Record<string, never>;
  goodbye: Record<string, never>;
}

/**
 * A record before serialization.
 */
export interface Message<T extends MessageType = MessageType> {
  readonly v: typeof PROTOCOL_VERSION;
  readonly src: string;
  readonly ts: number;
  readonly type: T;
  readonly tid?: string;
  readonly sid?: string;
  readonly pid?: string;
  readonly data: MessageDataMap[T];
}

/**
 * Identifiers attached to a record.
 */
export interface MessageIds extends CorrelationIds {
  readonly parentSpanId?: string | null;
}

// =============================================================================
// Construction and Serialization
// =============================================================================

/**
 * Builds a record, attaching whichever identifiers are set.
 */
export function createMessage<T extends MessageType>(
  source: string,
  type: T,
  data: MessageDataMap[T],
  ids: MessageIds = { traceId: null, spanId: null },
  timestamp: number = Date.now(),
): Message<T> {
  return {
    v: PROTOCOL_VERSION,
    src: source,
    ts: timestamp,
    type,
    ...(ids.traceId !== null ? { tid: ids.traceId } : {}),
    ...(ids.spanId !== null ? { sid: ids.spanId } : {}),
    ...(ids.parentSpanId ? { pid: ids.parentSpanId } : {}),
    data,
  };
}

/**
 * Serializes a record as one newline-terminated JSON line.
 */
export function encodeMessage(message: Message): string {
  return `${JSON.stringify(message)}\n`;
}

/**
 * Clamps a progress percentage to an integer in [0, 100].
 */
export function clampPercent(percent: number): number {
  if (!Number.isFinite(percent)) {
    return 0;
  }
  return Math.min(100, Math.max(0, Math.trunc(percent)));
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}
