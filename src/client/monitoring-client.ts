/**
 * MonitoringClient - typed telemetry records over a Transport.
 *
 * Formats events, metrics, progress updates, resource samples and spans as
 * line-delimited JSON and hands them to the transport. Trace and span
 * identifiers are read and changed inside the transport's exclusive section,
 * so each record carries the identifiers that were active when it was sent.
 *
 * @example
 * ```typescript
 * const client = await MonitoringClient.create({ source: 'billing', transport: { port: 17000 } });
 *
 * await client.logEvent('info', 'Batch started', { batch: 'b-42' });
 * const spanId = await client.startSpan('process_batch');
 * await client.logProgress('b-42', 50, 'processing');
 * await client.endSpan(spanId, 'success');
 *
 * await client.close();
 * ```
 *
 * @module client/monitoring-client
 */

import { Transport } from '../transport/transport.js';
import type {
  ConnectionState,
  SendResult,
  TransportConfig,
  TransportStats,
} from '../transport/types.js';
import { InvalidPayloadError } from '../transport/types.js';
import {
  assertValidId,
  CorrelationContext,
  type CorrelationIds,
} from '../tracing/correlation-context.js';
import {
  clampPercent,
  createMessage,
  encodeMessage,
  isLogLevel,
  type JsonObject,
  type LogLevel,
  type MessageDataMap,
  type MessageIds,
  type MessageType,
} from '../protocol/message.js';
import { ResourceSampler, type ResourceSample } from './resource-usage.js';

/**
 * Options for a MonitoringClient.
 */
export interface MonitoringClientOptions {
  /** Name of the emitting service or script, sent as `src` */
  readonly source: string;

  /** Existing transport, or configuration for a new one */
  readonly transport?: Transport | TransportConfig;

  /** Timestamp source for records. Defaults to Date.now. */
  readonly clock?: () => number;
}

/** Longest accepted source name */
export const MAX_SOURCE_LENGTH = 128;

export class MonitoringClient {
  readonly transport: Transport;
  readonly source: string;

  private readonly context = new CorrelationContext();
  private readonly sampler = new ResourceSampler();
  private readonly clock: () => number;
  private readonly ownsTransport: boolean;

  constructor(options: MonitoringClientOptions) {
    if (typeof options.source !== 'string' || options.source.length === 0) {
      throw new InvalidPayloadError('source must be a non-empty string');
    }
    if (options.source.length > MAX_SOURCE_LENGTH) {
      throw new InvalidPayloadError(
        `source exceeds maximum length of ${MAX_SOURCE_LENGTH} characters`,
      );
    }

    this.source = options.source;
    this.clock = options.clock ?? Date.now;

    if (options.transport instanceof Transport) {
      this.transport = options.transport;
      this.ownsTransport = false;
    } else {
      this.transport = new Transport(options.transport ?? {});
      this.ownsTransport = true;
    }
  }

  /**
   * Creates a client and makes the initial connection attempt.
   *
   * Resolves whether or not the collector is reachable; records sent while
   * it is not are buffered.
   */
  static async create(options: MonitoringClientOptions): Promise<MonitoringClient> {
    const client = new MonitoringClient(options);
    if (!client.transport.isClosed()) {
      await client.transport.connect();
    }
    return client;
  }

  getState(): ConnectionState {
    return this.transport.getState();
  }

  getStats(): TransportStats {
    return this.transport.getStats();
  }

  /**
   * Returns the trace and span identifiers currently in effect.
   */
  getCorrelation(): CorrelationIds {
    return this.context.current();
  }

  /**
   * Sends a log event.
   */
  logEvent(level: LogLevel, message: string, context: JsonObject = {}): Promise<SendResult> {
    if (!isLogLevel(level)) {
      return Promise.reject(new InvalidPayloadError(`unknown log level '${String(level)}'`));
    }
    if (typeof message !== 'string') {
      return Promise.reject(new InvalidPayloadError('event message must be a string'));
    }

    return this.emitRecord('event', { level, msg: message, ctx: context });
  }

  /**
   * Sends a metric sample.
   */
  logMetric(
    name: string,
    value: number,
    unit = '',
    tags: Readonly<Record<string, string>> = {},
  ): Promise<SendResult> {
    if (typeof name !== 'string' || name.length === 0) {
      return Promise.reject(new InvalidPayloadError('metric name must be a non-empty string'));
    }
    if (!Number.isFinite(value)) {
      return Promise.reject(new InvalidPayloadError(`metric '${name}' value must be finite`));
    }

    return this.emitRecord('metric', { name, value, unit, tags });
  }

  /**
   * Sends a job progress update. The percentage is clamped to [0, 100].
   */
  logProgress(jobId: string, percent: number, status = 'running'): Promise<SendResult> {
    if (typeof jobId !== 'string' || jobId.length === 0) {
      return Promise.reject(new InvalidPayloadError('job id must be a non-empty string'));
    }

    return this.emitRecord('progress', {
      job_id: jobId,
      percent: clampPercent(percent),
      status,
    });
  }

  /**
   * Sends a resource usage record. Figures left out are sampled from the
   * running process.
   */
  logResource(sample: Partial<ResourceSample> = {}): Promise<SendResult> {
    const needsSample =
      sample.cpuPercent === undefined ||
      sample.memoryMb === undefined ||
      sample.diskIoMb === undefined ||
      sample.networkIoMb === undefined;
    const measured = needsSample ? this.sampler.sample() : null;

    return this.emitRecord('resource', {
      cpu: sample.cpuPercent ?? measured?.cpuPercent ?? 0,
      mem: sample.memoryMb ?? measured?.memoryMb ?? 0,
      disk: sample.diskIoMb ?? measured?.diskIoMb ?? 0,
      net: sample.networkIoMb ?? measured?.networkIoMb ?? 0,
      pid: process.pid,
    });
  }

  /**
   * Sends a heartbeat record.
   */
  heartbeat(): Promise<SendResult> {
    return this.emitRecord('heartbeat', {});
  }

  /**
   * Replaces the active trace id. Later records carry it.
   */
  setTraceId(traceId: string): Promise<void> {
    return this.transport.runExclusive(async () => {
      this.context.setTraceId(traceId);
    });
  }

  /**
   * Starts a span and makes it the active one.
   *
   * Generates a trace id too when none is given and none is active.
   *
   * @returns Identifier of the new span
   */
  async startSpan(name: string, traceId?: string): Promise<string> {
    if (typeof name !== 'string' || name.length === 0) {
      throw new InvalidPayloadError('span name must be a non-empty string');
    }

    let spanId = '';
    await this.transport.send(() => {
      const planned = this.context.planSpan(traceId);
      const record = this.format(
        'span',
        { name, start: this.clock(), end: null, status: 'started', tags: {} },
        {
          traceId: planned.traceId,
          spanId: planned.spanId,
          parentSpanId: planned.parentSpanId,
        },
      );

      // Ids change only once the record is known to be sendable
      this.transport.validatePayload(record);
      this.context.enterSpan(planned);
      spanId = planned.spanId;
      return record;
    });
    return spanId;
  }

  /**
   * Ends a span. The active span is cleared only if it is this one.
   */
  endSpan(spanId: string, status = 'success', tags: JsonObject = {}): Promise<SendResult> {
    return this.transport.send(() => {
      assertValidId('span', spanId);
      const record = this.format(
        'span',
        { name: '', start: 0, end: this.clock(), status, tags },
        { traceId: this.context.current().traceId, spanId },
      );

      this.transport.validatePayload(record);
      this.context.endSpan(spanId);
      return record;
    });
  }

  /**
   * Sends a goodbye record and closes the transport.
   *
   * A transport passed in by the caller is left open; only the goodbye
   * record is sent through it. The record carries the identifiers in effect
   * once every earlier operation has run.
   */
  async close(): Promise<void> {
    if (this.transport.isClosed()) {
      return;
    }

    const goodbye = (): string => this.format('goodbye', {}, this.context.current());

    if (this.ownsTransport) {
      await this.transport.close({ goodbye });
      return;
    }

    await this.transport.send(goodbye);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private emitRecord<T extends MessageType>(
    type: T,
    data: MessageDataMap[T],
  ): Promise<SendResult> {
    return this.transport.send(() => this.format(type, data, this.context.current()));
  }

  private format<T extends MessageType>(
    type: T,
    data: MessageDataMap[T],
    ids: MessageIds,
  ): string {
    return encodeMessage(createMessage(this.source, type, data, ids, this.clock()));
  }
}
