/**
 * Transport for forwarding telemetry payloads to a collector.
 *
 * Composes the connection manager, the bounded message buffer and the
 * backoff policy. Payloads are written directly while connected and held
 * in memory otherwise; every successful (re)connection drains the buffer
 * oldest first before anything else is written.
 *
 * @module transport/transport
 */

import { EventEmitter } from 'node:events';

import { BackoffPolicy } from './backoff.js';
import { ConnectionManager } from './connection-manager.js';
import { MessageBuffer } from './message-buffer.js';
import type {
  BufferedMessage,
  CloseOptions,
  ConnectionState,
  Payload,
  PayloadFactory,
  ResolvedTransportConfig,
  SendResult,
  TransportConfig,
  TransportEvents,
  TransportStats,
} from './types.js';
import { InvalidPayloadError, PayloadTooLargeError, TransportClosedError } from './types.js';
import { resolveTransportConfig } from '../config.js';

/**
 * Forwards pre-serialized payloads to a collector over one TCP connection.
 *
 * All operations that touch the connection, the buffer or the counters run
 * one at a time, in call order. Statistics and state reads are synchronous
 * snapshots.
 *
 * @example
 * ```typescript
 * const transport = new Transport({ host: '127.0.0.1', port: 17000 });
 *
 * transport.on('overflow', (dropped) => {
 *   process.stderr.write(`telemetry buffer full, ${dropped} dropped\n`);
 * });
 *
 * const result = await transport.send('{"v":1,"type":"event"}\n');
 * // 'delivered' | 'buffered' | 'dropped'
 *
 * await transport.close();
 * ```
 */
export class Transport extends EventEmitter<TransportEvents> {
  private readonly config: ResolvedTransportConfig;
  private readonly connection: ConnectionManager;
  private readonly buffer: MessageBuffer;

  private state: ConnectionState = 'disconnected';
  private closed = false;
  private queue: Promise<void> = Promise.resolve();

  // Statistics
  private messagesSent = 0;
  private messagesBuffered = 0;
  private messagesDropped = 0;
  private overflowCount = 0;
  private bytesSent = 0;
  private lastSentAt: number | null = null;

  constructor(config: TransportConfig = {}) {
    super();

    this.config = resolveTransportConfig(config);
    this.buffer = new MessageBuffer(this.config.bufferCapacity);
    this.connection = new ConnectionManager({
      host: this.config.host,
      port: this.config.port,
      backoff: new BackoffPolicy({
        floorMs: this.config.backoffFloorMs,
        ceilingMs: this.config.backoffCeilingMs,
        jitter: this.config.backoffJitter,
      }),
      connectTimeoutMs: this.config.connectTimeoutMs,
      writeTimeoutMs: this.config.writeTimeoutMs,
      clock: this.config.clock,
    });

    this.connection.on('connected', () => {
      this.state = 'connected';
      this.emit('connected', this.config.host, this.config.port);
    });
    this.connection.on('disconnected', (reason) => {
      if (this.state === 'connected') {
        this.state = 'disconnected';
      }
      this.emit('disconnected', reason);
    });
    this.connection.on('connectFailed', (error, nextDelayMs) => {
      this.emit('connectFailed', error, nextDelayMs);
    });
  }

  /**
   * Returns the current connection state.
   */
  getState(): ConnectionState {
    return this.state;
  }

  /**
   * Returns the resolved configuration.
   */
  getConfig(): Readonly<ResolvedTransportConfig> {
    return this.config;
  }

  /**
   * Returns a snapshot of the transport counters.
   */
  getStats(): TransportStats {
    return {
      state: this.state,
      messagesSent: this.messagesSent,
      messagesBuffered: this.messagesBuffered,
      messagesDropped: this.messagesDropped,
      reconnectCount: this.connection.getReconnectCount(),
      overflowCount: this.overflowCount,
      bufferedNow: this.buffer.size,
      bytesSent: this.bytesSent,
      lastSentAt: this.lastSentAt,
      connectedAt: this.connection.getConnectedAt(),
      currentBackoffMs: this.connection.getCurrentDelay(),
    };
  }

  isClosed(): boolean {
    return this.closed;
  }

  /**
   * Sends a payload to the collector.
   *
   * Written directly while connected. Otherwise, or when the write fails,
   * the payload is buffered and one reconnect attempt is made if the
   * backoff allows; a successful reconnect drains the buffer in order.
   *
   * A payload factory is invoked inside the exclusive section, so whatever
   * shared state it reads is consistent with the order of sends.
   *
   * @param payload - Serialized message, typically one newline-terminated line
   * @returns How the payload was handled
   * @throws {InvalidPayloadError} If the payload is empty
   * @throws {PayloadTooLargeError} If the payload exceeds `maxMessageBytes`
   * @throws {TransportClosedError} If the transport has been closed
   */
  send(payload: Payload | PayloadFactory): Promise<SendResult> {
    if (this.closed) {
      return Promise.reject(new TransportClosedError());
    }

    if (typeof payload === 'function') {
      return this.exclusive(() => this.deliver(this.prepare(payload())));
    }

    let message: BufferedMessage;
    try {
      message = this.prepare(payload);
    } catch (err) {
      return Promise.reject(err);
    }

    return this.exclusive(() => this.deliver(message));
  }

  /**
   * Attempts to connect (subject to backoff) and drain the buffer.
   *
   * @returns Number of buffered payloads delivered
   */
  flush(): Promise<number> {
    if (this.closed) {
      return Promise.reject(new TransportClosedError());
    }

    return this.exclusive(async () => {
      const before = this.messagesSent;
      await this.ensureConnected();
      return this.messagesSent - before;
    });
  }

  /**
   * Makes sure the collector connection is open, draining the buffer after
   * a successful reconnect.
   *
   * @returns Whether the transport is connected afterwards
   */
  connect(): Promise<boolean> {
    if (this.closed) {
      return Promise.reject(new TransportClosedError());
    }

    return this.exclusive(() => this.ensureConnected());
  }

  /**
   * Runs an operation inside the transport's exclusive section.
   *
   * Used by collaborators that must mutate shared state in order with sends.
   */
  runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    return this.exclusive(operation);
  }

  /**
   * Closes the transport.
   *
   * Makes a final drain attempt if connected, writes the goodbye payload if
   * one is given and the connection is still open, then closes the socket.
   * Payloads still buffered afterwards are discarded.
   */
  close(options: CloseOptions = {}): Promise<void> {
    if (this.closed) {
      return this.exclusive(async () => undefined);
    }

    const { goodbye } = options;
    let prepared: BufferedMessage | null = null;
    if (goodbye !== undefined && typeof goodbye !== 'function') {
      try {
        prepared = this.prepare(goodbye);
      } catch (err) {
        return Promise.reject(err);
      }
    }
    this.closed = true;

    return this.exclusive(async () => {
      let goodbyeError: Error | null = null;
      if (typeof goodbye === 'function') {
        try {
          prepared = this.prepare(goodbye());
        } catch (err) {
          goodbyeError = err instanceof Error ? err : new Error(String(err));
        }
      }

      if (this.connection.isConnected()) {
        await this.drainBuffer();
      }

      if (prepared !== null && this.connection.isConnected()) {
        await this.write(prepared);
      }

      await this.connection.close();
      const discarded = this.buffer.clear();
      this.state = 'disconnected';
      this.emit('closed', discarded);

      // The transport is closed either way; a bad goodbye is still reported
      if (goodbyeError !== null) {
        throw goodbyeError;
      }
    });
  }

  /**
   * Destroys the socket immediately and discards buffered payloads.
   */
  destroy(): void {
    this.closed = true;
    this.connection.destroy();
    this.buffer.clear();
    this.state = 'disconnected';
  }

  /**
   * Checks a payload against the rules `send()` applies, without sending it.
   *
   * @throws {InvalidPayloadError} If the payload is empty
   * @throws {PayloadTooLargeError} If the payload exceeds `maxMessageBytes`
   */
  validatePayload(payload: Payload): void {
    this.prepare(payload);
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private prepare(payload: Payload): BufferedMessage {
    if (typeof payload !== 'string' && !(payload instanceof Uint8Array)) {
      throw new InvalidPayloadError('payload must be a string or Uint8Array');
    }

    const bytes = typeof payload === 'string' ? Buffer.from(payload, 'utf8') : Buffer.from(payload);
    if (bytes.length === 0) {
      throw new InvalidPayloadError('payload must not be empty');
    }
    if (bytes.length > this.config.maxMessageBytes) {
      throw new PayloadTooLargeError(bytes.length, this.config.maxMessageBytes);
    }

    return { payload: bytes, byteLength: bytes.length };
  }

  private async deliver(message: BufferedMessage): Promise<SendResult> {
    if (this.connection.isConnected() && this.buffer.isEmpty()) {
      if (await this.write(message)) {
        return 'delivered';
      }
    }

    const result = this.enqueue(message);
    await this.ensureConnected();
    return result;
  }

  private enqueue(message: BufferedMessage): SendResult {
    if (this.buffer.push(message) === 'dropped') {
      this.state = 'overflow';
      this.overflowCount++;
      this.messagesDropped++;
      this.emit('overflow', this.messagesDropped);
      return 'dropped';
    }

    this.messagesBuffered++;
    return 'buffered';
  }

  private async ensureConnected(): Promise<boolean> {
    const wasConnected = this.connection.isConnected();
    const connected = await this.connection.ensureConnected();

    if (connected && (!wasConnected || !this.buffer.isEmpty())) {
      await this.drainBuffer();
    }

    return this.connection.isConnected();
  }

  private async drainBuffer(): Promise<void> {
    const delivered = await this.buffer.drain(
      (message) => this.write(message),
      () => this.connection.isConnected(),
    );

    if (this.buffer.isEmpty() && this.connection.isConnected()) {
      this.state = 'connected';
      this.overflowCount = 0;
    }

    if (delivered > 0) {
      this.emit('drained', delivered, this.buffer.size);
    }
  }

  private async write(message: BufferedMessage): Promise<boolean> {
    const ok = await this.connection.sendRaw(message.payload);

    if (!ok) {
      this.state = 'disconnected';
      return false;
    }

    this.messagesSent++;
    this.bytesSent += message.byteLength;
    this.lastSentAt = this.config.clock();
    return true;
  }

  private exclusive<T>(operation: () => Promise<T>): Promise<T> {
    const scheduled = this.queue.then(operation, operation);
    this.queue = scheduled.then(
      () => undefined,
      () => undefined,
    );
    return scheduled;
  }
}
