/**
 * Type definitions for the telemetry transport.
 *
 * The transport forwards pre-serialized payloads to a collector over a single
 * TCP connection, buffering them in memory while the collector is unreachable.
 *
 * @module transport/types
 */

// =============================================================================
// Transport Configuration
// =============================================================================

/**
 * Configuration for a telemetry transport.
 *
 * @example
 * ```typescript
 * const transport = new Transport({
 *   host: '127.0.0.1',
 *   port: 17000,
 *   bufferCapacity: 1000,
 * });
 * ```
 */
export interface TransportConfig {
  /**
   * Collector host. IP address or hostname.
   * @default '127.0.0.1'
   */
  readonly host?: string;

  /**
   * Collector TCP port.
   * @default 17000
   */
  readonly port?: number;

  /**
   * Number of payloads held while the collector is unreachable.
   * @default 1000
   */
  readonly bufferCapacity?: number;

  /**
   * Reconnect delay after a success, and the first delay after a failure.
   * @default 1000
   */
  readonly backoffFloorMs?: number;

  /**
   * Upper bound of the reconnect delay.
   * @default 30000
   */
  readonly backoffCeilingMs?: number;

  /**
   * Randomize reconnect delays between 50% and 100% of the computed value.
   * @default false
   */
  readonly backoffJitter?: boolean;

  /**
   * Time allowed for a single connect attempt.
   * @default 5000
   */
  readonly connectTimeoutMs?: number;

  /**
   * Time allowed for a single payload write to be accepted by the socket.
   * @default 5000
   */
  readonly writeTimeoutMs?: number;

  /**
   * Largest payload accepted by `send()`, in bytes.
   * @default 65536
   */
  readonly maxMessageBytes?: number;

  /**
   * Clock used for reconnect throttling. Tests substitute a manual clock.
   * @default Date.now
   */
  readonly clock?: () => number;
}

/**
 * Configuration with every default applied.
 */
export type ResolvedTransportConfig = Required<TransportConfig>;

/**
 * Default values for transport configuration.
 */
export const TRANSPORT_DEFAULTS = {
  HOST: '127.0.0.1',

  /** Port the sidecar collector listens on */
  PORT: 17000,

  BUFFER_CAPACITY: 1000,

  BACKOFF_FLOOR_MS: 1000,

  BACKOFF_CEILING_MS: 30000,

  CONNECT_TIMEOUT_MS: 5000,

  WRITE_TIMEOUT_MS: 5000,

  MAX_MESSAGE_BYTES: 64 * 1024,
} as const;

// =============================================================================
// State and Results
// =============================================================================

/**
 * Connection state of a transport.
 *
 * - `disconnected`: no socket; payloads are buffered
 * - `connected`: socket open; payloads are written directly
 * - `overflow`: the buffer rejected a payload and has not drained since
 */
export type ConnectionState = 'disconnected' | 'connected' | 'overflow';

/**
 * Outcome of a single `send()`.
 *
 * - `delivered`: written to the collector socket
 * - `buffered`: held locally until the next successful connection
 * - `dropped`: rejected because the buffer was full
 */
export type SendResult = 'delivered' | 'buffered' | 'dropped';

/**
 * Outcome of pushing a payload onto the message buffer.
 */
export type PushResult = 'enqueued' | 'dropped';

/**
 * Payload accepted by the transport. Strings are encoded as UTF-8.
 */
export type Payload = string | Uint8Array;

/**
 * Produces a payload at the moment it is sent.
 */
export type PayloadFactory = () => Payload;

/**
 * A payload held by the message buffer.
 */
export interface BufferedMessage {
  readonly payload: Buffer;
  readonly byteLength: number;
}

/**
 * Snapshot of transport counters and state.
 */
export interface TransportStats {
  readonly state: ConnectionState;

  /** Payloads written to the collector */
  readonly messagesSent: number;

  /** Payloads ever accepted into the buffer (cumulative, not current depth) */
  readonly messagesBuffered: number;

  /** Payloads rejected by a full buffer */
  readonly messagesDropped: number;

  /** Successful connections, including the first one */
  readonly reconnectCount: number;

  /** Drops since the buffer last drained completely */
  readonly overflowCount: number;

  /** Payloads currently waiting in the buffer */
  readonly bufferedNow: number;

  readonly bytesSent: number;

  /** Timestamp of the last successful write */
  readonly lastSentAt: number | null;

  /** Timestamp when the current connection was established */
  readonly connectedAt: number | null;

  /** Delay that currently throttles reconnect attempts */
  readonly currentBackoffMs: number;
}

/**
 * Events emitted by Transport.
 */
export interface TransportEvents {
  /** Emitted when a connection to the collector is established */
  connected: [host: string, port: number];

  /** Emitted when an open connection is lost */
  disconnected: [reason: string];

  /** Emitted when a connect attempt fails */
  connectFailed: [error: Error, nextDelayMs: number];

  /** Emitted when a payload is dropped by a full buffer */
  overflow: [dropped: number];

  /** Emitted after a drain delivered at least one buffered payload */
  drained: [delivered: number, remaining: number];

  /** Emitted once after close() */
  closed: [discarded: number];
}

/**
 * Options for Transport.close().
 */
export interface CloseOptions {
  /**
   * Payload written as the last message before the socket closes,
   * when the transport is connected at that point. A factory is invoked
   * after every operation queued before close() has run.
   */
  readonly goodbye?: Payload | PayloadFactory;
}

// =============================================================================
// Error Types
// =============================================================================

/**
 * Error thrown when transport configuration is invalid.
 */
export class InvalidTransportConfigError extends Error {
  override readonly name = 'InvalidTransportConfigError' as const;

  constructor(readonly reason: string) {
    super(`Invalid transport configuration: ${reason}`);
  }
}

/**
 * Error thrown when a payload or identifier argument is unusable.
 */
export class InvalidPayloadError extends Error {
  override readonly name = 'InvalidPayloadError' as const;

  constructor(readonly reason: string) {
    super(`Invalid argument: ${reason}`);
  }
}

/**
 * Error thrown when a payload exceeds the configured size limit.
 */
export class PayloadTooLargeError extends Error {
  override readonly name = 'PayloadTooLargeError' as const;

  constructor(
    readonly byteLength: number,
    readonly maxBytes: number,
  ) {
    super(`Payload of ${byteLength} bytes exceeds the limit of ${maxBytes} bytes`);
  }
}

/**
 * Error thrown when a transport is used after close().
 */
export class TransportClosedError extends Error {
  override readonly name = 'TransportClosedError' as const;

  constructor() {
    super('Transport has been closed');
  }
}

/**
 * Error describing a failed connect attempt.
 */
export class ConnectionFailedError extends Error {
  override readonly name = 'ConnectionFailedError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly host: string,
    readonly port: number,
    cause?: Error,
  ) {
    super(
      cause
        ? `Could not connect to collector at ${host}:${port}: ${cause.message}`
        : `Could not connect to collector at ${host}:${port}`,
    );
    this.cause = cause;
  }
}

/**
 * Error describing a failed or timed out write.
 */
export class WriteFailedError extends Error {
  override readonly name = 'WriteFailedError' as const;
  override readonly cause: Error | undefined;

  constructor(
    readonly byteLength: number,
    cause?: Error,
  ) {
    super(
      cause
        ? `Write of ${byteLength} bytes failed: ${cause.message}`
        : `Write of ${byteLength} bytes failed`,
    );
    this.cause = cause;
  }
}
