/**
 * Client-side TCP transport to a telemetry collector.
 *
 * Writes payloads directly while connected, holds them in a bounded buffer
 * while the collector is unreachable, and reconnects with exponential
 * backoff on later sends.
 *
 * @module transport
 *
 * @example
 * ```typescript
 * import { Transport } from 'telemetry-link/transport';
 *
 * const transport = new Transport({ host: '127.0.0.1', port: 17000 });
 *
 * transport.on('overflow', (dropped) => console.warn(`dropped ${dropped} payloads`));
 *
 * await transport.connect();
 * const result = await transport.send('{"type":"heartbeat"}\n');
 * await transport.close();
 * ```
 */

// =============================================================================
// Transport
// =============================================================================

export { Transport } from './transport.js';

export type {
  TransportConfig,
  ResolvedTransportConfig,
  ConnectionState,
  SendResult,
  PushResult,
  Payload,
  PayloadFactory,
  BufferedMessage,
  TransportStats,
  TransportEvents,
  CloseOptions,
} from './types.js';

export {
  TRANSPORT_DEFAULTS,
  InvalidTransportConfigError,
  InvalidPayloadError,
  PayloadTooLargeError,
  TransportClosedError,
  ConnectionFailedError,
  WriteFailedError,
} from './types.js';

// =============================================================================
// Building Blocks
// =============================================================================

export { BackoffPolicy, type BackoffOptions } from './backoff.js';

export { MessageBuffer, type DrainSendFn } from './message-buffer.js';

export {
  ConnectionManager,
  type SocketState,
  type ConnectionManagerConfig,
  type ConnectionManagerEvents,
} from './connection-manager.js';
