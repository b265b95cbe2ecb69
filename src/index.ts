/**
 * telemetry-link - buffered TCP telemetry transport and client for Node.js
 *
 * This module provides the public API for the telemetry-link library.
 */

export { VERSION } from './version.js';

// Transport
export {
  Transport,
  BackoffPolicy,
  MessageBuffer,
  ConnectionManager,
  TRANSPORT_DEFAULTS,
  InvalidTransportConfigError,
  InvalidPayloadError,
  PayloadTooLargeError,
  TransportClosedError,
  ConnectionFailedError,
  WriteFailedError,
} from './transport/index.js';

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
  BackoffOptions,
  DrainSendFn,
  SocketState,
  ConnectionManagerConfig,
  ConnectionManagerEvents,
} from './transport/index.js';

// Configuration
export {
  validateTransportConfig,
  resolveTransportConfig,
  configFromEnv,
  ENV_VARS,
  type EnvConfig,
} from './config.js';

// Tracing
export {
  CorrelationContext,
  generateId,
  assertValidId,
  MAX_ID_LENGTH,
  GENERATED_ID_LENGTH,
  type CorrelationIds,
  type StartedSpan,
} from './tracing/correlation-context.js';

// Protocol
export {
  PROTOCOL_VERSION,
  LOG_LEVELS,
  createMessage,
  encodeMessage,
  clampPercent,
  isLogLevel,
  type MessageType,
  type LogLevel,
  type JsonValue,
  type JsonObject,
  type EventData,
  type MetricData,
  type ProgressData,
  type ResourceData,
  type SpanData,
  type MessageDataMap,
  type Message,
  type MessageIds,
} from './protocol/message.js';

// Client
export {
  MonitoringClient,
  MAX_SOURCE_LENGTH,
  type MonitoringClientOptions,
} from './client/monitoring-client.js';

export { ResourceSampler, type ResourceSample } from './client/resource-usage.js';
