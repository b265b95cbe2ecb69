/**
 * Configuration defaults, validation and environment loading.
 *
 * @module config
 */

import type { ResolvedTransportConfig, TransportConfig } from './transport/types.js';
import { InvalidTransportConfigError, TRANSPORT_DEFAULTS } from './transport/types.js';

// =============================================================================
// Validation
// =============================================================================

function checkPositiveInteger(name: string, value: number | undefined): void {
  if (value !== undefined && (!Number.isInteger(value) || value < 1)) {
    throw new InvalidTransportConfigError(`${name} must be a positive integer`);
  }
}

/**
 * Validates transport configuration.
 *
 * @param config - Configuration to validate
 * @throws {InvalidTransportConfigError} If configuration is invalid
 */
export function validateTransportConfig(config: TransportConfig): void {
  if (config.host !== undefined && (typeof config.host !== 'string' || config.host.length === 0)) {
    throw new InvalidTransportConfigError('host must be a non-empty string');
  }

  if (config.port !== undefined) {
    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
      throw new InvalidTransportConfigError('port must be an integer between 1 and 65535');
    }
  }

  checkPositiveInteger('bufferCapacity', config.bufferCapacity);
  checkPositiveInteger('backoffFloorMs', config.backoffFloorMs);
  checkPositiveInteger('backoffCeilingMs', config.backoffCeilingMs);
  checkPositiveInteger('connectTimeoutMs', config.connectTimeoutMs);
  checkPositiveInteger('writeTimeoutMs', config.writeTimeoutMs);
  checkPositiveInteger('maxMessageBytes', config.maxMessageBytes);

  const floor = config.backoffFloorMs ?? TRANSPORT_DEFAULTS.BACKOFF_FLOOR_MS;
  const ceiling = config.backoffCeilingMs ?? TRANSPORT_DEFAULTS.BACKOFF_CEILING_MS;
  if (ceiling < floor) {
    throw new InvalidTransportConfigError('backoffCeilingMs must not be below backoffFloorMs');
  }

  if (config.clock !== undefined && typeof config.clock !== 'function') {
    throw new InvalidTransportConfigError('clock must be a function');
  }
}

/**
 * Validates a configuration and fills in defaults.
 *
 * @throws {InvalidTransportConfigError} If configuration is invalid
 */
export function resolveTransportConfig(config: TransportConfig): ResolvedTransportConfig {
  validateTransportConfig(config);

  return {
    host: config.host ?? TRANSPORT_DEFAULTS.HOST,
    port: config.port ?? TRANSPORT_DEFAULTS.PORT,
    bufferCapacity: config.bufferCapacity ?? TRANSPORT_DEFAULTS.BUFFER_CAPACITY,
    backoffFloorMs: config.backoffFloorMs ?? TRANSPORT_DEFAULTS.BACKOFF_FLOOR_MS,
    backoffCeilingMs: config.backoffCeilingMs ?? TRANSPORT_DEFAULTS.BACKOFF_CEILING_MS,
    backoffJitter: config.backoffJitter ?? false,
    connectTimeoutMs: config.connectTimeoutMs ?? TRANSPORT_DEFAULTS.CONNECT_TIMEOUT_MS,
    writeTimeoutMs: config.writeTimeoutMs ?? TRANSPORT_DEFAULTS.WRITE_TIMEOUT_MS,
    maxMessageBytes: config.maxMessageBytes ?? TRANSPORT_DEFAULTS.MAX_MESSAGE_BYTES,
    clock: config.clock ?? Date.now,
  };
}

// =============================================================================
// Environment
// =============================================================================

/**
 * Environment variables read by {@link configFromEnv}.
 */
export const ENV_VARS = {
  SOURCE: 'MONITORING_SOURCE',
  HOST: 'MONITORING_TCP_HOST',
  PORT: 'MONITORING_TCP_PORT',
  BUFFER_SIZE: 'MONITORING_BUFFER_SIZE',
  CONNECT_TIMEOUT_MS: 'MONITORING_CONNECT_TIMEOUT_MS',
  WRITE_TIMEOUT_MS: 'MONITORING_WRITE_TIMEOUT_MS',
} as const;

/**
 * Settings taken from the environment.
 */
export interface EnvConfig {
  /** Source name for formatted records, when set */
  readonly source?: string;
  readonly transport: TransportConfig;
}

type Env = Readonly<Record<string, string | undefined>>;

function readInteger(env: Env, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new InvalidTransportConfigError(`${name} must be an integer, got '${raw}'`);
  }
  return value;
}

function readString(env: Env, name: string): string | undefined {
  const raw = env[name]?.trim();
  return raw ? raw : undefined;
}

/**
 * Reads transport settings from environment variables.
 *
 * Unset or empty variables are left out so defaults apply.
 *
 * @example
 * ```typescript
 * const { source, transport } = configFromEnv(process.env);
 * const client = new MonitoringClient({ source: source ?? 'my-service', transport });
 * ```
 *
 * @throws {InvalidTransportConfigError} If a variable holds an unusable value
 */
export function configFromEnv(env: Env = process.env): EnvConfig {
  const host = readString(env, ENV_VARS.HOST);
  const port = readInteger(env, ENV_VARS.PORT);
  const bufferCapacity = readInteger(env, ENV_VARS.BUFFER_SIZE);
  const connectTimeoutMs = readInteger(env, ENV_VARS.CONNECT_TIMEOUT_MS);
  const writeTimeoutMs = readInteger(env, ENV_VARS.WRITE_TIMEOUT_MS);
  const source = readString(env, ENV_VARS.SOURCE);

  const transport: { -readonly [K in keyof TransportConfig]: TransportConfig[K] } = {};
  if (host !== undefined) transport.host = host;
  if (port !== undefined) transport.port = port;
  if (bufferCapacity !== undefined) transport.bufferCapacity = bufferCapacity;
  if (connectTimeoutMs !== undefined) transport.connectTimeoutMs = connectTimeoutMs;
  if (writeTimeoutMs !== undefined) transport.writeTimeoutMs = writeTimeoutMs;
  validateTransportConfig(transport);

  return source !== undefined ? { source, transport } : { transport };
}
