/**
 * telemetry-send - emits a single record to a collector.
 *
 * Argument parsing and execution live here so they can be exercised
 * without spawning a process; `src/bin/telemetry-send.ts` only wires them
 * to `process`.
 *
 * @module cli/telemetry-send
 */

import { parseArgs } from 'node:util';

import { MonitoringClient } from '../client/monitoring-client.js';
import { configFromEnv, type EnvConfig } from '../config.js';
import { isLogLevel, type LogLevel } from '../protocol/message.js';
import { TRANSPORT_DEFAULTS, type SendResult, type TransportConfig } from '../transport/types.js';
import { VERSION } from '../version.js';

// =============================================================================
// Types
// =============================================================================

export type RecordKind = 'event' | 'metric' | 'progress' | 'resource' | 'heartbeat';

const RECORD_KINDS: readonly RecordKind[] = ['event', 'metric', 'progress', 'resource', 'heartbeat'];

/**
 * Validated options for sending one record.
 */
export interface SendOptions {
  readonly source: string;
  readonly transport: TransportConfig;
  readonly kind: RecordKind;
  readonly level: LogLevel;
  readonly message: string;
  readonly name: string;
  readonly value: number;
  readonly unit: string;
  readonly jobId: string;
  readonly percent: number;
  readonly status: string;
  readonly verbose: boolean;
}

export type CliCommand =
  | { readonly kind: 'help' }
  | { readonly kind: 'version' }
  | { readonly kind: 'send'; readonly options: SendOptions };

/**
 * Writable sinks for CLI output.
 */
export interface CliOutput {
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
}

/**
 * Error thrown when command line arguments are invalid.
 */
export class CliUsageError extends Error {
  override readonly name = 'CliUsageError' as const;

  constructor(readonly problems: readonly string[]) {
    super(problems.join('\n'));
  }
}

// =============================================================================
// Help
// =============================================================================

export const HELP_TEXT = `
telemetry-send - Send one telemetry record to a collector

USAGE:
  telemetry-send [OPTIONS]

OPTIONS:
  -H, --host <address>    Collector host (default: ${TRANSPORT_DEFAULTS.HOST})
  -p, --port <number>     Collector port (default: ${TRANSPORT_DEFAULTS.PORT})
  -s, --source <name>     Source name (default: $MONITORING_SOURCE or telemetry-send)
  -t, --type <kind>       Record type: ${RECORD_KINDS.join(', ')} (default: event)
      --level <level>     Event level: debug, info, warn, error, fatal (default: info)
  -m, --message <text>    Event message
      --name <metric>     Metric name
      --value <number>    Metric value
      --unit <unit>       Metric unit
      --job <id>          Job id for progress records
      --percent <number>  Progress percentage, clamped to 0..100
      --status <text>     Progress status (default: running)
      --timeout <ms>      Connect and write timeout (default: ${TRANSPORT_DEFAULTS.CONNECT_TIMEOUT_MS})
      --verbose           Print connection events to stderr
  -h, --help              Show this help message
  -v, --version           Show version number

ENVIRONMENT:
  MONITORING_SOURCE, MONITORING_TCP_HOST, MONITORING_TCP_PORT,
  MONITORING_CONNECT_TIMEOUT_MS, MONITORING_WRITE_TIMEOUT_MS

EXAMPLES:
  telemetry-send -m "nightly export finished"
  telemetry-send -t metric --name rows_loaded --value 1200 --unit count
  telemetry-send -t progress --job job-7 --percent 40 --status loading
`.trim();

// =============================================================================
// Parsing
// =============================================================================

type Env = Readonly<Record<string, string | undefined>>;

function parseNumber(
  problems: string[],
  flag: string,
  raw: string | undefined,
  integer: boolean,
): number | undefined {
  if (raw === undefined) {
    return undefined;
  }

  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || (integer && !Number.isInteger(value))) {
    problems.push(`Invalid ${flag}: ${raw}`);
    return undefined;
  }
  return value;
}

function isRecordKind(value: string): value is RecordKind {
  return RECORD_KINDS.some((kind) => kind === value);
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({
      args: [...argv],
      options: {
        host: { type: 'string', short: 'H' },
        port: { type: 'string', short: 'p' },
        source: { type: 'string', short: 's' },
        type: { type: 'string', short: 't' },
        level: { type: 'string' },
        message: { type: 'string', short: 'm' },
        name: { type: 'string' },
        value: { type: 'string' },
        unit: { type: 'string' },
        job: { type: 'string' },
        percent: { type: 'string' },
        status: { type: 'string' },
        timeout: { type: 'string' },
        verbose: { type: 'boolean' },
        help: { type: 'boolean', short: 'h' },
        version: { type: 'boolean', short: 'v' },
      },
      strict: true,
      allowPositionals: false,
    }).values;
  } catch (err) {
    throw new CliUsageError([err instanceof Error ? err.message : String(err)]);
  }
}

function readEnv(problems: string[], env: Env): EnvConfig {
  try {
    return configFromEnv(env);
  } catch (err) {
    problems.push(err instanceof Error ? err.message : String(err));
    return { transport: {} };
  }
}

/**
 * Parses command line arguments.
 *
 * Environment variables supply defaults for the collector address, the
 * timeouts and the source name; flags override them.
 *
 * @throws {CliUsageError} If arguments are unknown or invalid
 */
export function parseCliArgs(argv: readonly string[], env: Env = {}): CliCommand {
  const values = readArgs(argv);

  if (values.help === true) {
    return { kind: 'help' };
  }
  if (values.version === true) {
    return { kind: 'version' };
  }

  const problems: string[] = [];
  const fromEnv = readEnv(problems, env);

  const host = values.host ?? fromEnv.transport.host ?? TRANSPORT_DEFAULTS.HOST;
  if (host.trim() === '') {
    problems.push('Host address cannot be empty');
  }

  const port = parseNumber(problems, 'port', values.port, true) ?? fromEnv.transport.port;
  if (port !== undefined && (port < 1 || port > 65535)) {
    problems.push(`Invalid port: ${port}. Must be between 1 and 65535.`);
  }

  const timeout = parseNumber(problems, 'timeout', values.timeout, true);
  if (timeout !== undefined && timeout < 1) {
    problems.push(`Invalid timeout: ${timeout}. Must be a positive number of milliseconds.`);
  }

  const kindRaw = values.type ?? 'event';
  const kind = isRecordKind(kindRaw) ? kindRaw : null;
  if (kind === null) {
    problems.push(`Invalid type: ${kindRaw}. Must be one of ${RECORD_KINDS.join(', ')}.`);
  }

  const levelRaw = values.level ?? 'info';
  const level = isLogLevel(levelRaw) ? levelRaw : null;
  if (level === null) {
    problems.push(`Invalid level: ${levelRaw}.`);
  }

  const value = parseNumber(problems, 'value', values.value, false);
  const percent = parseNumber(problems, 'percent', values.percent, false);

  if (kind === 'event' && values.message === undefined) {
    problems.push('An event needs --message');
  }
  if (kind === 'metric' && (values.name === undefined || values.value === undefined)) {
    problems.push('A metric needs --name and --value');
  }
  if (kind === 'progress' && (values.job === undefined || values.percent === undefined)) {
    problems.push('A progress record needs --job and --percent');
  }

  if (problems.length > 0 || kind === null || level === null) {
    throw new CliUsageError(problems);
  }

  return {
    kind: 'send',
    options: {
      source: values.source ?? fromEnv.source ?? 'telemetry-send',
      transport: {
        ...fromEnv.transport,
        host,
        port: port ?? TRANSPORT_DEFAULTS.PORT,
        ...(timeout !== undefined ? { connectTimeoutMs: timeout, writeTimeoutMs: timeout } : {}),
      },
      kind,
      level,
      message: values.message ?? '',
      name: values.name ?? '',
      value: value ?? 0,
      unit: values.unit ?? '',
      jobId: values.job ?? '',
      percent: percent ?? 0,
      status: values.status ?? 'running',
      verbose: values.verbose === true,
    },
  };
}

// =============================================================================
// Execution
// =============================================================================

function sendRecord(client: MonitoringClient, options: SendOptions): Promise<SendResult> {
  switch (options.kind) {
    case 'event':
      return client.logEvent(options.level, options.message);
    case 'metric':
      return client.logMetric(options.name, options.value, options.unit);
    case 'progress':
      return client.logProgress(options.jobId, options.percent, options.status);
    case 'resource':
      return client.logResource();
    case 'heartbeat':
      return client.heartbeat();
  }
}

/**
 * Sends one record as described by `options` and reports the outcome.
 *
 * @returns Process exit code: 0 when the record reached the collector
 */
export async function sendOnce(options: SendOptions, output: CliOutput): Promise<number> {
  const client = new MonitoringClient({ source: options.source, transport: options.transport });
  const transport = client.transport;

  if (options.verbose) {
    transport.on('connected', (host, port) => output.stderr(`connected to ${host}:${port}`));
    transport.on('connectFailed', (error) => output.stderr(`connect failed: ${error.message}`));
    transport.on('disconnected', (reason) => output.stderr(`disconnected: ${reason}`));
  }

  try {
    await transport.connect();
    const result = await sendRecord(client, options);
    const stats = client.getStats();

    output.stdout(
      `${result}: sent=${stats.messagesSent} buffered=${stats.messagesBuffered} dropped=${stats.messagesDropped}`,
    );
    return result === 'delivered' ? 0 : 1;
  } finally {
    await client.close();
  }
}

/**
 * Runs the CLI.
 *
 * @returns Process exit code
 */
export async function runCli(
  argv: readonly string[],
  output: CliOutput,
  env: Env = {},
): Promise<number> {
  let command: CliCommand;
  try {
    command = parseCliArgs(argv, env);
  } catch (err) {
    if (err instanceof CliUsageError) {
      for (const problem of err.problems) {
        output.stderr(`Error: ${problem}`);
      }
      output.stderr('Run with --help for usage.');
      return 2;
    }
    throw err;
  }

  switch (command.kind) {
    case 'help':
      output.stdout(HELP_TEXT);
      return 0;
    case 'version':
      output.stdout(`telemetry-send v${VERSION}`);
      return 0;
    case 'send':
      return sendOnce(command.options, output);
  }
}
