#!/usr/bin/env node
/**
 * telemetry-send - sends one telemetry record to a collector.
 *
 * @example
 * ```bash
 * # Log an event to the collector on localhost
 * telemetry-send -m "nightly export finished"
 *
 * # Report a metric to a collector on another host
 * telemetry-send --host 10.0.0.5 -t metric --name rows_loaded --value 1200
 * ```
 */

import { runCli } from '../cli/telemetry-send.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(
    process.argv.slice(2),
    {
      stdout: (line) => console.log(line),
      stderr: (line) => console.error(line),
    },
    process.env,
  );
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
