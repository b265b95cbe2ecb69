/**
 * Process resource sampling for resource records.
 *
 * @module client/resource-usage
 */

const BYTES_PER_MB = 1024 * 1024;

/** Block size used by the kernel's filesystem I/O counters */
const FS_BLOCK_BYTES = 512;

/**
 * Resource figures of the current process.
 */
export interface ResourceSample {
  /** CPU time used since the previous sample, as a percentage of wall time */
  readonly cpuPercent: number;
  /** Resident set size in MB */
  readonly memoryMb: number;
  /** Filesystem I/O since process start in MB */
  readonly diskIoMb: number;
  /** Network I/O in MB. Node.js has no per-process counter, so this stays 0. */
  readonly networkIoMb: number;
}

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Samples CPU, memory and disk usage of the running process.
 *
 * CPU is measured between consecutive calls to `sample()`; the first
 * sample covers the time since the sampler was created.
 */
export class ResourceSampler {
  private lastCpu: NodeJS.CpuUsage;
  private lastAt: bigint;

  constructor() {
    this.lastCpu = process.cpuUsage();
    this.lastAt = process.hrtime.bigint();
  }

  sample(): ResourceSample {
    const now = process.hrtime.bigint();
    const cpu = process.cpuUsage(this.lastCpu);
    const elapsedMicros = Number(now - this.lastAt) / 1000;

    this.lastCpu = process.cpuUsage();
    this.lastAt = now;

    const cpuPercent = elapsedMicros > 0 ? ((cpu.user + cpu.system) / elapsedMicros) * 100 : 0;
    const usage = process.resourceUsage();

    return {
      cpuPercent: round2(cpuPercent),
      memoryMb: round2(process.memoryUsage().rss / BYTES_PER_MB),
      diskIoMb: round2(((usage.fsRead + usage.fsWrite) * FS_BLOCK_BYTES) / BYTES_PER_MB),
      networkIoMb: 0,
    };
  }
}
