/**
 * In-process collector for transport tests.
 *
 * Listens on 127.0.0.1 and records everything written to it as text.
 */

import * as net from 'node:net';

export class TestCollector {
  private readonly sockets = new Set<net.Socket>();
  private received = '';
  private connectionCount = 0;
  private stalled = false;

  private constructor(private readonly server: net.Server) {
    server.on('connection', (socket) => {
      this.connectionCount++;
      this.sockets.add(socket);
      socket.on('close', () => {
        this.sockets.delete(socket);
      });
      socket.on('error', () => undefined);

      if (this.stalled) {
        // Never read, so the client's writes back up once kernel buffers fill
        socket.pause();
        return;
      }
      socket.on('data', (chunk: Buffer) => {
        this.received += chunk.toString('utf8');
      });
    });
  }

  /**
   * Starts a collector. Port 0 picks an ephemeral port.
   */
  static start(port = 0): Promise<TestCollector> {
    const server = net.createServer();
    const collector = new TestCollector(server);

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, '127.0.0.1', () => {
        server.off('error', reject);
        resolve(collector);
      });
    });
  }

  get port(): number {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Collector is not listening');
    }
    return address.port;
  }

  get connections(): number {
    return this.connectionCount;
  }

  /**
   * Complete newline-terminated lines received so far.
   */
  lines(): string[] {
    return this.received.split('\n').slice(0, -1);
  }

  waitForLines(count: number, timeoutMs = 2000): Promise<string[]> {
    return waitUntil(
      () => (this.lines().length >= count ? this.lines() : null),
      timeoutMs,
      `Timeout waiting for ${count} lines`,
    );
  }

  waitForConnections(count: number, timeoutMs = 2000): Promise<number> {
    return waitUntil(
      () => (this.connectionCount >= count ? this.connectionCount : null),
      timeoutMs,
      `Timeout waiting for ${count} connections`,
    );
  }

  /**
   * Connections accepted from now on are never read from.
   */
  stall(): void {
    this.stalled = true;
  }

  /**
   * Connections accepted from now on are read again. Stalled ones stay stalled.
   */
  resume(): void {
    this.stalled = false;
  }

  /**
   * Destroys every open client connection while the server keeps listening.
   */
  dropConnections(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
    this.sockets.clear();
  }

  stop(): Promise<void> {
    this.dropConnections();
    return new Promise((resolve) => {
      this.server.close(() => resolve());
    });
  }
}

function waitUntil<T>(check: () => T | null, timeoutMs: number, message: string): Promise<T> {
  return new Promise((resolve, reject) => {
    const start = Date.now();
    const poll = () => {
      const value = check();
      if (value !== null) {
        resolve(value);
      } else if (Date.now() - start > timeoutMs) {
        reject(new Error(message));
      } else {
        setTimeout(poll, 10);
      }
    };
    poll();
  });
}

/**
 * Returns a port nothing listens on: one that was just bound and released.
 */
export async function unusedPort(): Promise<number> {
  const collector = await TestCollector.start();
  const port = collector.port;
  await collector.stop();
  return port;
}

/**
 * A clock that only moves when told to.
 */
export class ManualClock {
  constructor(private time = 0) {}

  readonly now = (): number => this.time;

  advance(ms: number): void {
    this.time += ms;
  }
}
