/**
 * Owns the single outbound TCP connection to the collector.
 *
 * Provides:
 * - Throttled, idempotent connection establishment
 * - Exponential backoff between failed attempts
 * - Whole-payload writes bounded by a timeout
 *
 * There is no reconnect timer. A new attempt is made only when a caller
 * asks for one and the current backoff delay has elapsed.
 *
 * @module transport/connection-manager
 */

import * as net from 'node:net';
import { EventEmitter } from 'node:events';

import { BackoffPolicy } from './backoff.js';
import { ConnectionFailedError, WriteFailedError } from './types.js';

// =============================================================================
// Types
// =============================================================================

/**
 * State of the underlying socket.
 */
export type SocketState = 'disconnected' | 'connecting' | 'connected';

/**
 * Configuration for a ConnectionManager.
 */
export interface ConnectionManagerConfig {
  readonly host: string;
  readonly port: number;
  readonly backoff: BackoffPolicy;
  readonly connectTimeoutMs: number;
  readonly writeTimeoutMs: number;
  readonly clock: () => number;
}

/**
 * Events emitted by ConnectionManager.
 */
export interface ConnectionManagerEvents {
  /** Emitted when a connect attempt succeeds */
  connected: [];

  /** Emitted when an established connection is lost */
  disconnected: [reason: string];

  /** Emitted when a connect attempt fails */
  connectFailed: [error: ConnectionFailedError, nextDelayMs: number];
}

// =============================================================================
// ConnectionManager Class
// =============================================================================

/**
 * Manages the TCP connection used by a Transport.
 *
 * Exactly one socket is owned at a time. Failures never throw: they leave
 * the manager disconnected and lengthen the delay before the next attempt.
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager({
 *   host: '127.0.0.1',
 *   port: 17000,
 *   backoff: new BackoffPolicy({ floorMs: 1000, ceilingMs: 30000 }),
 *   connectTimeoutMs: 5000,
 *   writeTimeoutMs: 5000,
 *   clock: Date.now,
 * });
 *
 * if (await manager.ensureConnected()) {
 *   await manager.sendRaw(Buffer.from('{"type":"event"}\n'));
 * }
 * ```
 */
export class ConnectionManager extends EventEmitter<ConnectionManagerEvents> {
  private socket: net.Socket | null = null;
  private state: SocketState = 'disconnected';

  private readonly config: ConnectionManagerConfig;

  private currentDelayMs: number;
  private waitMs: number;
  private lastAttemptAt: number | null = null;

  private reconnectCount = 0;
  private connectedAt: number | null = null;

  constructor(config: ConnectionManagerConfig) {
    super();

    this.config = config;
    this.currentDelayMs = config.backoff.initial();
    this.waitMs = this.currentDelayMs;
  }

  getState(): SocketState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.socket !== null;
  }

  /**
   * Returns the backoff delay that currently throttles attempts.
   */
  getCurrentDelay(): number {
    return this.currentDelayMs;
  }

  getReconnectCount(): number {
    return this.reconnectCount;
  }

  getConnectedAt(): number | null {
    return this.connectedAt;
  }

  /**
   * Makes sure a connection is open, attempting one if the backoff allows.
   *
   * Returns immediately with `true` when already connected and with `false`
   * when the last attempt was too recent. Otherwise performs exactly one
   * connect attempt.
   *
   * @returns Whether a connection is open afterwards
   */
  async ensureConnected(): Promise<boolean> {
    if (this.isConnected()) {
      return true;
    }

    const now = this.config.clock();
    if (this.lastAttemptAt !== null && now - this.lastAttemptAt < this.waitMs) {
      return false;
    }
    this.lastAttemptAt = now;

    this.releaseSocket();

    try {
      const socket = await this.openSocket();
      this.adopt(socket);
      return true;
    } catch (err) {
      const cause = err instanceof Error ? err : new Error(String(err));
      const error =
        cause instanceof ConnectionFailedError
          ? cause
          : new ConnectionFailedError(this.config.host, this.config.port, cause);

      this.state = 'disconnected';
      this.currentDelayMs = this.config.backoff.nextDelay(this.currentDelayMs);
      this.waitMs = this.config.backoff.waitFor(this.currentDelayMs);
      this.emit('connectFailed', error, this.waitMs);
      return false;
    }
  }

  /**
   * Writes a whole payload to the open socket.
   *
   * Any error, or a write the socket does not accept within the write
   * timeout, closes the connection.
   *
   * @returns Whether the payload was written
   */
  sendRaw(payload: Buffer): Promise<boolean> {
    const socket = this.socket;
    if (this.state !== 'connected' || socket === null) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const finish = (error: WriteFailedError | null) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);

        if (error) {
          if (this.socket === socket) {
            this.handleDisconnect(error.message);
          }
          resolve(false);
          return;
        }
        resolve(true);
      };

      const timer = setTimeout(() => {
        finish(
          new WriteFailedError(
            payload.length,
            new Error(`not accepted within ${this.config.writeTimeoutMs}ms`),
          ),
        );
      }, this.config.writeTimeoutMs);

      try {
        socket.write(payload, (err) => {
          finish(err ? new WriteFailedError(payload.length, err) : null);
        });
      } catch (err) {
        finish(new WriteFailedError(payload.length, err instanceof Error ? err : undefined));
      }
    });
  }

  /**
   * Closes the connection gracefully.
   *
   * Does not emit `disconnected`. The socket is destroyed if the peer does
   * not acknowledge the close within the write timeout.
   */
  close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    this.state = 'disconnected';
    this.connectedAt = null;

    if (socket === null) {
      return Promise.resolve();
    }

    socket.removeAllListeners();
    // Late errors from the closing socket are irrelevant
    socket.on('error', () => undefined);

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        socket.destroy();
        resolve();
      }, this.config.writeTimeoutMs);

      socket.end(() => {
        clearTimeout(timer);
        socket.destroy();
        resolve();
      });
    });
  }

  /**
   * Destroys the connection immediately.
   */
  destroy(): void {
    this.releaseSocket();
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private openSocket(): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      this.state = 'connecting';
      let settled = false;

      const { host, port } = this.config;
      const socket = new net.Socket();

      const connectTimer = setTimeout(() => {
        if (settled) return;
        settled = true;
        cleanup();
        socket.destroy();
        reject(
          new ConnectionFailedError(
            host,
            port,
            new Error(`timed out after ${this.config.connectTimeoutMs}ms`),
          ),
        );
      }, this.config.connectTimeoutMs);

      const cleanup = () => {
        clearTimeout(connectTimer);
        socket.removeListener('connect', onConnect);
        socket.removeListener('error', onError);
      };

      const onConnect = () => {
        if (settled) return;
        settled = true;
        cleanup();
        resolve(socket);
      };

      const onError = (err: Error) => {
        if (settled) return;
        settled = true;
        cleanup();
        socket.destroy();
        reject(new ConnectionFailedError(host, port, err));
      };

      socket.once('connect', onConnect);
      socket.on('error', onError);

      socket.connect(port, host);
    });
  }

  private adopt(socket: net.Socket): void {
    this.socket = socket;
    this.state = 'connected';
    this.connectedAt = this.config.clock();
    this.currentDelayMs = this.config.backoff.onSuccess();
    this.waitMs = this.currentDelayMs;
    this.reconnectCount++;

    socket.on('close', () => {
      if (this.socket === socket) {
        this.handleDisconnect('socket closed');
      }
    });
    // Errors are followed by 'close', which handles the disconnect
    socket.on('error', () => undefined);
    // Nothing is expected from the collector
    socket.on('data', () => undefined);

    socket.setNoDelay(true);
    socket.setKeepAlive(true, 30000);

    this.emit('connected');
  }

  private handleDisconnect(reason: string): void {
    if (this.state !== 'connected') {
      return;
    }

    this.releaseSocket();
    this.emit('disconnected', reason);
  }

  private releaseSocket(): void {
    if (this.socket) {
      this.socket.removeAllListeners();
      this.socket.on('error', () => undefined);
      this.socket.destroy();
      this.socket = null;
    }

    this.state = 'disconnected';
    this.connectedAt = null;
  }
}
