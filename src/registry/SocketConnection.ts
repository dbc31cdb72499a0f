/**
 * Socket Connection
 *
 * Default connection state for registry entries. Local servers need no
 * transport; every other kind holds a TCP socket to HostAddress:Port.
 * Protocol handling on top of the socket belongs to the job layer.
 */

import net from 'net';
import type { ConnectionState, ServerConnection } from '../types/index.js';
import type { ServerConfiguration } from './ServerConfiguration.js';
import type { ConnectionFactory } from './ServerEntry.js';

export interface SocketConnectionOptions {
  /** Connect timeout in ms (default: 5000) */
  timeoutMs?: number;
}

export class SocketConnection implements ServerConnection {
  private socket: net.Socket | null = null;
  private pendingOpen: Promise<void> | null = null;
  private current: ConnectionState = 'closed';
  private readonly host: string;
  private readonly port: number;
  private readonly local: boolean;
  private readonly timeoutMs: number;

  constructor(configuration: ServerConfiguration, options: SocketConnectionOptions = {}) {
    this.host = configuration.hostAddress;
    this.port = configuration.port;
    this.local = configuration.connection === 'Local';
    this.timeoutMs = options.timeoutMs ?? 5000;
  }

  get state(): ConnectionState {
    return this.current;
  }

  /**
   * Open the connection. Calls made while a connect is pending share it.
   */
  async open(): Promise<void> {
    if (this.current === 'destroyed') {
      throw new Error(`Connection to ${this.host}:${this.port} was destroyed`);
    }
    if (this.pendingOpen) return this.pendingOpen;
    if (this.current !== 'closed') return;

    if (this.local) {
      this.current = 'open';
      return;
    }

    const pendingOpen = this.establish();
    this.pendingOpen = pendingOpen;
    try {
      await pendingOpen;
    } finally {
      if (this.pendingOpen === pendingOpen) this.pendingOpen = null;
    }
  }

  async close(): Promise<void> {
    if (this.current === 'destroyed' || this.current === 'closed') return;

    const socket = this.socket;
    this.socket = null;
    this.pendingOpen = null;
    this.current = 'closed';
    if (!socket || socket.destroyed) return;

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.end();
      // Don't wait on peers that never acknowledge the FIN
      socket.setTimeout(this.timeoutMs, () => socket.destroy());
    });
  }

  destroy(): void {
    if (this.current === 'destroyed') return;
    this.current = 'destroyed';
    this.pendingOpen = null;
    if (this.socket && !this.socket.destroyed) {
      this.socket.destroy();
    }
    this.socket = null;
  }

  private async establish(): Promise<void> {
    this.current = 'opening';
    try {
      const socket = await this.connect();
      // close() or destroy() may have run while the connect was pending
      if (this.current !== 'opening') {
        socket.destroy();
        return;
      }
      socket.once('close', () => {
        if (this.socket === socket) {
          this.socket = null;
          if (this.current === 'open') this.current = 'closed';
        }
      });
      this.socket = socket;
      this.current = 'open';
    } catch (err) {
      if (this.current === 'opening') this.current = 'closed';
      throw err;
    }
  }

  private connect(): Promise<net.Socket> {
    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      let settled = false;

      const settle = (error?: Error) => {
        if (settled) return;
        settled = true;
        if (error) {
          socket.destroy();
          reject(error);
        } else {
          socket.setTimeout(0);
          resolve(socket);
        }
      };

      socket.setTimeout(this.timeoutMs);
      socket.once('connect', () => settle());
      socket.once('timeout', () => settle(new Error(`Connection timeout: ${this.host}:${this.port}`)));
      socket.once('error', (err) => settle(err));

      try {
        socket.connect(this.port, this.host);
      } catch (err) {
        settle(err instanceof Error ? err : new Error(String(err)));
      }
    });
  }
}

export function socketConnectionFactory(options: SocketConnectionOptions = {}): ConnectionFactory {
  return (configuration) => new SocketConnection(configuration, options);
}
