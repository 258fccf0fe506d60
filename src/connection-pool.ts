/**
 * WebSocket connection pool
 *
 * Admission limit plus ping/pong heartbeat for client sockets. A socket that
 * misses a pong is terminated, which fires its `close` handler and so tears
 * down the recognition session bound to it.
 */

import { WebSocket } from 'ws';
import { createLogger, errorMessage, type Logger } from './utils/logger';

export interface PoolOptions {
  maxConnections: number;
  heartbeatInterval: number; // ms
}

export interface ConnectionMetadata {
  origin: string;
  userAgent: string;
  ip: string;
}

interface PooledConnection {
  ws: WebSocket;
  isAlive: boolean;
}

export interface PoolStats {
  poolSize: number;
  maxPoolSize: number;
  totalConnections: number;
  rejectedConnections: number;
  droppedByHeartbeat: number;
  utilizationPercent: number;
}

export class ConnectionPool {
  private connections = new Map<string, PooledConnection>();
  private heartbeatTimer: NodeJS.Timeout | null = null;
  private connectionCounter = 0;
  private totalConnections = 0;
  private rejectedConnections = 0;
  private droppedByHeartbeat = 0;
  private readonly options: PoolOptions;
  private readonly log: Logger;

  constructor(options: Partial<PoolOptions> = {}, logger?: Logger) {
    this.options = {
      maxConnections: 100,
      heartbeatInterval: 30000,
      ...options,
    };
    this.log = logger ?? createLogger('ConnectionPool');
  }

  /**
   * Registers a socket; returns its connection id, or null when the pool is full.
   */
  addConnection(ws: WebSocket, metadata: ConnectionMetadata): string | null {
    if (this.connections.size >= this.options.maxConnections) {
      this.log.warn(`Max connections reached (${this.options.maxConnections}), rejecting new connection`);
      this.rejectedConnections++;
      return null;
    }

    const id = `conn_${++this.connectionCounter}_${Date.now()}`;
    const connection: PooledConnection = { ws, isAlive: true };
    this.connections.set(id, connection);
    this.totalConnections++;

    ws.on('pong', () => {
      connection.isAlive = true;
    });
    ws.on('close', () => this.removeConnection(id));

    this.log.debug(
      `Added connection ${id} from ${metadata.ip} (origin ${metadata.origin}, ${metadata.userAgent})`
        + ` (${this.connections.size}/${this.options.maxConnections})`,
    );
    return id;
  }

  private removeConnection(id: string): void {
    if (!this.connections.delete(id)) return;
    this.log.debug(`Removed connection ${id} (${this.connections.size} remaining)`);
  }

  startHeartbeat(): void {
    if (this.heartbeatTimer) return;
    this.heartbeatTimer = setInterval(() => this.performHeartbeat(), this.options.heartbeatInterval);
    this.heartbeatTimer.unref();
    this.log.debug(`Started heartbeat monitoring (${this.options.heartbeatInterval}ms interval)`);
  }

  /**
   * Terminates sockets that did not answer the previous ping, then pings the rest.
   */
  private performHeartbeat(): void {
    for (const [id, connection] of this.connections) {
      if (!connection.isAlive || connection.ws.readyState !== WebSocket.OPEN) {
        this.log.warn(`Connection ${id} failed heartbeat, terminating`);
        this.droppedByHeartbeat++;
        connection.ws.terminate();
        this.removeConnection(id);
        continue;
      }
      connection.isAlive = false;
      try {
        connection.ws.ping();
      } catch (e: unknown) {
        this.log.error(`Failed to ping ${id}:`, errorMessage(e));
        connection.ws.terminate();
        this.removeConnection(id);
      }
    }
  }

  /**
   * Stops the heartbeat and closes every socket with 1001.
   */
  shutdown(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
    if (this.connections.size > 0) {
      this.log.info(`Shutting down with ${this.connections.size} active connections`);
    }
    for (const [id, connection] of this.connections) {
      try {
        if (connection.ws.readyState === WebSocket.OPEN) {
          connection.ws.close(1001, 'Server shutting down');
        }
      } catch (e: unknown) {
        this.log.error(`Error closing connection ${id} during shutdown:`, errorMessage(e));
      }
    }
    this.connections.clear();
  }

  getStats(): PoolStats {
    return {
      poolSize: this.connections.size,
      maxPoolSize: this.options.maxConnections,
      totalConnections: this.totalConnections,
      rejectedConnections: this.rejectedConnections,
      droppedByHeartbeat: this.droppedByHeartbeat,
      utilizationPercent: (this.connections.size / this.options.maxConnections) * 100,
    };
  }
}
