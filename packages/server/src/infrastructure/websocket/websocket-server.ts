/**
 * @file websocket-server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { WebSocketServer as WSServer, type WebSocket } from 'ws';
import type { IncomingMessage, Server } from 'http';
import type { Logger } from 'pino';
import type { ConnectionHandler } from './connection-handler.js';
import { WEBSOCKET_CONFIG } from '../../config/constants.js';

export interface WebSocketServerConfig {
  path: string;
  /** Interval between pings; 0 disables the heartbeat */
  heartbeatIntervalMs: number;
  maxPayloadBytes?: number;
}

export interface WebSocketServerDeps {
  connectionHandler: ConnectionHandler;
  logger: Logger;
}

/**
 * WebSocket server wrapper that integrates with the HTTP server
 * and manages the WebSocket lifecycle.
 */
export class WebSocketServerWrapper {
  private wss: WSServer | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private readonly alive = new WeakSet<WebSocket>();
  private readonly config: WebSocketServerConfig;
  private readonly deps: WebSocketServerDeps;
  private readonly logger: Logger;

  constructor(config: WebSocketServerConfig, deps: WebSocketServerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'WebSocketServer' });
  }

  /**
   * Attaches the WebSocket server to an HTTP server.
   */
  attach(httpServer: Server): void {
    this.wss = new WSServer({
      server: httpServer,
      path: this.config.path,
      maxPayload: this.config.maxPayloadBytes ?? WEBSOCKET_CONFIG.MAX_PAYLOAD_BYTES,
    });

    this.wss.on('connection', (socket: WebSocket, request: IncomingMessage) => {
      this.logger.debug('New WebSocket connection');

      this.alive.add(socket);
      socket.on('pong', () => {
        this.alive.add(socket);
      });

      this.deps.connectionHandler.handleConnection(socket, request);
    });

    this.wss.on('error', (error) => {
      this.logger.error({ error }, 'WebSocket server error');
    });

    this.startHeartbeat();

    this.logger.info(
      { path: this.config.path },
      'WebSocket server attached'
    );
  }

  /**
   * Pings every socket periodically; a socket that has not answered the
   * previous ping is terminated, which ends its session.
   */
  private startHeartbeat(): void {
    if (this.config.heartbeatIntervalMs <= 0) {
      return;
    }

    this.heartbeatInterval = setInterval(() => {
      this.wss?.clients.forEach((client) => {
        if (!this.alive.has(client)) {
          this.logger.warn('Terminating unresponsive WebSocket');
          client.terminate();
          return;
        }

        this.alive.delete(client);
        try {
          client.ping();
        } catch (error) {
          this.logger.debug({ error }, 'Ping failed');
        }
      });
    }, this.config.heartbeatIntervalMs);
    this.heartbeatInterval.unref();
  }

  /**
   * Closes the WebSocket server gracefully with timeout.
   * @param timeoutMs - Maximum time to wait for graceful close (default: 5000ms)
   */
  async close(timeoutMs = 5000): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    const clientCount = wss.clients.size;
    this.logger.info({ clientCount }, 'Closing WebSocket server');

    // Send close frame to all clients
    wss.clients.forEach((client) => {
      try {
        client.close(WEBSOCKET_CONFIG.GOING_AWAY_CODE, 'Server shutting down');
      } catch (error) {
        this.logger.debug({ error }, 'Failed to send close frame');
      }
    });

    let timer: NodeJS.Timeout | undefined;

    // Wait for graceful close with timeout
    const closePromise = new Promise<void>((resolve, reject) => {
      wss.close((err) => {
        if (err) {
          this.logger.error({ error: err }, 'Error closing WebSocket server');
          reject(err);
        } else {
          this.logger.info('WebSocket server closed gracefully');
          resolve();
        }
      });
    });

    const timeoutPromise = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn(
          { timeoutMs, remainingClients: wss.clients.size },
          'WebSocket graceful close timed out, forcing termination'
        );

        // Force terminate all remaining connections
        wss.clients.forEach((client) => {
          client.terminate();
        });

        resolve();
      }, timeoutMs);
    });

    // Race between graceful close and timeout
    try {
      await Promise.race([closePromise, timeoutPromise]);
    } finally {
      clearTimeout(timer);
    }
  }
}
