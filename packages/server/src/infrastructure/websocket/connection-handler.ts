/**
 * @file connection-handler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { IncomingMessage } from 'http';
import type { WebSocket } from 'ws';
import type { Logger } from 'pino';
import type { AcceptConnectionUseCase } from '../../application/accept-connection.js';
import { WsConnection } from './ws-connection.js';

export interface ConnectionHandlerDeps {
  acceptConnection: AcceptConnectionUseCase;
  logger: Logger;
}

/**
 * Hands each accepted WebSocket to the accept-connection use case and
 * keeps the session's outcome from escaping into the server's event loop.
 */
export class ConnectionHandler {
  private readonly deps: ConnectionHandlerDeps;
  private readonly logger: Logger;

  constructor(deps: ConnectionHandlerDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'ConnectionHandler' });
  }

  /**
   * Starts a session for a new WebSocket connection.
   */
  handleConnection(socket: WebSocket, request?: IncomingMessage): void {
    const remoteAddress = request?.socket.remoteAddress;
    const connection = new WsConnection(socket, remoteAddress);

    void this.deps.acceptConnection.execute(connection).catch((error: unknown) => {
      this.logger.warn({ error, remoteAddress }, 'Session ended with error');
    });
  }
}
