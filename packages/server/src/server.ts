/**
 * @file server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Env } from './config/env.js';
import { CONNECTION_TIMING } from './config/constants.js';
import { createApp, type App } from './app.js';
import { InMemorySessionRegistry } from './infrastructure/persistence/in-memory-registry.js';
import { registerHealthRoute } from './infrastructure/http/health-route.js';
import { registerBroadcastRoute } from './infrastructure/http/broadcast-route.js';
import {
  ConnectionHandler,
  WebSocketServerWrapper,
} from './infrastructure/websocket/index.js';
import {
  AcceptConnectionUseCase,
  BroadcastMessageUseCase,
  TriggerBroadcastUseCase,
} from './application/index.js';
import { jsonMessageCodec } from './protocol/schemas.js';

export interface ServerOptions {
  env: Pick<
    Env,
    | 'PORT'
    | 'HOST'
    | 'WS_PATH'
    | 'TRUST_PROXY'
    | 'SESSION_QUEUE_CAPACITY'
    | 'MAX_CONSECUTIVE_READ_ERRORS'
    | 'HEARTBEAT_INTERVAL_MS'
  >;
  logger: Logger;
  version: string;
  generateSessionId: () => string;
}

export interface BroadcastServer {
  app: App;
  sessionRegistry: InMemorySessionRegistry;
  broadcaster: BroadcastMessageUseCase;
  wsServer: WebSocketServerWrapper;
  /** Starts listening; resolves with the bound HTTP address */
  listen(): Promise<string>;
  close(): Promise<void>;
}

/**
 * Wires registry, use cases, HTTP routes and the WebSocket endpoint into
 * one server. The registry is owned here and passed to everything that
 * needs it.
 */
export function createServer(options: ServerOptions): BroadcastServer {
  const { env, logger } = options;

  const sessionRegistry = new InMemorySessionRegistry();

  // Create use cases
  const broadcaster = new BroadcastMessageUseCase({
    sessionRegistry,
    logger,
  });

  const acceptConnection = new AcceptConnectionUseCase({
    sessionRegistry,
    broadcaster,
    codec: jsonMessageCodec,
    generateSessionId: options.generateSessionId,
    queueCapacity: env.SESSION_QUEUE_CAPACITY,
    maxConsecutiveReadErrors: env.MAX_CONSECUTIVE_READ_ERRORS,
    logger,
  });

  const triggerBroadcast = new TriggerBroadcastUseCase({
    broadcaster,
    logger,
  });

  // Create Fastify app
  const app = createApp({ env, logger });

  registerHealthRoute(app, { version: options.version }, { sessionRegistry });
  registerBroadcastRoute(app, { triggerBroadcast });

  // Create WebSocket server
  const connectionHandler = new ConnectionHandler({ acceptConnection, logger });
  const wsServer = new WebSocketServerWrapper(
    {
      path: env.WS_PATH,
      heartbeatIntervalMs: env.HEARTBEAT_INTERVAL_MS,
    },
    { connectionHandler, logger }
  );

  return {
    app,
    sessionRegistry,
    broadcaster,
    wsServer,

    async listen(): Promise<string> {
      const address = await app.listen({ port: env.PORT, host: env.HOST });

      // Attach WebSocket server to HTTP server
      wsServer.attach(app.server);

      logger.info({ address, wsPath: env.WS_PATH }, 'Listening');
      return address;
    },

    async close(): Promise<void> {
      // Close WebSocket server first so sessions wind down
      await wsServer.close(CONNECTION_TIMING.WS_CLOSE_TIMEOUT_MS);
      await app.close();
    },
  };
}
