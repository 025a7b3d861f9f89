/**
 * @file accept-connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Logger } from 'pino';
import { Session } from '../domain/entities/session.js';
import { Message } from '../domain/value-objects/message.js';
import { SessionId } from '../domain/value-objects/session-id.js';
import type { Connection } from '../domain/ports/connection.js';
import type { SessionRegistry } from '../domain/ports/session-registry.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import type { MessageCodec } from '../domain/ports/message-codec.js';
import { GREETING } from '../config/constants.js';

export interface AcceptConnectionDeps {
  sessionRegistry: SessionRegistry;
  broadcaster: MessageBroadcaster;
  codec: MessageCodec;
  generateSessionId: () => string;
  queueCapacity: number;
  maxConsecutiveReadErrors: number;
  logger: Logger;
}

/**
 * Use case for a freshly accepted client connection.
 *
 * Registers a session for it, greets the client directly, then runs the
 * session until the client goes away. The connection is released on
 * every exit path.
 */
export class AcceptConnectionUseCase {
  private readonly deps: AcceptConnectionDeps;
  private readonly logger: Logger;

  constructor(deps: AcceptConnectionDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ useCase: 'AcceptConnection' });
  }

  /**
   * Resolves when the session has ended. Rejects only if the greeting or
   * the session itself failed; the connection is closed either way.
   */
  async execute(connection: Connection): Promise<void> {
    const session = new Session({
      id: SessionId.generate(this.deps.generateSessionId),
      connection,
      registry: this.deps.sessionRegistry,
      broadcaster: this.deps.broadcaster,
      codec: this.deps.codec,
      queueCapacity: this.deps.queueCapacity,
      maxConsecutiveReadErrors: this.deps.maxConsecutiveReadErrors,
      logger: this.deps.logger,
    });

    this.deps.sessionRegistry.add(session);
    this.logger.info(
      {
        sessionId: session.id.value,
        remoteAddress: connection.remoteAddress,
        sessions: this.deps.sessionRegistry.count(),
      },
      'Client connected'
    );

    try {
      await session.sendDirect(Message.create(GREETING));
      await session.run();
    } finally {
      session.close();
      this.logger.info(
        {
          sessionId: session.id.value,
          sessions: this.deps.sessionRegistry.count(),
        },
        'Client disconnected'
      );
    }
  }
}
