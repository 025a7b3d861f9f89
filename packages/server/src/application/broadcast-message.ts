/**
 * @file broadcast-message.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { SessionRegistry } from '../domain/ports/session-registry.js';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import type { Message } from '../domain/value-objects/message.js';

export interface BroadcastMessageDeps {
  sessionRegistry: SessionRegistry;
  logger: Logger;
}

/**
 * Use case fanning one message out to every registered session.
 *
 * Delivery is a non-blocking enqueue per session. A session whose queue
 * is full loses the message; the caller and the other sessions are not
 * held up by it.
 */
export class BroadcastMessageUseCase implements MessageBroadcaster {
  private readonly sessionRegistry: SessionRegistry;
  private readonly logger: Logger;

  constructor(deps: BroadcastMessageDeps) {
    this.sessionRegistry = deps.sessionRegistry;
    this.logger = deps.logger.child({ useCase: 'BroadcastMessage' });
  }

  broadcast(message: Message): void {
    let delivered = 0;
    let dropped = 0;

    this.sessionRegistry.forEach((session) => {
      try {
        if (session.deliver(message)) {
          delivered++;
          return;
        }
      } catch (error) {
        this.logger.error(
          { error, sessionId: session.id.value },
          'Unexpected error delivering message'
        );
      }

      dropped++;
      this.logger.warn(
        {
          sessionId: session.id.value,
          state: session.state,
          queued: session.queuedCount,
          droppedTotal: session.droppedCount,
        },
        'Message dropped for session'
      );
    });

    this.logger.debug(
      { author: message.author, delivered, dropped },
      'Message broadcast'
    );
  }
}
