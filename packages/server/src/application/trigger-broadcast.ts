/**
 * @file trigger-broadcast.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { MessageBroadcaster } from '../domain/ports/message-broadcaster.js';
import { Message } from '../domain/value-objects/message.js';
import { InvalidPayloadError } from '../domain/errors/domain-errors.js';
import { SERVER_AUTHOR } from '../config/constants.js';

export interface TriggerBroadcastDeps {
  broadcaster: MessageBroadcaster;
  logger: Logger;
}

/**
 * Use case for broadcasting a server-authored message on request from
 * outside any session.
 */
export class TriggerBroadcastUseCase {
  private readonly broadcaster: MessageBroadcaster;
  private readonly logger: Logger;

  constructor(deps: TriggerBroadcastDeps) {
    this.broadcaster = deps.broadcaster;
    this.logger = deps.logger.child({ useCase: 'TriggerBroadcast' });
  }

  /**
   * Broadcasts `text` as a message from the server.
   * Returns the message that was broadcast.
   */
  execute(text: string | undefined): Message {
    if (text === undefined || text.length === 0) {
      throw new InvalidPayloadError('Missing message text');
    }

    const message = Message.create({ author: SERVER_AUTHOR, body: text });
    this.broadcaster.broadcast(message);

    this.logger.info({ length: text.length }, 'Server message broadcast');
    return message;
  }
}
