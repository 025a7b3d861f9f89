/**
 * @file message-broadcaster.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Message } from '../value-objects/message.js';

/**
 * Port for fanning a message out to every live session.
 */
export interface MessageBroadcaster {
  /**
   * Offers the message to every registered session without waiting on any
   * of them. Delivery is best-effort: a session whose queue is full misses it.
   */
  broadcast(message: Message): void;
}
