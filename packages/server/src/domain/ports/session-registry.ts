/**
 * @file session-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Session } from '../entities/session.js';

/**
 * Port (interface) for the set of live sessions.
 * Membership changes may interleave with fan-out; forEach must visit
 * every session that was a member when it was called.
 */
export interface SessionRegistry {
  /**
   * Adds a session. Adding a member again has no effect.
   */
  add(session: Session): void;

  /**
   * Removes a session. Returns false if it was not a member.
   */
  remove(session: Session): boolean;

  /**
   * Checks whether a session is a member.
   */
  has(session: Session): boolean;

  /**
   * Calls fn for every member present at call time, in registration order.
   */
  forEach(fn: (session: Session) => void): void;

  /**
   * Returns a snapshot of all members.
   */
  getAll(): Session[];

  /**
   * Returns the number of members.
   */
  count(): number;
}
