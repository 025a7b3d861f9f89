/**
 * @file in-memory-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Session } from '../../domain/entities/session.js';
import type { SessionRegistry } from '../../domain/ports/session-registry.js';

/**
 * In-memory implementation of SessionRegistry.
 * Stores sessions in a Map indexed by session ID; Map order gives a
 * deterministic registration-order iteration.
 */
export class InMemorySessionRegistry implements SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  add(session: Session): void {
    if (this.sessions.has(session.id.value)) {
      return;
    }
    this.sessions.set(session.id.value, session);
  }

  remove(session: Session): boolean {
    // Only drop the entry if it is this exact session
    if (this.sessions.get(session.id.value) !== session) {
      return false;
    }
    return this.sessions.delete(session.id.value);
  }

  has(session: Session): boolean {
    return this.sessions.get(session.id.value) === session;
  }

  /**
   * Iterates a snapshot, so callbacks may add or remove sessions freely.
   */
  forEach(fn: (session: Session) => void): void {
    for (const session of this.getAll()) {
      fn(session);
    }
  }

  getAll(): Session[] {
    return Array.from(this.sessions.values());
  }

  count(): number {
    return this.sessions.size;
  }
}
