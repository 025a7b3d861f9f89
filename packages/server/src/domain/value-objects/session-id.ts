/**
 * @file session-id.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { SESSION_LIMITS } from '../../config/constants.js';

// nanoid's default alphabet
const URL_SAFE_ID = /^[A-Za-z0-9_-]+$/;

/**
 * Identifier of one live client session: the registry key and the
 * `sessionId` binding of every log line about the session.
 */
export class SessionId {
  private readonly _value: string;

  private constructor(value: string) {
    this._value = value;
  }

  get value(): string {
    return this._value;
  }

  /**
   * Wraps an existing id. It must be non-empty and URL-safe so it can
   * appear unescaped in logs and URLs.
   */
  static create(value: string): SessionId {
    if (value.length === 0) {
      throw new Error('SessionId cannot be empty');
    }
    if (!URL_SAFE_ID.test(value)) {
      throw new Error(`SessionId must use the URL-safe alphabet: "${value}"`);
    }
    return new SessionId(value);
  }

  /**
   * Draws a fresh id from the generator (nanoid in production) and checks
   * it has the configured length.
   */
  static generate(
    generator: () => string,
    length: number = SESSION_LIMITS.SESSION_ID_LENGTH
  ): SessionId {
    const value = generator();
    if (value.length !== length) {
      throw new Error(`Generated SessionId must be ${length} characters, got ${value.length}`);
    }
    return SessionId.create(value);
  }
}
