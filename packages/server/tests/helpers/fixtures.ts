/**
 * @file fixtures.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import pino, { type Logger } from 'pino';
import {
  Session,
  SessionId,
  type MessageBroadcaster,
  type SessionRegistry,
} from '../../src/domain/index.js';
import { InMemorySessionRegistry } from '../../src/infrastructure/persistence/in-memory-registry.js';
import { jsonMessageCodec } from '../../src/protocol/index.js';
import { SESSION_LIMITS } from '../../src/config/constants.js';
import { FakeConnection } from './fake-connection.js';

export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Returns a generator yielding "session-0001", "session-0002", ...
 * padded to the length SessionId.generate expects.
 */
export function sequentialIds(prefix = 'session'): () => string {
  let next = 0;
  const width = SESSION_LIMITS.SESSION_ID_LENGTH - prefix.length - 1;
  return () => `${prefix}-${String(++next).padStart(width, '0')}`;
}

export interface TestSessionOptions {
  id?: string;
  connection?: FakeConnection;
  registry?: SessionRegistry;
  broadcaster?: MessageBroadcaster;
  queueCapacity?: number;
  maxConsecutiveReadErrors?: number;
}

/**
 * Builds a session over a FakeConnection. Nothing is registered or run.
 */
export function createTestSession(options: TestSessionOptions = {}): {
  session: Session;
  connection: FakeConnection;
} {
  const connection = options.connection ?? new FakeConnection();
  const session = new Session({
    id: SessionId.create(options.id ?? 'session-1'),
    connection,
    registry: options.registry ?? new InMemorySessionRegistry(),
    broadcaster: options.broadcaster ?? { broadcast: () => undefined },
    codec: jsonMessageCodec,
    logger: silentLogger(),
    queueCapacity: options.queueCapacity ?? 100,
    maxConsecutiveReadErrors: options.maxConsecutiveReadErrors ?? 5,
  });
  return { session, connection };
}
