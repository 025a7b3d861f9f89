/**
 * @file session.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection, ReceiveResult } from '../ports/connection.js';
import type { SessionRegistry } from '../ports/session-registry.js';
import type { MessageBroadcaster } from '../ports/message-broadcaster.js';
import type { MessageCodec } from '../ports/message-codec.js';
import type { Message } from '../value-objects/message.js';
import type { SessionId } from '../value-objects/session-id.js';
import { SessionClosedError } from '../errors/domain-errors.js';
import { BoundedQueue } from '../../utils/bounded-queue.js';

/**
 * Lifecycle of a session:
 * active → terminating (first termination trigger, from either loop or
 * from outside) → closed (loops finished, registry entry and connection
 * released).
 */
export type SessionState = 'active' | 'terminating' | 'closed';

export interface SessionProps {
  id: SessionId;
  connection: Connection;
  registry: SessionRegistry;
  broadcaster: MessageBroadcaster;
  codec: MessageCodec;
  logger: Logger;
  queueCapacity: number;
  maxConsecutiveReadErrors: number;
}

/**
 * Entity representing one connected client.
 *
 * Owns the client's connection and an outbound queue. run() drives two
 * loops: the write loop drains the queue onto the connection, the read
 * loop hands every decoded inbound message to the broadcaster. Either
 * loop ending terminates the other through a shared abort signal.
 */
export class Session {
  private readonly _id: SessionId;
  private readonly connection: Connection;
  private readonly registry: SessionRegistry;
  private readonly broadcaster: MessageBroadcaster;
  private readonly codec: MessageCodec;
  private readonly logger: Logger;
  private readonly queue: BoundedQueue<Message>;
  private readonly termination = new AbortController();
  private readonly maxConsecutiveReadErrors: number;
  private readonly _connectedAt: Date;
  private _state: SessionState = 'active';
  private _droppedCount = 0;
  private started = false;

  constructor(props: SessionProps) {
    this._id = props.id;
    this.connection = props.connection;
    this.registry = props.registry;
    this.broadcaster = props.broadcaster;
    this.codec = props.codec;
    this.queue = new BoundedQueue<Message>(props.queueCapacity);
    this.maxConsecutiveReadErrors = props.maxConsecutiveReadErrors;
    this._connectedAt = new Date();
    this.logger = props.logger.child({
      component: 'Session',
      sessionId: props.id.value,
    });
  }

  get id(): SessionId {
    return this._id;
  }

  get state(): SessionState {
    return this._state;
  }

  get isActive(): boolean {
    return this._state === 'active';
  }

  get connectedAt(): Date {
    return this._connectedAt;
  }

  /**
   * Messages waiting for the write loop.
   */
  get queuedCount(): number {
    return this.queue.size;
  }

  /**
   * Deliveries refused, because the queue was full or the session was no
   * longer active.
   */
  get droppedCount(): number {
    return this._droppedCount;
  }

  /**
   * Offers a message to the outbound queue without waiting.
   * Returns false if the queue is full or the session is shutting down.
   */
  deliver(message: Message): boolean {
    if (!this.isActive || !this.queue.offer(message)) {
      this._droppedCount++;
      return false;
    }

    return true;
  }

  /**
   * Writes a message straight to the connection, bypassing the queue.
   * Only meaningful before run() starts the write loop.
   */
  async sendDirect(message: Message): Promise<void> {
    if (this._state === 'closed') {
      throw new SessionClosedError(this._id.value);
    }
    await this.connection.send(this.codec.encode(message));
  }

  /**
   * Runs both loops and resolves once both have ended and the session
   * has been released.
   */
  async run(): Promise<void> {
    if (!this.isActive) {
      throw new SessionClosedError(this._id.value);
    }
    if (this.started) {
      throw new Error(`Session is already running: ${this._id.value}`);
    }
    this.started = true;

    this.logger.info(
      { remoteAddress: this.connection.remoteAddress },
      'Session started'
    );

    const writer = this.writeLoop();
    try {
      await this.readLoop();
    } finally {
      this.terminate('read loop ended');
      await writer;
      this.close();
    }
  }

  /**
   * Raises the termination signal. Both loops observe it and stop.
   * Calls after the first are no-ops.
   */
  terminate(reason: string): void {
    if (!this.isActive) {
      return;
    }

    this._state = 'terminating';
    this.logger.info({ reason }, 'Session terminating');
    this.termination.abort(reason);
  }

  /**
   * Releases the session: leaves the registry first, then closes the
   * connection. Runs at most once whatever path reaches it.
   */
  close(): void {
    if (this._state === 'closed') {
      return;
    }

    this.terminate('session closed');
    this._state = 'closed';

    this.registry.remove(this);
    this.queue.clear();
    this.connection.close();

    this.logger.info(
      {
        droppedCount: this._droppedCount,
        connectedForMs: Date.now() - this._connectedAt.getTime(),
      },
      'Session closed'
    );
  }

  /**
   * Drains the queue onto the connection until termination.
   */
  private async writeLoop(): Promise<void> {
    const signal = this.termination.signal;

    try {
      while (!signal.aborted) {
        const message = await this.queue.take(signal);
        if (!message) {
          break;
        }

        await this.connection.send(this.codec.encode(message));
        this.logger.debug({ author: message.author }, 'Message sent');
      }
    } catch (error) {
      this.logger.warn({ error }, 'Failed to send message');
    } finally {
      // The read loop may still be waiting on the connection
      this.terminate('write loop ended');
    }
  }

  /**
   * Reads frames and broadcasts each decoded message until the peer goes
   * away, termination is raised, or the transport keeps failing.
   */
  private async readLoop(): Promise<void> {
    const signal = this.termination.signal;
    let consecutiveErrors = 0;

    while (!signal.aborted) {
      let result: ReceiveResult;
      try {
        result = await this.connection.receive(signal);
      } catch (error) {
        consecutiveErrors++;
        this.logger.warn({ error, consecutiveErrors }, 'Failed to read from connection');
        if (consecutiveErrors >= this.maxConsecutiveReadErrors) {
          this.terminate('too many read errors');
        }
        continue;
      }

      if (result.kind === 'aborted') {
        break;
      }

      if (result.kind === 'end') {
        this.terminate('connection closed by peer');
        break;
      }

      consecutiveErrors = 0;

      const decoded = this.codec.decode(result.data);
      if (!decoded.success) {
        this.logger.warn({ reason: decoded.error }, 'Dropping undecodable frame');
        continue;
      }

      this.logger.debug({ author: decoded.message.author }, 'Message received');
      this.broadcaster.broadcast(decoded.message);
    }
  }
}
