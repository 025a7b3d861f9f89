/**
 * @file connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Outcome of waiting for the next inbound frame.
 */
export type ReceiveResult =
  | { kind: 'frame'; data: string }
  /** The peer closed the stream cleanly and no frames are left */
  | { kind: 'end' }
  /** The caller's signal aborted before a frame arrived */
  | { kind: 'aborted' };

/**
 * Port (interface) for one bidirectional client transport.
 * A connection is owned by exactly one session; nothing else reads,
 * writes or closes it.
 */
export interface Connection {
  /**
   * Address of the peer, for logging.
   */
  readonly remoteAddress: string | undefined;

  /**
   * Writes one text frame. Rejects if the transport cannot take it.
   */
  send(data: string): Promise<void>;

  /**
   * Waits for the next inbound text frame.
   * Rejects with the transport error when the read fails.
   */
  receive(signal: AbortSignal): Promise<ReceiveResult>;

  /**
   * Closes the transport. Calls after the first are no-ops.
   */
  close(code?: number, reason?: string): void;
}
