/**
 * @file ws-connection.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { WebSocket, type RawData } from 'ws';
import type { Connection, ReceiveResult } from '../../domain/ports/connection.js';

/**
 * Decodes a ws payload (single, fragmented or ArrayBuffer) as UTF-8 text.
 */
export function rawDataToText(data: RawData): string {
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  if (data instanceof ArrayBuffer) {
    return Buffer.from(new Uint8Array(data)).toString('utf8');
  }
  return data.toString('utf8');
}

/**
 * The part of a `ws` WebSocket the adapter relies on.
 */
export interface WsSocket {
  readonly readyState: number;
  on(event: 'message', listener: (data: RawData) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  send(data: string, callback: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

/**
 * Connection adapter over a `ws` WebSocket.
 *
 * ws pushes frames as events; this adapter buffers them in arrival order
 * so the session can pull them one at a time with receive().
 */
export class WsConnection implements Connection {
  private readonly socket: WsSocket;
  private readonly frames: string[] = [];
  private pendingError: Error | null = null;
  private ended = false;
  private closeRequested = false;
  private waiter: (() => void) | null = null;

  readonly remoteAddress: string | undefined;

  constructor(socket: WsSocket, remoteAddress?: string) {
    this.socket = socket;
    this.remoteAddress = remoteAddress;

    socket.on('message', (data: RawData) => {
      this.frames.push(rawDataToText(data));
      this.wake();
    });

    socket.on('close', () => {
      this.ended = true;
      this.wake();
    });

    socket.on('error', (error: Error) => {
      this.pendingError = error;
      this.wake();
    });
  }

  send(data: string): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new Error('WebSocket is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      this.socket.send(data, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  async receive(signal: AbortSignal): Promise<ReceiveResult> {
    for (;;) {
      if (signal.aborted) {
        return { kind: 'aborted' };
      }

      if (this.pendingError) {
        const error = this.pendingError;
        this.pendingError = null;
        throw error;
      }

      const frame = this.frames.shift();
      if (frame !== undefined) {
        return { kind: 'frame', data: frame };
      }

      if (this.ended) {
        return { kind: 'end' };
      }

      await this.waitForActivity(signal);
    }
  }

  close(code = 1000, reason?: string): void {
    if (this.closeRequested) {
      return;
    }
    this.closeRequested = true;

    if (
      this.socket.readyState === WebSocket.CONNECTING ||
      this.socket.readyState === WebSocket.OPEN
    ) {
      this.socket.close(code, reason);
    }
  }

  /**
   * Resolves on the next frame, close, error or abort.
   */
  private waitForActivity(signal: AbortSignal): Promise<void> {
    return new Promise<void>((resolve) => {
      const done = (): void => {
        signal.removeEventListener('abort', done);
        if (this.waiter === done) {
          this.waiter = null;
        }
        resolve();
      };

      this.waiter = done;
      signal.addEventListener('abort', done, { once: true });
    });
  }

  private wake(): void {
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.();
  }
}
