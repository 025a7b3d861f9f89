/**
 * @file ws-connection.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { EventEmitter } from 'node:events';
import { describe, it, expect, beforeEach } from 'vitest';
import { WebSocket } from 'ws';
import { WsConnection, rawDataToText } from '../../../src/infrastructure/websocket/index.js';

/**
 * Socket double: the test emits ws events on it and inspects what the
 * adapter sent and closed.
 */
class FakeSocket extends EventEmitter {
  readyState: number = WebSocket.OPEN;
  readonly sent: string[] = [];
  readonly closeCalls: { code?: number; reason?: string }[] = [];
  sendError: Error | undefined;

  send(data: string, callback: (error?: Error) => void): void {
    this.sent.push(data);
    callback(this.sendError);
  }

  close(code?: number, reason?: string): void {
    this.closeCalls.push({ code, reason });
    this.readyState = WebSocket.CLOSING;
  }
}

// ============================================================================
// rawDataToText Tests
// ============================================================================

describe('rawDataToText', () => {
  it('should decode a Buffer', () => {
    expect(rawDataToText(Buffer.from('héllo', 'utf8'))).toBe('héllo');
  });

  it('should join fragmented frames', () => {
    expect(rawDataToText([Buffer.from('{"author":'), Buffer.from('"A"}')])).toBe('{"author":"A"}');
  });

  it('should decode an ArrayBuffer', () => {
    const bytes = new TextEncoder().encode('hi');
    const buffer = new ArrayBuffer(bytes.byteLength);
    new Uint8Array(buffer).set(bytes);

    expect(rawDataToText(buffer)).toBe('hi');
  });
});

// ============================================================================
// WsConnection Tests
// ============================================================================

describe('WsConnection', () => {
  let socket: FakeSocket;
  let connection: WsConnection;
  let controller: AbortController;

  beforeEach(() => {
    socket = new FakeSocket();
    connection = new WsConnection(socket, '10.0.0.1');
    controller = new AbortController();
  });

  it('should expose the remote address', () => {
    expect(connection.remoteAddress).toBe('10.0.0.1');
  });

  describe('receive', () => {
    it('should return buffered frames in arrival order', async () => {
      socket.emit('message', Buffer.from('first'));
      socket.emit('message', Buffer.from('second'));

      await expect(connection.receive(controller.signal)).resolves.toEqual({
        kind: 'frame',
        data: 'first',
      });
      await expect(connection.receive(controller.signal)).resolves.toEqual({
        kind: 'frame',
        data: 'second',
      });
    });

    it('should wait for a frame that has not arrived yet', async () => {
      const pending = connection.receive(controller.signal);
      socket.emit('message', Buffer.from('late'));

      await expect(pending).resolves.toEqual({ kind: 'frame', data: 'late' });
    });

    it('should reject once with a pending error, then drain frames and end', async () => {
      socket.emit('message', Buffer.from('kept'));
      socket.emit('error', new Error('boom'));
      socket.emit('close');

      await expect(connection.receive(controller.signal)).rejects.toThrow('boom');
      await expect(connection.receive(controller.signal)).resolves.toEqual({
        kind: 'frame',
        data: 'kept',
      });
      await expect(connection.receive(controller.signal)).resolves.toEqual({ kind: 'end' });
    });

    it('should report the end of stream to a waiting reader', async () => {
      const pending = connection.receive(controller.signal);
      socket.emit('close');

      await expect(pending).resolves.toEqual({ kind: 'end' });
    });

    it('should return aborted when the signal aborts while waiting', async () => {
      const pending = connection.receive(controller.signal);
      controller.abort();

      await expect(pending).resolves.toEqual({ kind: 'aborted' });
    });

    it('should return aborted for an already aborted signal even with frames buffered', async () => {
      socket.emit('message', Buffer.from('unread'));
      controller.abort();

      await expect(connection.receive(controller.signal)).resolves.toEqual({ kind: 'aborted' });
    });
  });

  describe('send', () => {
    it('should resolve once ws has taken the frame', async () => {
      await connection.send('{"author":"A","body":"hi"}');

      expect(socket.sent).toEqual(['{"author":"A","body":"hi"}']);
    });

    it('should reject when the socket is not open', async () => {
      socket.readyState = WebSocket.CLOSED;

      await expect(connection.send('x')).rejects.toThrow('WebSocket is not open');
      expect(socket.sent).toEqual([]);
    });

    it('should reject with the error ws reports', async () => {
      socket.sendError = new Error('write EPIPE');

      await expect(connection.send('x')).rejects.toThrow('write EPIPE');
    });
  });

  describe('close', () => {
    it('should close the socket only once', () => {
      connection.close();
      connection.close(1001, 'again');

      expect(socket.closeCalls).toEqual([{ code: 1000, reason: undefined }]);
    });

    it('should pass the code and reason through', () => {
      connection.close(1001, 'Server shutting down');

      expect(socket.closeCalls).toEqual([{ code: 1001, reason: 'Server shutting down' }]);
    });

    it('should not close a socket that is already closed', () => {
      socket.readyState = WebSocket.CLOSED;

      connection.close();

      expect(socket.closeCalls).toEqual([]);
    });
  });
});
