/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type { Connection, ReceiveResult } from './connection.js';
export type { SessionRegistry } from './session-registry.js';
export type { MessageBroadcaster } from './message-broadcaster.js';
export type { MessageCodec, DecodeResult } from './message-codec.js';
