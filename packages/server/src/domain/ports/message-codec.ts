/**
 * @file message-codec.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Message } from '../value-objects/message.js';

export type DecodeResult =
  | { success: true; message: Message }
  | { success: false; error: string };

/**
 * Port for turning messages into transport frames and back.
 */
export interface MessageCodec {
  encode(message: Message): string;
  decode(frame: string): DecodeResult;
}
