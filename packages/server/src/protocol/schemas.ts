/**
 * @file schemas.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { Message } from '../domain/value-objects/message.js';
import type { DecodeResult, MessageCodec } from '../domain/ports/message-codec.js';

// ============================================================================
// Message Schemas
// ============================================================================

export const MessageFrameSchema = z.object({
  author: z.string({ required_error: 'author is required' }),
  body: z.string({ required_error: 'body is required' }),
});

// ============================================================================
// Codec
// ============================================================================

/**
 * Parses one text frame into a Message.
 * Unknown fields are ignored.
 */
export function decodeMessage(frame: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(frame);
  } catch {
    return { success: false, error: 'Invalid JSON' };
  }

  const result = MessageFrameSchema.safeParse(parsed);
  if (!result.success) {
    const issue = result.error.issues[0];
    return {
      success: false,
      error: issue ? `${issue.path.join('.') || 'frame'}: ${issue.message}` : 'Invalid message',
    };
  }

  return { success: true, message: Message.create(result.data) };
}

/**
 * Serializes a Message to its wire form: {"author":...,"body":...}
 */
export function encodeMessage(message: Message): string {
  return JSON.stringify(message.toJSON());
}

/**
 * JSON codec used by every session.
 */
export const jsonMessageCodec: MessageCodec = {
  encode: encodeMessage,
  decode: decodeMessage,
};
