/**
 * @file schemas.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import {
  MessageFrameSchema,
  decodeMessage,
  encodeMessage,
  jsonMessageCodec,
} from '../../../src/protocol/schemas.js';
import { Message } from '../../../src/domain/value-objects/message.js';

// ============================================================================
// MessageFrameSchema Tests
// ============================================================================

describe('MessageFrameSchema', () => {
  it('should accept author and body strings', () => {
    const result = MessageFrameSchema.safeParse({ author: 'A', body: 'hi' });
    expect(result.success).toBe(true);
  });

  it('should strip unknown fields', () => {
    const result = MessageFrameSchema.safeParse({ author: 'A', body: 'hi', extra: true });
    expect(result.success && result.data).toEqual({ author: 'A', body: 'hi' });
  });

  it('should reject non-string fields', () => {
    expect(MessageFrameSchema.safeParse({ author: 1, body: 'hi' }).success).toBe(false);
    expect(MessageFrameSchema.safeParse({ author: 'A', body: null }).success).toBe(false);
  });
});

// ============================================================================
// decodeMessage Tests
// ============================================================================

describe('decodeMessage', () => {
  it('should decode a valid frame', () => {
    const result = decodeMessage('{"author":"A","body":"hi"}');

    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.message.equals(Message.create({ author: 'A', body: 'hi' }))).toBe(true);
    }
  });

  it('should report invalid JSON', () => {
    expect(decodeMessage('{author')).toEqual({ success: false, error: 'Invalid JSON' });
  });

  it('should report a missing field by name', () => {
    expect(decodeMessage('{"body":"hi"}')).toEqual({
      success: false,
      error: 'author: author is required',
    });
  });

  it('should report a wrongly typed field', () => {
    expect(decodeMessage('{"author":"A","body":42}')).toEqual({
      success: false,
      error: 'body: Expected string, received number',
    });
  });

  it('should report a frame that is not an object', () => {
    expect(decodeMessage('[1,2]')).toEqual({
      success: false,
      error: 'frame: Expected object, received array',
    });
  });
});

// ============================================================================
// encodeMessage Tests
// ============================================================================

describe('encodeMessage', () => {
  it('should encode author before body', () => {
    expect(encodeMessage(Message.create({ author: 'Server', body: 'Welcome!' }))).toBe(
      '{"author":"Server","body":"Welcome!"}'
    );
  });

  it('should escape special characters', () => {
    expect(encodeMessage(Message.create({ author: 'A', body: 'say "hi"\n' }))).toBe(
      '{"author":"A","body":"say \\"hi\\"\\n"}'
    );
  });

  it('should be what jsonMessageCodec uses', () => {
    expect(jsonMessageCodec.encode).toBe(encodeMessage);
    expect(jsonMessageCodec.decode).toBe(decodeMessage);
  });
});
