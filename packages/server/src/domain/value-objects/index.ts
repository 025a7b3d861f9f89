/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { Message, type MessageProps } from './message.js';
export { SessionId } from './session-id.js';
