/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  DomainError,
  InvalidPayloadError,
  SessionClosedError,
  InternalError,
} from './domain-errors.js';
