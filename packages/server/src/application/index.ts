/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  AcceptConnectionUseCase,
  type AcceptConnectionDeps,
} from './accept-connection.js';

export {
  BroadcastMessageUseCase,
  type BroadcastMessageDeps,
} from './broadcast-message.js';

export {
  TriggerBroadcastUseCase,
  type TriggerBroadcastDeps,
} from './trigger-broadcast.js';
