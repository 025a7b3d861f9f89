/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Author used for every message the server originates itself.
 */
export const SERVER_AUTHOR = 'Server';

/**
 * Greeting sent to a freshly connected client, before anything else.
 */
export const GREETING = {
  author: SERVER_AUTHOR,
  body: 'Welcome!',
} as const;

/**
 * Per-session delivery limits.
 */
export const SESSION_LIMITS = {
  /** Outbound queue capacity; deliveries beyond it are dropped */
  QUEUE_CAPACITY: 100,

  /** Transport read errors in a row before the session is terminated */
  MAX_CONSECUTIVE_READ_ERRORS: 5,

  /** Length of generated session IDs */
  SESSION_ID_LENGTH: 12,
} as const;

/**
 * Connection timing constants (in milliseconds).
 */
export const CONNECTION_TIMING = {
  /** How often the server pings every socket */
  HEARTBEAT_INTERVAL_MS: 30_000,

  /** Max time to wait for the WebSocket server to close before terminating sockets */
  WS_CLOSE_TIMEOUT_MS: 5_000,

  /** Max time for the whole process shutdown */
  SHUTDOWN_TIMEOUT_MS: 10_000,
} as const;

/**
 * WebSocket configuration.
 */
export const WEBSOCKET_CONFIG = {
  /** Path for WebSocket endpoint */
  PATH: '/ws',

  /** Largest inbound frame accepted (1MB) */
  MAX_PAYLOAD_BYTES: 1024 * 1024,

  /** Close code sent to clients when the server shuts down */
  GOING_AWAY_CODE: 1001,
} as const;

/**
 * HTTP route prefixes.
 */
export const HTTP_ROUTES = {
  /** Prefix of the external trigger endpoint: /broadcast/<text> */
  BROADCAST_PREFIX: '/broadcast',
} as const;
