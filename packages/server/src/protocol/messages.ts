/**
 * @file messages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

// ============================================================================
// WebSocket Frames
// ============================================================================

/**
 * Client ⇄ Server: a chat message. The only frame on the wire, in both
 * directions. The first frame after connect is always the server greeting.
 */
export interface MessageFrame {
  author: string;
  body: string;
}

// ============================================================================
// HTTP Responses
// ============================================================================

/**
 * Error codes returned by the HTTP surface.
 */
export type ErrorCode =
  | 'INVALID_PAYLOAD'
  | 'SESSION_CLOSED'
  | 'NOT_FOUND'
  | 'INTERNAL_ERROR';

/**
 * Body of every failed HTTP request.
 */
export interface ErrorResponse {
  error: string;
  code: ErrorCode | string;
}

/**
 * GET /health
 */
export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  sessions: number;
  timestamp: string;
}
