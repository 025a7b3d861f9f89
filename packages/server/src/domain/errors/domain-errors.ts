/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Base class for all domain errors.
 * Provides structured error information for HTTP responses and logs.
 */
export abstract class DomainError extends Error {
  abstract readonly code: string;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: string; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when a request or frame payload is invalid.
 */
export class InvalidPayloadError extends DomainError {
  readonly code = 'INVALID_PAYLOAD';
  readonly statusCode = 400;
}

/**
 * Error thrown when a session is used after it has been released.
 */
export class SessionClosedError extends DomainError {
  readonly code = 'SESSION_CLOSED';
  readonly statusCode = 409;

  constructor(sessionId: string) {
    super(`Session is closed: ${sessionId}`);
  }
}

/**
 * Error thrown when an internal server error occurs.
 */
export class InternalError extends DomainError {
  readonly code = 'INTERNAL_ERROR';
  readonly statusCode = 500;

  constructor(message = 'An internal error occurred') {
    super(message);
  }
}
