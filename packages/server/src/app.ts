/**
 * @file app.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import Fastify from 'fastify';
import type { Logger } from 'pino';
import type { Env } from './config/env.js';
import { DomainError, InternalError } from './domain/errors/domain-errors.js';
import type { ErrorResponse } from './protocol/messages.js';

export interface AppConfig {
  env: Pick<Env, 'TRUST_PROXY'>;
  logger: Logger;
}

/**
 * Maps any thrown value to an HTTP status and error body.
 */
export function toErrorResponse(error: unknown): { statusCode: number; body: ErrorResponse } {
  if (error instanceof DomainError) {
    return {
      statusCode: error.statusCode,
      body: { error: error.message, code: error.code },
    };
  }

  // Fastify's own errors (bad content type, body too large, ...)
  if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number' && error.statusCode < 500) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'INVALID_PAYLOAD';
    return {
      statusCode: error.statusCode,
      body: { error: error.message, code },
    };
  }

  // Anything else is reported as a generic internal error
  return toErrorResponse(new InternalError());
}

/**
 * Creates and configures the Fastify application.
 */
export function createApp(config: AppConfig) {
  const app = Fastify({
    loggerInstance: config.logger,
    trustProxy: config.env.TRUST_PROXY,
    // Disable request logging since we use pino directly
    disableRequestLogging: true,
  });

  // Request logging middleware
  app.addHook('onRequest', async (request, _reply) => {
    request.log.debug(
      {
        method: request.method,
        url: request.url,
        // Include forwarded headers if behind proxy
        ...(config.env.TRUST_PROXY && {
          forwardedFor: request.headers['x-forwarded-for'],
          forwardedProto: request.headers['x-forwarded-proto'],
        }),
      },
      'Incoming request'
    );
  });

  // Response logging middleware
  app.addHook('onResponse', async (request, reply) => {
    request.log.info(
      {
        method: request.method,
        url: request.url,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  // Error handler
  app.setErrorHandler<Error>((error, request, reply) => {
    const { statusCode, body } = toErrorResponse(error);
    if (statusCode >= 500) {
      request.log.error({ error }, 'Request error');
    } else {
      request.log.warn({ code: body.code, message: body.error }, 'Request rejected');
    }
    void reply.status(statusCode).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    request.log.warn({ url: request.url }, 'Route not found');
    const body: ErrorResponse = { error: 'Not Found', code: 'NOT_FOUND' };
    void reply.status(404).send(body);
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
