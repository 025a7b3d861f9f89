/**
 * @file broadcast-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { TriggerBroadcastUseCase } from '../../application/trigger-broadcast.js';
import { InvalidPayloadError } from '../../domain/errors/domain-errors.js';
import { HTTP_ROUTES } from '../../config/constants.js';

export interface BroadcastRouteDeps {
  triggerBroadcast: TriggerBroadcastUseCase;
}

type RouteHandler = (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>;

interface AppWithRoutes {
  get: (path: string, handler: RouteHandler) => unknown;
  post: (path: string, handler: RouteHandler) => unknown;
}

/**
 * Extracts the message text from a trigger URL: the first path segment
 * after the prefix, URL-decoded. Returns undefined when there is none.
 *
 * @example extractMessageText('/broadcast/hello%20there?x=1', '/broadcast') // 'hello there'
 */
export function extractMessageText(url: string, prefix: string): string | undefined {
  const path = url.split('?', 1)[0] ?? '';
  if (!path.startsWith(`${prefix}/`)) {
    return undefined;
  }

  const segment = path.slice(prefix.length + 1).split('/', 1)[0];
  if (!segment) {
    return undefined;
  }

  try {
    return decodeURIComponent(segment);
  } catch {
    throw new InvalidPayloadError('Malformed message text');
  }
}

/**
 * Registers the external trigger endpoint: /broadcast/<text> sends
 * <text> to every connected client as a server message.
 */
export function registerBroadcastRoute(app: AppWithRoutes, deps: BroadcastRouteDeps): void {
  const prefix = HTTP_ROUTES.BROADCAST_PREFIX;

  const handler: RouteHandler = async (request, reply) => {
    const text = extractMessageText(request.url, prefix);
    const message = deps.triggerBroadcast.execute(text);

    return reply
      .status(200)
      .type('text/plain; charset=utf-8')
      .send(`Broadcasting ${message.body}`);
  };

  // The bare prefix and the trailing slash are registered so they get a
  // defined 400 instead of a 404
  for (const path of [prefix, `${prefix}/`, `${prefix}/*`]) {
    app.get(path, handler);
    app.post(path, handler);
  }
}
