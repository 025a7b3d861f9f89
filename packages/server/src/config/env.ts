/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { config } from 'dotenv';
import { CONNECTION_TIMING, SESSION_LIMITS, WEBSOCKET_CONFIG } from './constants.js';

// Load environment variables from .env files
config({ path: '.env.local' });
config({ path: '.env' });

const BooleanString = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((value) => value === 'true' || value === '1');

/**
 * Schema for environment variables validation.
 */
export const EnvSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  /**
   * Whether the server is running behind a reverse proxy.
   * When true, the server will trust X-Forwarded-* headers.
   */
  TRUST_PROXY: BooleanString,

  /**
   * WebSocket endpoint path.
   */
  WS_PATH: z.string().startsWith('/').default(WEBSOCKET_CONFIG.PATH),

  // Sessions
  SESSION_QUEUE_CAPACITY: z.coerce.number().int().min(1).default(SESSION_LIMITS.QUEUE_CAPACITY),
  MAX_CONSECUTIVE_READ_ERRORS: z.coerce
    .number()
    .int()
    .min(1)
    .default(SESSION_LIMITS.MAX_CONSECUTIVE_READ_ERRORS),

  /**
   * Interval between transport pings. 0 disables the heartbeat.
   */
  HEARTBEAT_INTERVAL_MS: z.coerce
    .number()
    .int()
    .min(0)
    .default(CONNECTION_TIMING.HEARTBEAT_INTERVAL_MS),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Loads and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = EnvSchema.safeParse(source);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
}

/**
 * Builds the WebSocket URL clients should connect to.
 */
export function generatePublicUrl(env: Env): string {
  const protocol = env.NODE_ENV === 'production' ? 'wss' : 'ws';
  const host = env.HOST === '0.0.0.0' ? 'localhost' : env.HOST;
  return `${protocol}://${host}:${env.PORT}${env.WS_PATH}`;
}

// Singleton env instance
let envInstance: Env | null = null;

/**
 * Gets the environment configuration singleton.
 */
export function getEnv(): Env {
  envInstance ??= loadEnv();
  return envInstance;
}
