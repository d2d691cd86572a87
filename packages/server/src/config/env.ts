/**
 * @file env.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { z } from 'zod';
import { config } from 'dotenv';
import { DELIVERY_DEFAULTS, MESSAGE_LIMITS, WEBSOCKET_CONFIG } from './constants.js';

// Load environment variables from .env files
config({ path: '.env.local' });
config({ path: '.env' });

/**
 * Schema for environment variables validation.
 */
export const EnvSchema = z.object({
  // Server
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3001),
  HOST: z.string().default('0.0.0.0'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),

  /**
   * Whether the server is running behind a reverse proxy.
   * When true, the server will trust X-Forwarded-* headers.
   */
  TRUST_PROXY: z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true'),

  // Security
  /**
   * Shared secret used by the auth service to sign access tokens.
   */
  JWT_SECRET: z.string().min(32, 'JWT secret must be at least 32 characters'),
  JWT_ALGORITHM: z.enum(['HS256', 'HS384', 'HS512']).default('HS256'),

  // Persistence
  DATABASE_PATH: z.string().default('./data/roomcast.db'),

  // WebSocket
  /**
   * Path prefix for chatroom endpoints (defaults to /api/v1/ws/chatrooms).
   */
  WS_PATH: z
    .string()
    .startsWith('/', 'WS_PATH must start with /')
    .default(WEBSOCKET_CONFIG.PATH)
    .transform((path) => path.replace(/\/+$/, '')),

  // Delivery
  OUTBOUND_QUEUE_CAPACITY: z.coerce
    .number()
    .int()
    .positive()
    .default(DELIVERY_DEFAULTS.OUTBOUND_QUEUE_CAPACITY),
  SLOW_CONSUMER_DROP_THRESHOLD: z.coerce
    .number()
    .int()
    .nonnegative()
    .default(DELIVERY_DEFAULTS.SLOW_CONSUMER_DROP_THRESHOLD),
  MAX_MESSAGE_LENGTH: z.coerce
    .number()
    .int()
    .positive()
    .default(MESSAGE_LIMITS.MAX_CONTENT_LENGTH),
});

export type Env = z.infer<typeof EnvSchema>;

/**
 * Loads and validates environment variables.
 * Exits the process if validation fails.
 */
export function loadEnv(): Env {
  const result = EnvSchema.safeParse(process.env);

  if (!result.success) {
    console.error('❌ Invalid environment variables:');
    console.error(result.error.format());
    process.exit(1);
  }

  return result.data;
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
