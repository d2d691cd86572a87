/**
 * @file constants.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Connection timing constants (in milliseconds).
 */
export const CONNECTION_TIMING = {
  /** How often every live connection is pinged */
  HEARTBEAT_INTERVAL_MS: 10_000,

  /** Max time without a pong before a connection is considered dead (3 missed pings) */
  PONG_TIMEOUT_MS: 30_000,

  /** Max time to wait for sockets to close on shutdown */
  SHUTDOWN_GRACE_MS: 5_000,
} as const;

/**
 * WebSocket configuration.
 */
export const WEBSOCKET_CONFIG = {
  /** Path prefix for chatroom endpoints; the chatroom id is the next segment */
  PATH: '/api/v1/ws/chatrooms',

  /** Largest accepted inbound frame */
  MAX_PAYLOAD_BYTES: 64 * 1024,
} as const;

/**
 * Fan-out defaults.
 */
export const DELIVERY_DEFAULTS = {
  /** Frames buffered per connection before offers start failing */
  OUTBOUND_QUEUE_CAPACITY: 256,

  /** Consecutive failed offers tolerated before a connection is evicted */
  SLOW_CONSUMER_DROP_THRESHOLD: 32,
} as const;

/**
 * Inbound message limits.
 */
export const MESSAGE_LIMITS = {
  MAX_CONTENT_LENGTH: 4_000,
} as const;
