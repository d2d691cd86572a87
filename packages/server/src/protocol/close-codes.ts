/**
 * @file close-codes.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * WebSocket close codes sent by the server.
 * 4xxx codes are application-defined.
 */
export const CLOSE_CODES = {
  NORMAL: 1000,
  GOING_AWAY: 1001,
  INTERNAL_ERROR: 1011,
  UNAUTHORIZED: 4001,
  ROOM_NOT_FOUND: 4004,
  SLOW_CONSUMER: 4008,
  TIMED_OUT: 4009,
} as const;

export type CloseCode = (typeof CLOSE_CODES)[keyof typeof CLOSE_CODES];

export const CLOSE_REASONS: Record<CloseCode, string> = {
  [CLOSE_CODES.NORMAL]: 'Normal closure',
  [CLOSE_CODES.GOING_AWAY]: 'Server shutting down',
  [CLOSE_CODES.INTERNAL_ERROR]: 'Internal error',
  [CLOSE_CODES.UNAUTHORIZED]: 'Unauthorized',
  [CLOSE_CODES.ROOM_NOT_FOUND]: 'Chatroom not found',
  [CLOSE_CODES.SLOW_CONSUMER]: 'Slow consumer evicted',
  [CLOSE_CODES.TIMED_OUT]: 'Connection timed out',
};
