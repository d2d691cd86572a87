/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  Connection,
  type ConnectionState,
  type ConnectionProps,
  type CloseRequestHandler,
} from './connection.js';
export { OutboundChannel } from './outbound-channel.js';
export { RoomSession } from './room-session.js';
