/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export { ChatroomId } from './chatroom-id.js';
export type { Identity } from './identity.js';
