/**
 * @file room-directory.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ChatroomId } from '../value-objects/chatroom-id.js';

/**
 * Port for checking chatroom existence against the external store.
 */
export interface RoomDirectory {
  exists(chatroomId: ChatroomId): Promise<boolean>;
}
