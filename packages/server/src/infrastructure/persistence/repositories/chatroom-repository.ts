/**
 * @file chatroom-repository.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { eq } from 'drizzle-orm';
import { getDatabase } from '../database/client.js';
import { chatrooms } from '../database/schema.js';
import type { ChatroomId } from '../../../domain/value-objects/chatroom-id.js';
import type { RoomDirectory } from '../../../domain/ports/room-directory.js';

/**
 * Read-only view over the chatrooms table.
 */
export class ChatroomRepository implements RoomDirectory {
  async exists(chatroomId: ChatroomId): Promise<boolean> {
    const db = getDatabase();
    const row = db
      .select({ id: chatrooms.id })
      .from(chatrooms)
      .where(eq(chatrooms.id, chatroomId.value))
      .get();
    return row !== undefined;
  }
}
