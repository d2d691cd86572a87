/**
 * @file message-repository.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { getDatabase } from '../database/client.js';
import { messages, type MessageRow } from '../database/schema.js';
import type { ChatroomId } from '../../../domain/value-objects/chatroom-id.js';
import type { MessageStore, StoredMessage } from '../../../domain/ports/message-store.js';

function toStoredMessage(row: MessageRow): StoredMessage {
  return {
    id: row.id,
    chatroomId: row.chatroomId,
    senderId: row.senderId,
    content: row.content,
    createdAt: row.createdAt,
  };
}

/**
 * Repository for message persistence operations.
 */
export class MessageRepository implements MessageStore {
  /**
   * Appends a message; the database assigns the id.
   */
  async append(chatroomId: ChatroomId, senderId: string, content: string): Promise<StoredMessage> {
    const db = getDatabase();

    const row = db
      .insert(messages)
      .values({
        chatroomId: chatroomId.value,
        senderId,
        content,
        createdAt: new Date(),
      })
      .returning()
      .get();
    if (!row) {
      throw new Error(`Insert into chatroom ${chatroomId.value} returned no row`);
    }

    return toStoredMessage(row);
  }
}
