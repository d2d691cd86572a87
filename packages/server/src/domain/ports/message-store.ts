/**
 * @file message-store.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ChatroomId } from '../value-objects/chatroom-id.js';

/**
 * A message as persisted by the store. Immutable once created.
 */
export interface StoredMessage {
  readonly id: number;
  readonly chatroomId: string;
  readonly senderId: string;
  readonly content: string;
  readonly createdAt: Date;
}

/**
 * Port for durable message persistence.
 */
export interface MessageStore {
  /**
   * Appends a message to a chatroom's history and returns the stored record.
   */
  append(chatroomId: ChatroomId, senderId: string, content: string): Promise<StoredMessage>;
}
