/**
 * @file connection-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { Connection } from '../entities/connection.js';
import type { RoomSession } from '../entities/room-session.js';
import type { ChatroomId } from '../value-objects/chatroom-id.js';

/**
 * Port (interface) for the live connection registry.
 * Maps each chatroom to the connections currently admitted to it.
 */
export interface ConnectionRegistry {
  /**
   * Admits a connection to a chatroom.
   * Rejects with RoomUnknownError when the chatroom does not exist.
   */
  admit(chatroomId: ChatroomId, connection: Connection): Promise<void>;

  /**
   * Removes a connection from a chatroom. Removing an unknown connection is a no-op.
   */
  remove(chatroomId: ChatroomId, connectionId: string): boolean;

  /**
   * Returns a point-in-time snapshot of a chatroom's members.
   */
  membersOf(chatroomId: ChatroomId): Connection[];

  /**
   * Checks whether a connection is currently admitted to a chatroom.
   */
  isMember(chatroomId: ChatroomId, connectionId: string): boolean;

  /**
   * Returns the live session of a chatroom, if it has one.
   */
  getSession(chatroomId: ChatroomId): RoomSession | undefined;

  /**
   * Returns the number of chatrooms with a live session.
   */
  roomCount(): number;

  /**
   * Returns the number of admitted connections across all chatrooms.
   */
  connectionCount(): number;
}
