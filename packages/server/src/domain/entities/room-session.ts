/**
 * @file room-session.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ChatroomId } from '../value-objects/chatroom-id.js';
import type { Connection } from './connection.js';

/**
 * Live state of one chatroom: its member connections and the writes still in flight.
 *
 * Membership changes and publishes are synchronous, so the event loop linearizes
 * them: every member sees published values in the order their writes completed.
 */
export class RoomSession {
  private readonly _chatroomId: ChatroomId;
  private readonly members = new Map<string, Connection>();
  private pendingPublishes = 0;
  private readonly onIdle: ((session: RoomSession) => void) | undefined;

  constructor(chatroomId: ChatroomId, onIdle?: (session: RoomSession) => void) {
    this._chatroomId = chatroomId;
    this.onIdle = onIdle;
  }

  get chatroomId(): ChatroomId {
    return this._chatroomId;
  }

  get size(): number {
    return this.members.size;
  }

  /**
   * True when the room has no members and nothing waiting to be published.
   */
  get isIdle(): boolean {
    return this.members.size === 0 && this.pendingPublishes === 0;
  }

  /**
   * Adds a live connection. Connections already closing are refused.
   */
  admit(connection: Connection): boolean {
    if (!connection.isAlive) {
      return false;
    }
    this.members.set(connection.id, connection);
    return true;
  }

  remove(connectionId: string): boolean {
    return this.members.delete(connectionId);
  }

  has(connectionId: string): boolean {
    return this.members.has(connectionId);
  }

  /**
   * Point-in-time copy of the member set.
   */
  snapshot(): Connection[] {
    return Array.from(this.members.values());
  }

  /**
   * Publishes the value of `pending` as soon as it resolves, independent of any
   * other write in flight for this room. A rejected `pending` publishes nothing
   * and its error is returned to the caller.
   */
  publishWhenReady<T>(pending: Promise<T>, publish: (value: T) => void): Promise<T> {
    this.pendingPublishes++;

    return pending
      .then((value) => {
        publish(value);
        return value;
      })
      .finally(() => {
        this.pendingPublishes--;
        if (this.isIdle) {
          this.onIdle?.(this);
        }
      });
  }
}
