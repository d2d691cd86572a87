/**
 * @file broadcaster.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { ChatroomId } from '../value-objects/chatroom-id.js';
import type { StoredMessage } from './message-store.js';

/**
 * Outcome of one fan-out. Informational only.
 */
export interface DeliveryReport {
  chatroomId: string;
  /** Members in the snapshot, excluding the excluded connection */
  recipients: number;
  delivered: number;
  /** Members whose queue was full or who were already closing */
  skipped: number;
  /** Connection ids evicted as slow consumers during this fan-out */
  evicted: string[];
}

/**
 * Port for fanning a stored message out to a chatroom's live members.
 */
export interface MessageBroadcaster {
  broadcast(
    chatroomId: ChatroomId,
    message: StoredMessage,
    excludeConnectionId?: string
  ): DeliveryReport;
}
