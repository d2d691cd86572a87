/**
 * @file messages.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { DomainErrorCode } from '../domain/errors/domain-errors.js';
import type { StoredMessage } from '../domain/ports/message-store.js';

// ============================================================================
// Client Messages
// ============================================================================

/**
 * Client → Server: Chat message
 */
export interface ChatMessage {
  content: string;
}

// ============================================================================
// Broadcast Messages
// ============================================================================

/**
 * Server → Room members: A stored message
 */
export interface BroadcastMessage {
  id: number;
  chatroom_id: string;
  sender_id: string;
  content: string;
  created_at: string;
}

/**
 * Converts a stored message to its wire form.
 */
export function toBroadcastMessage(message: StoredMessage): BroadcastMessage {
  return {
    id: message.id,
    chatroom_id: message.chatroomId,
    sender_id: message.senderId,
    content: message.content,
    created_at: message.createdAt.toISOString(),
  };
}

// ============================================================================
// Error Messages
// ============================================================================

export type ErrorCode = DomainErrorCode;

/**
 * Server → Sender: Error acknowledgment
 */
export interface ErrorMessage {
  type: 'error';
  payload: {
    code: ErrorCode;
    message: string;
    details?: unknown;
  };
}
