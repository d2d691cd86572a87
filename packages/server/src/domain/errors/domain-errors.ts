/**
 * @file domain-errors.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

/**
 * Stable, machine-readable error codes shared with the wire protocol.
 */
export type DomainErrorCode =
  | 'UNAUTHORIZED'
  | 'ROOM_NOT_FOUND'
  | 'INVALID_PAYLOAD'
  | 'NOT_MEMBER'
  | 'PERSISTENCE_FAILURE'
  | 'SLOW_CONSUMER'
  | 'TRANSPORT_ERROR'
  | 'INTERNAL_ERROR';

/**
 * Base class for all domain errors.
 * Provides structured error information for protocol responses.
 */
export abstract class DomainError extends Error {
  abstract readonly code: DomainErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): { code: DomainErrorCode; message: string } {
    return {
      code: this.code,
      message: this.message,
    };
  }
}

/**
 * Error thrown when a bearer credential is missing, invalid or expired.
 */
export class UnauthorizedError extends DomainError {
  readonly code = 'UNAUTHORIZED';

  constructor(reason = 'Invalid or expired credential') {
    super(reason);
  }
}

/**
 * Error thrown when a connection targets a chatroom that does not exist.
 */
export class RoomUnknownError extends DomainError {
  readonly code = 'ROOM_NOT_FOUND';

  constructor(chatroomId: string) {
    super(`Chatroom not found: ${chatroomId}`);
  }
}

/**
 * Error thrown when an inbound message payload is malformed.
 */
export class InvalidPayloadError extends DomainError {
  readonly code = 'INVALID_PAYLOAD';
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}

/**
 * Error thrown when a connection sends to a room it is no longer admitted to.
 */
export class NotMemberError extends DomainError {
  readonly code = 'NOT_MEMBER';

  constructor(chatroomId: string) {
    super(`Connection is not a member of chatroom: ${chatroomId}`);
  }
}

/**
 * Error thrown when the message store rejects a write.
 */
export class PersistenceFailureError extends DomainError {
  readonly code = 'PERSISTENCE_FAILURE';

  constructor(message = 'Message could not be stored') {
    super(message);
  }
}

/**
 * Error describing a connection evicted for not draining its outbound queue.
 */
export class SlowConsumerError extends DomainError {
  readonly code = 'SLOW_CONSUMER';

  constructor(connectionId: string) {
    super(`Connection evicted as a slow consumer: ${connectionId}`);
  }
}

/**
 * Error raised when the underlying socket fails; `cause` keeps the socket error.
 */
export class TransportError extends DomainError {
  readonly code = 'TRANSPORT_ERROR';

  constructor(cause: unknown) {
    super('Transport error');
    this.cause = cause;
  }
}

/**
 * Error thrown when an internal server error occurs.
 */
export class InternalError extends DomainError {
  readonly code = 'INTERNAL_ERROR';

  constructor(message = 'An internal error occurred') {
    super(message);
  }
}
