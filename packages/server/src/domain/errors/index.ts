/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export {
  DomainError,
  type DomainErrorCode,
  UnauthorizedError,
  RoomUnknownError,
  InvalidPayloadError,
  NotMemberError,
  PersistenceFailureError,
  SlowConsumerError,
  TransportError,
  InternalError,
} from './domain-errors.js';
