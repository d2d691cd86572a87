/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export type { ConnectionRegistry } from './connection-registry.js';
export type { TokenVerifier } from './token-verifier.js';
export type { MessageStore, StoredMessage } from './message-store.js';
export type { RoomDirectory } from './room-directory.js';
export type { Transport } from './transport.js';
export type { MessageBroadcaster, DeliveryReport } from './broadcaster.js';
