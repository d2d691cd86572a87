/**
 * @file in-memory-registry.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../../domain/entities/connection.js';
import { RoomSession } from '../../domain/entities/room-session.js';
import type { ChatroomId } from '../../domain/value-objects/chatroom-id.js';
import type { ConnectionRegistry } from '../../domain/ports/connection-registry.js';
import type { RoomDirectory } from '../../domain/ports/room-directory.js';
import { RoomUnknownError } from '../../domain/errors/domain-errors.js';

export interface InMemoryConnectionRegistryDeps {
  roomDirectory: RoomDirectory;
  logger: Logger;
}

/**
 * In-memory implementation of ConnectionRegistry.
 * Keeps one RoomSession per chatroom with live members, indexed by chatroom ID,
 * plus a connection → chatroom index so a connection sits in one room at a time.
 */
export class InMemoryConnectionRegistry implements ConnectionRegistry {
  private readonly sessions = new Map<string, RoomSession>();
  private readonly roomOf = new Map<string, ChatroomId>();
  private readonly roomDirectory: RoomDirectory;
  private readonly logger: Logger;

  constructor(deps: InMemoryConnectionRegistryDeps) {
    this.roomDirectory = deps.roomDirectory;
    this.logger = deps.logger.child({ component: 'ConnectionRegistry' });
  }

  async admit(chatroomId: ChatroomId, connection: Connection): Promise<void> {
    const exists = await this.roomDirectory.exists(chatroomId);
    if (!exists) {
      throw new RoomUnknownError(chatroomId.value);
    }

    const previous = this.roomOf.get(connection.id);
    if (previous && !previous.equals(chatroomId)) {
      this.remove(previous, connection.id);
    }

    const session = this.sessionFor(chatroomId);
    if (!session.admit(connection)) {
      // Closed while the existence check was pending
      this.logger.debug(
        { chatroomId: chatroomId.value, connectionId: connection.id },
        'Skipped admission of closed connection'
      );
      this.pruneIfIdle(session);
      return;
    }
    this.roomOf.set(connection.id, chatroomId);

    this.logger.debug(
      { chatroomId: chatroomId.value, connectionId: connection.id, members: session.size },
      'Connection admitted'
    );
  }

  remove(chatroomId: ChatroomId, connectionId: string): boolean {
    const session = this.sessions.get(chatroomId.value);
    if (!session?.remove(connectionId)) {
      return false;
    }

    if (this.roomOf.get(connectionId)?.equals(chatroomId)) {
      this.roomOf.delete(connectionId);
    }
    this.pruneIfIdle(session);

    this.logger.debug(
      { chatroomId: chatroomId.value, connectionId, members: session.size },
      'Connection removed'
    );
    return true;
  }

  membersOf(chatroomId: ChatroomId): Connection[] {
    return this.sessions.get(chatroomId.value)?.snapshot() ?? [];
  }

  isMember(chatroomId: ChatroomId, connectionId: string): boolean {
    return this.sessions.get(chatroomId.value)?.has(connectionId) ?? false;
  }

  getSession(chatroomId: ChatroomId): RoomSession | undefined {
    return this.sessions.get(chatroomId.value);
  }

  roomCount(): number {
    return this.sessions.size;
  }

  connectionCount(): number {
    return this.roomOf.size;
  }

  private sessionFor(chatroomId: ChatroomId): RoomSession {
    let session = this.sessions.get(chatroomId.value);
    if (!session) {
      session = new RoomSession(chatroomId, (idle) => this.pruneIfIdle(idle));
      this.sessions.set(chatroomId.value, session);
    }
    return session;
  }

  private pruneIfIdle(session: RoomSession): void {
    const key = session.chatroomId.value;
    if (session.isIdle && this.sessions.get(key) === session) {
      this.sessions.delete(key);
    }
  }
}
