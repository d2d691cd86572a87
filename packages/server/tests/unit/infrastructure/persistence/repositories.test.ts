/**
 * @file repositories.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  initDatabase,
  closeDatabase,
  type DrizzleDatabase,
} from '../../../../src/infrastructure/persistence/database/client.js';
import { chatrooms, messages } from '../../../../src/infrastructure/persistence/database/schema.js';
import { MessageRepository } from '../../../../src/infrastructure/persistence/repositories/message-repository.js';
import { ChatroomRepository } from '../../../../src/infrastructure/persistence/repositories/chatroom-repository.js';
import { ChatroomId } from '../../../../src/domain/value-objects/chatroom-id.js';

describe('SQLite repositories', () => {
  let db: DrizzleDatabase;

  beforeEach(() => {
    db = initDatabase(':memory:');
    db.insert(chatrooms)
      .values([
        { id: 'general', name: 'General', createdAt: new Date('2025-01-01T00:00:00.000Z') },
        { id: 'random', name: 'Random', isPrivate: true, createdAt: new Date('2025-01-01T00:00:00.000Z') },
      ])
      .run();
  });

  afterEach(() => {
    closeDatabase();
  });

  describe('ChatroomRepository', () => {
    it('should report existing chatrooms', async () => {
      const repository = new ChatroomRepository();

      await expect(repository.exists(ChatroomId.create('general'))).resolves.toBe(true);
      await expect(repository.exists(ChatroomId.create('lobby'))).resolves.toBe(false);
    });
  });

  describe('MessageRepository', () => {
    it('should assign increasing ids and a creation time', async () => {
      const repository = new MessageRepository();
      const before = Date.now();

      const first = await repository.append(ChatroomId.create('general'), '7', 'hello');
      const second = await repository.append(ChatroomId.create('general'), '8', 'hi');

      expect(first).toMatchObject({ id: 1, chatroomId: 'general', senderId: '7', content: 'hello' });
      expect(second.id).toBe(2);
      expect(first.createdAt).toBeInstanceOf(Date);
      expect(first.createdAt.getTime()).toBeGreaterThanOrEqual(before);
    });

    it('should store the message row', async () => {
      const repository = new MessageRepository();

      await repository.append(ChatroomId.create('random'), '7', 'stored');

      const rows = db.select().from(messages).all();
      expect(rows).toHaveLength(1);
      expect(rows[0]).toMatchObject({
        chatroomId: 'random',
        senderId: '7',
        content: 'stored',
        isEdited: false,
      });
    });

    it('should reject a message for a missing chatroom', async () => {
      const repository = new MessageRepository();

      await expect(
        repository.append(ChatroomId.create('lobby'), '7', 'orphan')
      ).rejects.toThrow();
    });
  });
});
