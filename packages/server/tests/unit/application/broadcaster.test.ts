/**
 * @file broadcaster.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect, vi } from 'vitest';
import { Broadcaster } from '../../../src/application/broadcaster.js';
import { InMemoryConnectionRegistry } from '../../../src/infrastructure/persistence/in-memory-registry.js';
import { ChatroomId } from '../../../src/domain/value-objects/chatroom-id.js';
import type { StoredMessage } from '../../../src/domain/ports/message-store.js';
import { StaticRoomDirectory } from '../../helpers/fakes.js';
import { ALICE, BOB, CAROL, createActiveConnection, drainQueue } from '../../helpers/harness.js';
import { createRecordingLogger, createTestLogger } from '../../helpers/logger.js';
import type { Logger } from 'pino';

const general = ChatroomId.create('general');

function createMessage(id: number, content = 'hello'): StoredMessage {
  return {
    id,
    chatroomId: 'general',
    senderId: '1',
    content,
    createdAt: new Date('2025-01-01T00:00:00.000Z'),
  };
}

function setup(dropThreshold = 32, logger: Logger = createTestLogger()) {
  const registry = new InMemoryConnectionRegistry({
    roomDirectory: new StaticRoomDirectory(['general']),
    logger,
  });
  const broadcaster = new Broadcaster({ registry, dropThreshold, logger });
  return { registry, broadcaster };
}

describe('Broadcaster', () => {
  it('should offer the serialized message to every member', async () => {
    const { registry, broadcaster } = setup();
    const alice = createActiveConnection('a', 'general', ALICE);
    const bob = createActiveConnection('b', 'general', BOB);
    await registry.admit(general, alice);
    await registry.admit(general, bob);

    const report = broadcaster.broadcast(general, createMessage(1));

    expect(report).toEqual({
      chatroomId: 'general',
      recipients: 2,
      delivered: 2,
      skipped: 0,
      evicted: [],
    });
    const expected =
      '{"id":1,"chatroom_id":"general","sender_id":"1","content":"hello","created_at":"2025-01-01T00:00:00.000Z"}';
    expect(await drainQueue(alice)).toEqual([expected]);
    expect(await drainQueue(bob)).toEqual([expected]);
  });

  it('should skip the excluded connection', async () => {
    const { registry, broadcaster } = setup();
    const alice = createActiveConnection('a', 'general', ALICE);
    const bob = createActiveConnection('b', 'general', BOB);
    await registry.admit(general, alice);
    await registry.admit(general, bob);

    const report = broadcaster.broadcast(general, createMessage(1), 'a');

    expect(report.recipients).toBe(1);
    expect(alice.outbound.size).toBe(0);
    expect(bob.outbound.size).toBe(1);
  });

  it('should report an empty delivery for a room without members', () => {
    const { broadcaster } = setup();

    expect(broadcaster.broadcast(general, createMessage(1))).toEqual({
      chatroomId: 'general',
      recipients: 0,
      delivered: 0,
      skipped: 0,
      evicted: [],
    });
  });

  it('should keep delivering to others when one queue is full', async () => {
    const { registry, broadcaster } = setup();
    const slow = createActiveConnection('slow', 'general', ALICE, 1);
    const fast = createActiveConnection('fast', 'general', BOB, 8);
    await registry.admit(general, slow);
    await registry.admit(general, fast);

    broadcaster.broadcast(general, createMessage(1));
    const report = broadcaster.broadcast(general, createMessage(2));

    expect(report.delivered).toBe(1);
    expect(report.skipped).toBe(1);
    expect(slow.consecutiveDrops).toBe(1);
    expect(fast.outbound.size).toBe(2);
  });

  it('should evict a member whose drops exceed the threshold', async () => {
    const { registry, broadcaster } = setup(1);
    const slow = createActiveConnection('slow', 'general', ALICE, 1);
    const other = createActiveConnection('other', 'general', CAROL, 8);
    const onClose = vi.fn();
    slow.onCloseRequested(onClose);
    await registry.admit(general, slow);
    await registry.admit(general, other);

    broadcaster.broadcast(general, createMessage(1));
    const second = broadcaster.broadcast(general, createMessage(2));
    expect(second.evicted).toEqual([]);

    const third = broadcaster.broadcast(general, createMessage(3));

    expect(third.evicted).toEqual(['slow']);
    expect(onClose).toHaveBeenCalledTimes(1);
    expect(onClose).toHaveBeenCalledWith(4008, 'Slow consumer evicted');
    expect(other.outbound.size).toBe(3);
  });

  it('should log an eviction as a SlowConsumerError', async () => {
    const { logger, entries } = createRecordingLogger();
    const { registry, broadcaster } = setup(0, logger);
    const slow = createActiveConnection('slow', 'general', ALICE, 1);
    await registry.admit(general, slow);

    broadcaster.broadcast(general, createMessage(1));
    broadcaster.broadcast(general, createMessage(2));

    expect(entries.find((entry) => entry.msg === 'Evicting slow consumer')).toMatchObject({
      component: 'Broadcaster',
      chatroomId: 'general',
      consecutiveDrops: 1,
      error: {
        type: 'SlowConsumerError',
        code: 'SLOW_CONSUMER',
        message: 'Connection evicted as a slow consumer: slow',
      },
    });
  });

  it('should evict on the first drop with a zero threshold', async () => {
    const { registry, broadcaster } = setup(0);
    const slow = createActiveConnection('slow', 'general', ALICE, 1);
    const onClose = vi.fn();
    slow.onCloseRequested(onClose);
    await registry.admit(general, slow);

    broadcaster.broadcast(general, createMessage(1));
    const report = broadcaster.broadcast(general, createMessage(2));

    expect(report.evicted).toEqual(['slow']);
    expect(onClose).toHaveBeenCalledWith(4008, 'Slow consumer evicted');
  });
});
