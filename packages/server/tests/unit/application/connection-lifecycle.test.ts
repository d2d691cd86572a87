/**
 * @file connection-lifecycle.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { describe, it, expect } from 'vitest';
import { ChatroomId } from '../../../src/domain/value-objects/chatroom-id.js';
import type { Identity } from '../../../src/domain/value-objects/identity.js';
import type { TokenVerifier } from '../../../src/domain/ports/token-verifier.js';
import { deferred, flush } from '../../helpers/fakes.js';
import { ALICE, BOB, createHarness } from '../../helpers/harness.js';
import { createRecordingLogger } from '../../helpers/logger.js';

const general = ChatroomId.create('general');

const broadcastFrame = (id: number, senderId: string, content: string) => ({
  id,
  chatroom_id: 'general',
  sender_id: senderId,
  content,
  created_at: '2025-01-01T00:00:00.000Z',
});

class GatedVerifier implements TokenVerifier {
  readonly gate = deferred<Identity>();

  verify(): Promise<Identity> {
    return this.gate.promise;
  }
}

describe('ConnectionLifecycle', () => {
  describe('handshake', () => {
    it('should become active and join the room with a valid token', async () => {
      const harness = createHarness();
      const { lifecycle, transport } = await harness.connect('token-alice');

      expect(lifecycle.connection.state).toBe('active');
      expect(lifecycle.connection.identity).toEqual(ALICE);
      expect(harness.registry.isMember(general, lifecycle.connection.id)).toBe(true);
      expect(transport.closes).toEqual([]);
    });

    it('should close with 4001 for an invalid token', async () => {
      const harness = createHarness();
      const { lifecycle, transport } = await harness.connect('not-a-token');

      expect(transport.closes).toEqual([{ code: 4001, reason: 'Unauthorized' }]);
      expect(await lifecycle.closed).toEqual({ code: 4001, reason: 'Unauthorized', discarded: 0 });
      expect(lifecycle.connection.state).toBe('closed');
      expect(harness.registry.connectionCount()).toBe(0);
      expect(transport.sent).toEqual([]);
    });

    it('should close with 4001 when no token was sent', async () => {
      const harness = createHarness();
      const { transport } = await harness.connect(undefined);

      expect(transport.lastClose?.code).toBe(4001);
    });

    it('should close with 4004 for an unknown room', async () => {
      const harness = createHarness();
      const { transport } = await harness.connect('token-alice', 'lobby');

      expect(transport.closes).toEqual([{ code: 4004, reason: 'Chatroom not found' }]);
      expect(harness.registry.roomCount()).toBe(0);
    });

    it('should close with 1011 when token verification fails unexpectedly', async () => {
      const tokenVerifier: TokenVerifier = {
        verify: () => Promise.reject(new Error('key store offline')),
      };
      const harness = createHarness({ tokenVerifier });
      const { transport } = await harness.connect('token-alice');

      expect(transport.closes).toEqual([{ code: 1011, reason: 'Internal error' }]);
    });

    it('should not admit a connection closed during authentication', async () => {
      const tokenVerifier = new GatedVerifier();
      const harness = createHarness({ tokenVerifier });
      const { lifecycle } = harness.open('token-alice');

      const started = lifecycle.start();
      lifecycle.close(1001, 'Server shutting down');
      tokenVerifier.gate.resolve(ALICE);
      await started;

      expect(lifecycle.connection.state).toBe('closed');
      expect(harness.registry.connectionCount()).toBe(0);
      expect((await lifecycle.closed).code).toBe(1001);
    });

    it('should replay frames received before activation', async () => {
      const tokenVerifier = new GatedVerifier();
      const harness = createHarness({ tokenVerifier });
      const { lifecycle, transport } = harness.open('token-alice');

      const started = lifecycle.start();
      transport.say('early');
      tokenVerifier.gate.resolve(ALICE);
      await started;
      await flush();

      expect(harness.store.messages.map((m) => m.content)).toEqual(['early']);
      expect(transport.frames()).toEqual([broadcastFrame(1, '1', 'early')]);
    });
  });

  describe('messaging', () => {
    it('should deliver a message to every member of the room', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');

      r1.transport.say('hello');
      await flush();

      expect(harness.store.messages).toHaveLength(1);
      expect(r1.transport.frames()).toEqual([broadcastFrame(1, '1', 'hello')]);
      expect(r2.transport.frames()).toEqual([broadcastFrame(1, '1', 'hello')]);
    });

    it('should not deliver across rooms', async () => {
      const harness = createHarness();
      const inGeneral = await harness.connect('token-alice', 'general');
      const inRandom = await harness.connect('token-bob', 'random');

      inGeneral.transport.say('hello');
      await flush();

      expect(inGeneral.transport.sent).toHaveLength(1);
      expect(inRandom.transport.sent).toEqual([]);
    });

    it('should keep one sender\'s messages in order', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');

      r1.transport.say('one');
      r1.transport.say('two');
      r1.transport.say('three');
      await flush();

      expect(r2.transport.frames()).toEqual([
        broadcastFrame(1, '1', 'one'),
        broadcastFrame(2, '1', 'two'),
        broadcastFrame(3, '1', 'three'),
      ]);
    });

    it('should acknowledge an invalid payload to the sender only', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');

      r1.transport.receive('not json');
      await flush();

      expect(r1.transport.frames()).toEqual([
        { type: 'error', payload: { code: 'INVALID_PAYLOAD', message: 'Invalid JSON' } },
      ]);
      expect(r2.transport.sent).toEqual([]);
      expect(r1.lifecycle.connection.state).toBe('active');
      expect(harness.store.messages).toHaveLength(0);
    });

    it('should acknowledge a store failure and keep the connection open', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');
      harness.store.failNext();

      r1.transport.say('lost');
      await flush();

      expect(r1.transport.frames()).toEqual([
        {
          type: 'error',
          payload: { code: 'PERSISTENCE_FAILURE', message: 'Message could not be stored' },
        },
      ]);
      expect(r2.transport.sent).toEqual([]);

      r1.transport.say('kept');
      await flush();
      expect(r2.transport.frames()).toEqual([broadcastFrame(1, '1', 'kept')]);
    });

    it('should not deliver to anyone before the store confirms', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');
      const gate = harness.store.hold();

      r1.transport.say('slow write');
      await flush();
      expect(r2.transport.sent).toEqual([]);

      gate.resolve();
      await flush();
      expect(r2.transport.sent).toHaveLength(1);
    });

    it('should deliver a stored message while another member\'s write is held', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');
      const r3 = await harness.connect('token-carol');
      const aliceWrite = harness.store.hold();

      r1.transport.say('from alice');
      await flush();
      r2.transport.say('from bob');
      await flush();

      expect(harness.store.messages.map((m) => m.content)).toEqual(['from bob']);
      for (const client of [r1, r2, r3]) {
        expect(client.transport.frames()).toEqual([broadcastFrame(1, '2', 'from bob')]);
      }

      aliceWrite.resolve();
      await flush();

      expect(r3.transport.frames()).toEqual([
        broadcastFrame(1, '2', 'from bob'),
        broadcastFrame(2, '1', 'from alice'),
      ]);
    });

    it('should not count an error acknowledgment toward slow-consumer drops', async () => {
      const harness = createHarness({ outboundCapacity: 1 });
      const stalled = await harness.connect('token-alice');
      const sender = await harness.connect('token-bob');
      stalled.transport.sendMode = 'hang';

      for (const content of ['m1', 'm2', 'm3']) {
        sender.transport.say(content);
        await flush();
      }
      expect(stalled.lifecycle.connection.consecutiveDrops).toBe(1);

      stalled.transport.receive('not json');
      await flush();

      expect(stalled.lifecycle.connection.consecutiveDrops).toBe(1);
      expect(stalled.lifecycle.connection.outbound.size).toBe(1);
      expect(stalled.lifecycle.connection.state).toBe('active');
    });
  });

  describe('teardown', () => {
    it('should leave the room when the peer closes', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');

      r1.transport.peerClose();
      expect(await r1.lifecycle.closed).toEqual({ code: 1000, reason: 'Normal closure', discarded: 0 });
      expect(r1.transport.closes).toEqual([]);
      expect(harness.registry.isMember(general, r1.lifecycle.connection.id)).toBe(false);

      r2.transport.say('anyone?');
      await flush();
      expect(r1.transport.sent).toEqual([]);
      expect(r2.transport.sent).toHaveLength(1);
    });

    it('should remove the connection and close the socket once', async () => {
      const harness = createHarness();
      const { lifecycle, transport } = await harness.connect('token-alice');

      lifecycle.close(1001, 'Server shutting down');
      lifecycle.close(1000, 'Normal closure');
      transport.peerClose();

      expect(transport.closes).toEqual([{ code: 1001, reason: 'Server shutting down' }]);
      expect((await lifecycle.closed).code).toBe(1001);
      expect(harness.registry.connectionCount()).toBe(0);
      await lifecycle.drained();
    });

    it('should evict a dead peer and keep the room working', async () => {
      const harness = createHarness();
      const r1 = await harness.connect('token-alice');
      const r2 = await harness.connect('token-bob');
      r2.transport.sendMode = 'reject';

      r1.transport.say('first');
      await flush();

      expect(await r2.lifecycle.closed).toEqual({ code: 1011, reason: 'Transport error', discarded: 0 });
      expect(harness.registry.isMember(general, r2.lifecycle.connection.id)).toBe(false);

      r1.transport.say('second');
      await flush();
      expect(r1.transport.frames()).toEqual([
        broadcastFrame(1, '1', 'first'),
        broadcastFrame(2, '1', 'second'),
      ]);
    });

    it('should log a socket error as a TransportError and close with 1011', async () => {
      const { logger, entries } = createRecordingLogger();
      const harness = createHarness({ logger });
      const { lifecycle, transport } = await harness.connect('token-alice');

      transport.fail(new Error('ECONNRESET'));

      expect(await lifecycle.closed).toEqual({ code: 1011, reason: 'Transport error', discarded: 0 });
      expect(transport.closes).toEqual([{ code: 1011, reason: 'Transport error' }]);
      expect(entries.find((entry) => entry.msg === 'Socket error')).toMatchObject({
        component: 'ConnectionLifecycle',
        error: { type: 'TransportError', code: 'TRANSPORT_ERROR', message: 'Transport error' },
      });
      expect(entries.find((entry) => entry.msg === 'Connection closed')).toMatchObject({
        code: 1011,
        reason: 'Transport error',
        durationMs: expect.any(Number),
      });
    });

    it('should log a failed write as a TransportError', async () => {
      const { logger, entries } = createRecordingLogger();
      const harness = createHarness({ logger });
      const { lifecycle, transport } = await harness.connect('token-alice');
      transport.sendMode = 'reject';

      transport.say('hello');
      await flush();

      expect((await lifecycle.closed).code).toBe(1011);
      expect(entries.find((entry) => entry.msg === 'Outbound write failed')).toMatchObject({
        error: { type: 'TransportError', code: 'TRANSPORT_ERROR' },
      });
    });

    it('should evict a slow consumer without stalling the room', async () => {
      const harness = createHarness({ outboundCapacity: 2, dropThreshold: 1 });
      const sender = await harness.connect('token-alice');
      const stalled = await harness.connect('token-bob');
      stalled.transport.sendMode = 'hang';

      for (const content of ['m1', 'm2', 'm3', 'm4', 'm5']) {
        sender.transport.say(content);
        await flush();
      }

      expect(await stalled.lifecycle.closed).toEqual({
        code: 4008,
        reason: 'Slow consumer evicted',
        discarded: 2,
      });
      expect(stalled.transport.closes).toEqual([{ code: 4008, reason: 'Slow consumer evicted' }]);
      expect(harness.registry.isMember(general, stalled.lifecycle.connection.id)).toBe(false);
      expect(sender.transport.sent).toHaveLength(5);
      await stalled.lifecycle.drained();
    });
  });

  describe('heartbeat', () => {
    it('should ping the peer and record pongs', async () => {
      const harness = createHarness();
      const { lifecycle, transport } = await harness.connect('token-alice');
      const before = lifecycle.connection.lastPongAt.getTime();

      lifecycle.ping();
      transport.pong();

      expect(transport.pings).toBe(1);
      expect(lifecycle.connection.lastPongAt.getTime()).toBeGreaterThanOrEqual(before);
    });

    it('should not ping a closed connection', async () => {
      const harness = createHarness();
      const { lifecycle, transport } = await harness.connect('token-alice');
      lifecycle.close(1000, 'Normal closure');

      lifecycle.ping();

      expect(transport.pings).toBe(0);
    });
  });
});
