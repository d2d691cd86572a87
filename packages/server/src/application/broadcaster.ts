/**
 * @file broadcaster.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { DeliveryReport, MessageBroadcaster } from '../domain/ports/broadcaster.js';
import type { StoredMessage } from '../domain/ports/message-store.js';
import type { Connection } from '../domain/entities/connection.js';
import type { ChatroomId } from '../domain/value-objects/chatroom-id.js';
import { toBroadcastMessage } from '../protocol/messages.js';
import { CLOSE_CODES, CLOSE_REASONS } from '../protocol/close-codes.js';
import { SlowConsumerError } from '../domain/errors/domain-errors.js';

export interface BroadcasterDeps {
  registry: ConnectionRegistry;
  /** Consecutive failed offers tolerated before eviction */
  dropThreshold: number;
  logger: Logger;
}

/**
 * Fans stored messages out to the live members of a chatroom.
 * Never waits on a receiver: a full queue counts as a drop, and a member
 * past the drop threshold is evicted once the fan-out is done.
 */
export class Broadcaster implements MessageBroadcaster {
  private readonly registry: ConnectionRegistry;
  private readonly dropThreshold: number;
  private readonly logger: Logger;

  constructor(deps: BroadcasterDeps) {
    this.registry = deps.registry;
    this.dropThreshold = deps.dropThreshold;
    this.logger = deps.logger.child({ component: 'Broadcaster' });
  }

  broadcast(
    chatroomId: ChatroomId,
    message: StoredMessage,
    excludeConnectionId?: string
  ): DeliveryReport {
    const members = this.registry.membersOf(chatroomId);
    const frame = JSON.stringify(toBroadcastMessage(message));

    const report: DeliveryReport = {
      chatroomId: chatroomId.value,
      recipients: 0,
      delivered: 0,
      skipped: 0,
      evicted: [],
    };
    const slowConsumers: Connection[] = [];

    for (const connection of members) {
      if (connection.id === excludeConnectionId) {
        continue;
      }
      report.recipients++;

      if (connection.enqueue(frame)) {
        report.delivered++;
        continue;
      }

      report.skipped++;
      if (connection.isAlive && connection.consecutiveDrops > this.dropThreshold) {
        slowConsumers.push(connection);
      }
    }

    for (const connection of slowConsumers) {
      this.logger.warn(
        {
          error: new SlowConsumerError(connection.id),
          chatroomId: chatroomId.value,
          consecutiveDrops: connection.consecutiveDrops,
          queued: connection.outbound.size,
        },
        'Evicting slow consumer'
      );
      connection.requestClose(
        CLOSE_CODES.SLOW_CONSUMER,
        CLOSE_REASONS[CLOSE_CODES.SLOW_CONSUMER]
      );
      report.evicted.push(connection.id);
    }

    this.logger.debug(
      {
        chatroomId: chatroomId.value,
        messageId: message.id,
        recipients: report.recipients,
        delivered: report.delivered,
        skipped: report.skipped,
        evicted: report.evicted.length,
      },
      'Broadcast complete'
    );

    return report;
  }
}
