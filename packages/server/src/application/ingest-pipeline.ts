/**
 * @file ingest-pipeline.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { Connection } from '../domain/entities/connection.js';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { MessageBroadcaster } from '../domain/ports/broadcaster.js';
import type { MessageStore, StoredMessage } from '../domain/ports/message-store.js';
import {
  InvalidPayloadError,
  NotMemberError,
  PersistenceFailureError,
} from '../domain/errors/domain-errors.js';
import { createChatMessageSchema, parseFrame } from '../protocol/schemas.js';

export interface IngestPipelineDeps {
  registry: ConnectionRegistry;
  messageStore: MessageStore;
  broadcaster: MessageBroadcaster;
  maxContentLength: number;
  logger: Logger;
}

/**
 * Turns an inbound frame into a stored, broadcast message.
 * A message is only ever broadcast after the store accepted it, and a slow write
 * holds back only its own message.
 */
export class IngestPipeline {
  private readonly registry: ConnectionRegistry;
  private readonly messageStore: MessageStore;
  private readonly broadcaster: MessageBroadcaster;
  private readonly schema: ReturnType<typeof createChatMessageSchema>;
  private readonly logger: Logger;

  constructor(deps: IngestPipelineDeps) {
    this.registry = deps.registry;
    this.messageStore = deps.messageStore;
    this.broadcaster = deps.broadcaster;
    this.schema = createChatMessageSchema(deps.maxContentLength);
    this.logger = deps.logger.child({ useCase: 'Ingest' });
  }

  async ingest(connection: Connection, rawPayload: string): Promise<StoredMessage> {
    const content = this.validate(rawPayload);
    const chatroomId = connection.chatroomId;

    const session = this.registry.getSession(chatroomId);
    if (!session?.has(connection.id)) {
      this.logger.warn(
        { chatroomId: chatroomId.value, connectionId: connection.id },
        'Rejected message from non-member'
      );
      throw new NotMemberError(chatroomId.value);
    }

    const senderId = connection.identity.userId;
    const pending = this.messageStore
      .append(chatroomId, senderId, content)
      .catch((error: unknown) => {
        this.logger.error(
          { error, chatroomId: chatroomId.value, senderId },
          'Message store rejected write'
        );
        throw new PersistenceFailureError();
      });

    return session.publishWhenReady(pending, (stored) => {
      this.broadcaster.broadcast(chatroomId, stored);
    });
  }

  private validate(rawPayload: string): string {
    const parsed = parseFrame(rawPayload);
    if (parsed === undefined) {
      throw new InvalidPayloadError('Invalid JSON');
    }

    const result = this.schema.safeParse(parsed);
    if (!result.success) {
      const flattened = result.error.flatten();
      const message = flattened.fieldErrors.content?.[0] ?? 'Invalid message payload';
      throw new InvalidPayloadError(message, flattened);
    }

    return result.data.content;
  }
}
