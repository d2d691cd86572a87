/**
 * @file connection-lifecycle.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import { Connection } from '../domain/entities/connection.js';
import type { ChatroomId } from '../domain/value-objects/chatroom-id.js';
import type { ConnectionRegistry } from '../domain/ports/connection-registry.js';
import type { TokenVerifier } from '../domain/ports/token-verifier.js';
import type { Transport } from '../domain/ports/transport.js';
import {
  DomainError,
  RoomUnknownError,
  TransportError,
  UnauthorizedError,
} from '../domain/errors/domain-errors.js';
import { ProtocolErrors } from '../protocol/errors.js';
import { CLOSE_CODES, CLOSE_REASONS } from '../protocol/close-codes.js';
import type { IngestPipeline } from './ingest-pipeline.js';

export interface ConnectionLifecycleDeps {
  tokenVerifier: TokenVerifier;
  registry: ConnectionRegistry;
  ingest: IngestPipeline;
  logger: Logger;
}

export interface ConnectionLifecycleParams {
  connectionId: string;
  chatroomId: ChatroomId;
  /** Bearer credential, forwarded verbatim to the verifier */
  token: string | undefined;
  transport: Transport;
  outboundCapacity: number;
}

export interface CloseOutcome {
  code: number;
  reason: string;
  /** Outbound frames still queued when the connection closed */
  discarded: number;
}

/**
 * Drives one connection from handshake to teardown:
 * authenticate, admit, run the inbound chain and the outbound loop, then
 * remove it from its room exactly once.
 */
export class ConnectionLifecycle {
  readonly connection: Connection;
  /** Resolves once the connection reached `closed` */
  readonly closed: Promise<CloseOutcome>;

  private readonly deps: ConnectionLifecycleDeps;
  private readonly transport: Transport;
  private readonly token: string | undefined;
  private readonly logger: Logger;
  private readonly closeSignal: Promise<void>;
  private signalClose: () => void = () => undefined;
  private resolveClosed: (outcome: CloseOutcome) => void = () => undefined;
  private readonly pendingInbound: string[] = [];
  private inboundTail: Promise<void> = Promise.resolve();
  private outboundLoop: Promise<void> | undefined;
  private peerClosed = false;

  constructor(deps: ConnectionLifecycleDeps, params: ConnectionLifecycleParams) {
    this.deps = deps;
    this.transport = params.transport;
    this.token = params.token;
    this.connection = new Connection({
      id: params.connectionId,
      chatroomId: params.chatroomId,
      outboundCapacity: params.outboundCapacity,
    });
    this.logger = deps.logger.child({
      component: 'ConnectionLifecycle',
      connectionId: params.connectionId,
      chatroomId: params.chatroomId.value,
    });

    this.closeSignal = new Promise<void>((resolve) => {
      this.signalClose = resolve;
    });
    this.closed = new Promise<CloseOutcome>((resolve) => {
      this.resolveClosed = resolve;
    });
  }

  /**
   * Runs authentication and admission. Resolves once the connection is
   * active or has been refused; never rejects.
   */
  async start(): Promise<void> {
    this.transport.onMessage((data) => this.handleInbound(data));
    this.transport.onClose(() => {
      this.peerClosed = true;
      this.close(CLOSE_CODES.NORMAL, CLOSE_REASONS[CLOSE_CODES.NORMAL]);
    });
    this.transport.onError((error) => this.failTransport(error, 'Socket error'));
    this.transport.onPong(() => this.connection.recordPong());
    this.connection.onCloseRequested((code, reason) => this.close(code, reason));

    try {
      this.connection.beginAuthentication();

      if (!this.token) {
        throw new UnauthorizedError('Missing bearer credential');
      }
      const identity = await this.deps.tokenVerifier.verify(this.token);
      if (!this.connection.isAlive) return;
      this.connection.markAuthenticated(identity);

      await this.deps.registry.admit(this.connection.chatroomId, this.connection);
      if (!this.connection.isAlive) return;

      this.connection.activate();
    } catch (error) {
      this.refuse(error);
      return;
    }

    this.logger.info({ userId: this.connection.identity.userId }, 'Connection active');

    this.outboundLoop = this.runOutboundLoop();

    const buffered = this.pendingInbound.splice(0);
    for (const data of buffered) {
      this.handleInbound(data);
    }
  }

  /**
   * Moves the connection to `closing` and tears it down. Idempotent.
   */
  close(code: number, reason: string): void {
    if (!this.connection.beginClosing()) {
      return;
    }
    this.signalClose();

    // No-op when the connection was never admitted
    this.deps.registry.remove(this.connection.chatroomId, this.connection.id);

    const discarded = this.connection.outbound.close();
    this.pendingInbound.length = 0;

    if (!this.peerClosed) {
      try {
        this.transport.close(code, reason);
      } catch (error) {
        this.logger.warn({ error }, 'Failed to close transport');
      }
    }

    this.connection.markClosed();
    const durationMs = Date.now() - this.connection.connectedAt.getTime();
    this.logger.info({ code, reason, discarded, durationMs }, 'Connection closed');
    this.resolveClosed({ code, reason, discarded });
  }

  /**
   * Sends a heartbeat ping to the peer of an open connection.
   */
  ping(): void {
    if (!this.connection.isAlive) return;
    try {
      this.transport.ping();
    } catch (error) {
      this.logger.warn({ error }, 'Failed to send ping');
    }
  }

  /**
   * Resolves when both loops have finished after close.
   */
  async drained(): Promise<void> {
    await this.closed;
    await this.inboundTail;
    await this.outboundLoop;
  }

  private handleInbound(data: string): void {
    const state = this.connection.state;

    if (state === 'connecting' || state === 'authenticating' || state === 'admitted') {
      if (this.pendingInbound.length < this.connection.outbound.capacity) {
        this.pendingInbound.push(data);
      } else {
        this.logger.warn('Dropping frame received before admission');
      }
      return;
    }

    if (state !== 'active') {
      return;
    }

    this.inboundTail = this.inboundTail.then(() => this.ingestFrame(data));
  }

  private async ingestFrame(data: string): Promise<void> {
    if (!this.connection.isActive) {
      return;
    }
    try {
      await this.deps.ingest.ingest(this.connection, data);
    } catch (error) {
      if (!(error instanceof DomainError)) {
        this.logger.error({ error }, 'Unexpected error while ingesting message');
      }
      this.acknowledgeError(error);
    }
  }

  /**
   * Acks bypass `Connection.enqueue`: only broadcasts count toward the slow-consumer policy.
   */
  private acknowledgeError(error: unknown): void {
    if (!this.connection.isAlive) return;
    const frame = JSON.stringify(ProtocolErrors.fromError(error));
    if (!this.connection.outbound.offer(frame)) {
      this.logger.warn('Could not queue error acknowledgment');
    }
  }

  private failTransport(cause: unknown, context: string): void {
    const error = new TransportError(cause);
    this.logger.warn({ error }, context);
    this.close(CLOSE_CODES.INTERNAL_ERROR, error.message);
  }

  private async runOutboundLoop(): Promise<void> {
    for (;;) {
      const frame = await this.connection.outbound.next();
      if (frame === undefined) {
        return;
      }
      try {
        await Promise.race([this.transport.send(frame), this.closeSignal]);
      } catch (error) {
        this.failTransport(error, 'Outbound write failed');
        return;
      }
      if (!this.connection.isAlive) {
        return;
      }
    }
  }

  private refuse(error: unknown): void {
    if (error instanceof UnauthorizedError) {
      this.logger.warn({ reason: error.message }, 'Connection refused: unauthorized');
      this.close(CLOSE_CODES.UNAUTHORIZED, CLOSE_REASONS[CLOSE_CODES.UNAUTHORIZED]);
    } else if (error instanceof RoomUnknownError) {
      this.logger.warn('Connection refused: chatroom not found');
      this.close(CLOSE_CODES.ROOM_NOT_FOUND, CLOSE_REASONS[CLOSE_CODES.ROOM_NOT_FOUND]);
    } else {
      this.logger.error({ error }, 'Connection setup failed');
      this.close(CLOSE_CODES.INTERNAL_ERROR, CLOSE_REASONS[CLOSE_CODES.INTERNAL_ERROR]);
    }
  }
}
