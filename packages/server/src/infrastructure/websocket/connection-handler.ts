/**
 * @file connection-handler.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type { Logger } from 'pino';
import type { TokenVerifier } from '../../domain/ports/token-verifier.js';
import type { ConnectionRegistry } from '../../domain/ports/connection-registry.js';
import type { Transport } from '../../domain/ports/transport.js';
import type { IngestPipeline } from '../../application/ingest-pipeline.js';
import { ConnectionLifecycle } from '../../application/connection-lifecycle.js';
import { CLOSE_CODES, CLOSE_REASONS } from '../../protocol/close-codes.js';
import type { ConnectionRequest } from './request-parser.js';

export interface ConnectionHandlerDeps {
  tokenVerifier: TokenVerifier;
  registry: ConnectionRegistry;
  ingest: IngestPipeline;
  outboundCapacity: number;
  generateConnectionId: () => string;
  logger: Logger;
}

/**
 * Starts a lifecycle for every accepted socket and keeps track of the live ones
 * for heartbeats and shutdown.
 */
export class ConnectionHandler {
  private readonly lifecycles = new Set<ConnectionLifecycle>();
  private readonly deps: ConnectionHandlerDeps;
  private readonly logger: Logger;

  constructor(deps: ConnectionHandlerDeps) {
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'ConnectionHandler' });
  }

  /**
   * Returns the number of connections not yet closed.
   */
  get connectionCount(): number {
    return this.lifecycles.size;
  }

  /**
   * Sets up a new connection. Authentication and admission continue in the background.
   */
  handleConnection(transport: Transport, request: ConnectionRequest): ConnectionLifecycle {
    const lifecycle = new ConnectionLifecycle(
      {
        tokenVerifier: this.deps.tokenVerifier,
        registry: this.deps.registry,
        ingest: this.deps.ingest,
        logger: this.deps.logger,
      },
      {
        connectionId: this.deps.generateConnectionId(),
        chatroomId: request.chatroomId,
        token: request.token,
        transport,
        outboundCapacity: this.deps.outboundCapacity,
      }
    );

    this.lifecycles.add(lifecycle);
    void lifecycle.closed.then(() => {
      this.lifecycles.delete(lifecycle);
    });
    void lifecycle.start();

    this.logger.debug(
      { connectionId: lifecycle.connection.id, chatroomId: request.chatroomId.value },
      'Connection accepted'
    );

    return lifecycle;
  }

  /**
   * Closes connections that stopped answering pings and pings the rest.
   * Returns the number of connections closed.
   */
  checkTimeouts(timeoutMs: number): number {
    let closed = 0;

    for (const lifecycle of Array.from(this.lifecycles)) {
      if (lifecycle.connection.hasTimedOut(timeoutMs)) {
        lifecycle.close(CLOSE_CODES.TIMED_OUT, CLOSE_REASONS[CLOSE_CODES.TIMED_OUT]);
        closed++;
      } else {
        lifecycle.ping();
      }
    }

    if (closed > 0) {
      this.logger.info({ closed, remaining: this.lifecycles.size }, 'Timeout check completed');
    }

    return closed;
  }

  /**
   * Closes every live connection, e.g. on shutdown.
   */
  closeAll(code: number = CLOSE_CODES.GOING_AWAY, reason = CLOSE_REASONS[CLOSE_CODES.GOING_AWAY]): void {
    for (const lifecycle of Array.from(this.lifecycles)) {
      lifecycle.close(code, reason);
    }
  }
}
