/**
 * @file websocket-server.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { WebSocketServer as WSServer, type WebSocket } from 'ws';
import type { IncomingMessage, Server } from 'http';
import type { Duplex } from 'stream';
import type { Logger } from 'pino';
import type { ConnectionHandler } from './connection-handler.js';
import { WsTransport } from './ws-transport.js';
import { parseConnectionRequest, type ConnectionRequest } from './request-parser.js';
import { CLOSE_CODES, CLOSE_REASONS } from '../../protocol/close-codes.js';

export interface WebSocketServerConfig {
  path: string;
  heartbeatIntervalMs: number;
  connectionTimeoutMs: number;
  maxPayloadBytes: number;
}

export interface WebSocketServerDeps {
  connectionHandler: ConnectionHandler;
  logger: Logger;
}

/**
 * WebSocket server wrapper that takes over upgrade requests on the chatroom path
 * of the HTTP server and runs the heartbeat.
 */
export class WebSocketServerWrapper {
  private wss: WSServer | null = null;
  private heartbeatInterval: NodeJS.Timeout | null = null;
  private readonly config: WebSocketServerConfig;
  private readonly deps: WebSocketServerDeps;
  private readonly logger: Logger;

  constructor(config: WebSocketServerConfig, deps: WebSocketServerDeps) {
    this.config = config;
    this.deps = deps;
    this.logger = deps.logger.child({ component: 'WebSocketServer' });
  }

  /**
   * Attaches the WebSocket server to an HTTP server.
   */
  attach(httpServer: Server): void {
    const wss = new WSServer({
      noServer: true,
      maxPayload: this.config.maxPayloadBytes,
    });
    this.wss = wss;

    httpServer.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
      this.handleUpgrade(wss, request, socket, head);
    });

    wss.on('error', (error) => {
      this.logger.error({ error }, 'WebSocket server error');
    });

    this.startHeartbeatCheck();

    this.logger.info({ path: this.config.path }, 'WebSocket server attached');
  }

  /**
   * Returns the number of connected sockets.
   */
  get connectionCount(): number {
    return this.wss?.clients.size ?? 0;
  }

  /**
   * Closes every connection with GOING_AWAY, then the server, waiting at most `timeoutMs`.
   */
  async close(timeoutMs = 5000): Promise<void> {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }

    const wss = this.wss;
    if (!wss) return;
    this.wss = null;

    this.logger.info({ clientCount: wss.clients.size }, 'Closing WebSocket server');

    this.deps.connectionHandler.closeAll(
      CLOSE_CODES.GOING_AWAY,
      CLOSE_REASONS[CLOSE_CODES.GOING_AWAY]
    );

    let timer: NodeJS.Timeout | undefined;

    const closePromise = new Promise<void>((resolve) => {
      wss.close((err) => {
        if (err) {
          this.logger.error({ error: err }, 'Error closing WebSocket server');
        } else {
          this.logger.info('WebSocket server closed gracefully');
        }
        resolve();
      });
    });

    const timeoutPromise = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        this.logger.warn(
          { timeoutMs, remainingClients: wss.clients.size },
          'WebSocket graceful close timed out, forcing termination'
        );
        wss.clients.forEach((client) => client.terminate());
        resolve();
      }, timeoutMs);
    });

    await Promise.race([closePromise, timeoutPromise]);
    clearTimeout(timer);
  }

  private handleUpgrade(
    wss: WSServer,
    request: IncomingMessage,
    socket: Duplex,
    head: Buffer
  ): void {
    const connectionRequest = parseConnectionRequest(
      request.url ?? '/',
      request.headers.authorization,
      this.config.path
    );

    if (!connectionRequest) {
      this.logger.debug({ url: request.url?.split('?')[0] }, 'Rejected upgrade on unknown path');
      socket.write('HTTP/1.1 404 Not Found\r\nConnection: close\r\n\r\n');
      socket.destroy();
      return;
    }

    wss.handleUpgrade(request, socket, head, (ws: WebSocket) => {
      this.onConnection(ws, connectionRequest);
    });
  }

  private onConnection(ws: WebSocket, request: ConnectionRequest): void {
    this.deps.connectionHandler.handleConnection(new WsTransport(ws), request);
  }

  private startHeartbeatCheck(): void {
    this.heartbeatInterval = setInterval(() => {
      this.deps.connectionHandler.checkTimeouts(this.config.connectionTimeoutMs);
    }, this.config.heartbeatIntervalMs);
  }
}
