#!/usr/bin/env node
/**
 * @file main.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import { nanoid } from "nanoid";
import { createApp } from "./app.js";
import { getEnv } from "./config/env.js";
import { CONNECTION_TIMING, WEBSOCKET_CONFIG } from "./config/constants.js";
import { getServerVersion } from "./utils/version.js";
import { createLogger } from "./infrastructure/logging/pino-logger.js";
import {
  initDatabase,
  closeDatabase,
} from "./infrastructure/persistence/database/client.js";
import { MessageRepository } from "./infrastructure/persistence/repositories/message-repository.js";
import { ChatroomRepository } from "./infrastructure/persistence/repositories/chatroom-repository.js";
import { InMemoryConnectionRegistry } from "./infrastructure/persistence/in-memory-registry.js";
import { JwtTokenVerifier } from "./infrastructure/auth/jwt-token-verifier.js";
import { registerHealthRoute } from "./infrastructure/http/health-route.js";
import {
  ConnectionHandler,
  WebSocketServerWrapper,
} from "./infrastructure/websocket/index.js";
import { Broadcaster, IngestPipeline } from "./application/index.js";

/**
 * Bootstraps and starts the chatroom server.
 */
async function bootstrap(): Promise<void> {
  const version = getServerVersion();
  const env = getEnv();

  const logger = createLogger({
    name: "roomcast",
    level: env.LOG_LEVEL,
    pretty: env.NODE_ENV === "development",
  });

  logger.info(
    {
      version,
      nodeEnv: env.NODE_ENV,
      port: env.PORT,
      trustProxy: env.TRUST_PROXY,
      databasePath: env.DATABASE_PATH,
    },
    "Starting chatroom server"
  );

  // Persistence
  initDatabase(env.DATABASE_PATH);
  const messageStore = new MessageRepository();
  const roomDirectory = new ChatroomRepository();

  // Core
  const tokenVerifier = new JwtTokenVerifier(
    { secret: env.JWT_SECRET, algorithm: env.JWT_ALGORITHM },
    logger
  );

  const registry = new InMemoryConnectionRegistry({ roomDirectory, logger });

  const broadcaster = new Broadcaster({
    registry,
    dropThreshold: env.SLOW_CONSUMER_DROP_THRESHOLD,
    logger,
  });

  const ingest = new IngestPipeline({
    registry,
    messageStore,
    broadcaster,
    maxContentLength: env.MAX_MESSAGE_LENGTH,
    logger,
  });

  const connectionHandler = new ConnectionHandler({
    tokenVerifier,
    registry,
    ingest,
    outboundCapacity: env.OUTBOUND_QUEUE_CAPACITY,
    generateConnectionId: () => nanoid(16),
    logger,
  });

  // HTTP
  const app = createApp({ env, logger });
  registerHealthRoute(app, { version }, { registry });

  const wsServer = new WebSocketServerWrapper(
    {
      path: env.WS_PATH,
      heartbeatIntervalMs: CONNECTION_TIMING.HEARTBEAT_INTERVAL_MS,
      connectionTimeoutMs: CONNECTION_TIMING.PONG_TIMEOUT_MS,
      maxPayloadBytes: WEBSOCKET_CONFIG.MAX_PAYLOAD_BYTES,
    },
    { connectionHandler, logger }
  );

  try {
    await app.listen({ port: env.PORT, host: env.HOST });

    wsServer.attach(app.server);

    logger.info(
      {
        address: `http://${env.HOST}:${env.PORT}`,
        wsPath: `${env.WS_PATH}/:chatroomId`,
      },
      "Chatroom server is running"
    );
  } catch (error) {
    logger.fatal({ error }, "Failed to start server");
    closeDatabase();
    process.exit(1);
  }

  const SHUTDOWN_TIMEOUT_MS = 10_000;
  let shuttingDown = false;

  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, "Shutdown signal received");

    const forceExitTimer = setTimeout(() => {
      logger.error("Shutdown timed out, forcing exit");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      // Sends GOING_AWAY to every connection first
      await wsServer.close(CONNECTION_TIMING.SHUTDOWN_GRACE_MS);

      await app.close();
      closeDatabase();

      clearTimeout(forceExitTimer);
      logger.info("Shutdown complete");
      process.exit(0);
    } catch (error) {
      clearTimeout(forceExitTimer);
      logger.error({ error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  process.on("unhandledRejection", (reason, promise) => {
    logger.error({ reason, promise }, "Unhandled rejection");
  });

  process.on("uncaughtException", (error) => {
    logger.fatal({ error }, "Uncaught exception");
    process.exit(1);
  });
}

bootstrap().catch((error: unknown) => {
  console.error("Failed to bootstrap:", error);
  process.exit(1);
});
