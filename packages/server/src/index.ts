/**
 * @file index.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

export * from './domain/index.js';
export * from './protocol/index.js';
export * from './application/index.js';
export * from './infrastructure/websocket/index.js';

export { InMemoryConnectionRegistry } from './infrastructure/persistence/in-memory-registry.js';
export { MessageRepository } from './infrastructure/persistence/repositories/message-repository.js';
export { ChatroomRepository } from './infrastructure/persistence/repositories/chatroom-repository.js';
export { initDatabase, getDatabase, closeDatabase } from './infrastructure/persistence/database/client.js';
export { JwtTokenVerifier, type JwtTokenVerifierConfig } from './infrastructure/auth/jwt-token-verifier.js';
export { createLogger, logSerializers, type LoggerConfig } from './infrastructure/logging/pino-logger.js';
export { registerHealthRoute } from './infrastructure/http/health-route.js';
export { createApp, type App } from './app.js';
