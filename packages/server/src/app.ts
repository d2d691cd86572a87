/**
 * @file app.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import Fastify, { type FastifyError } from 'fastify';
import type { Logger } from 'pino';
import type { Env } from './config/env.js';

export interface AppConfig {
  env: Pick<Env, 'TRUST_PROXY'>;
  logger: Logger;
}

/**
 * HTTP side of the server. WebSocket upgrades bypass these routes.
 */
export function createApp(config: AppConfig) {
  const app = Fastify({
    loggerInstance: config.logger,
    trustProxy: config.env.TRUST_PROXY,
    disableRequestLogging: true,
  });

  app.addHook('onResponse', async (request, reply) => {
    request.log.debug(
      {
        method: request.method,
        url: request.url,
        ip: request.ip,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      'Request completed'
    );
  });

  app.setErrorHandler((error: FastifyError, request, reply) => {
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 500) {
      request.log.error({ error }, 'Request failed');
    } else {
      request.log.warn({ statusCode, message: error.message }, 'Request rejected');
    }
    void reply.status(statusCode).send({
      error: error.message,
      code: error.code || 'INTERNAL_ERROR',
    });
  });

  app.setNotFoundHandler((_request, reply) => {
    void reply.status(404).send({ error: 'Not Found', code: 'NOT_FOUND' });
  });

  return app;
}

export type App = ReturnType<typeof createApp>;
