/**
 * @file health-route.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { ConnectionRegistry } from '../../domain/ports/connection-registry.js';

export interface HealthRouteConfig {
  version: string;
}

export interface HealthRouteDeps {
  registry: Pick<ConnectionRegistry, 'roomCount' | 'connectionCount'>;
}

export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  version: string;
  uptime: number;
  connections: {
    rooms: number;
    members: number;
  };
  timestamp: string;
}

interface AppWithGet {
  get: (path: string, handler: (request: FastifyRequest, reply: FastifyReply) => Promise<unknown>) => unknown;
}

/**
 * Registers the health check routes on the Fastify server.
 */
export function registerHealthRoute(
  app: AppWithGet,
  config: HealthRouteConfig,
  deps: HealthRouteDeps
): void {
  const startTime = Date.now();

  app.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const response: HealthResponse = {
      status: 'healthy',
      version: config.version,
      uptime: Math.floor((Date.now() - startTime) / 1000),
      connections: {
        rooms: deps.registry.roomCount(),
        members: deps.registry.connectionCount(),
      },
      timestamp: new Date().toISOString(),
    };

    return reply.status(200).send(response);
  });

  // Liveness
  app.get('/healthz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ok' });
  });

  // Readiness
  app.get('/readyz', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.status(200).send({ status: 'ready' });
  });
}
