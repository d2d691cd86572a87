/**
 * @file health-route.test.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { createApp, type App } from '../../../../src/app.js';
import { registerHealthRoute } from '../../../../src/infrastructure/http/health-route.js';
import { createTestLogger } from '../../../helpers/logger.js';

describe('health routes', () => {
  let app: App;

  beforeEach(async () => {
    app = createApp({ env: { TRUST_PROXY: false }, logger: createTestLogger() });
    registerHealthRoute(
      app,
      { version: '1.2.3' },
      { registry: { roomCount: () => 2, connectionCount: () => 5 } }
    );
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('should report status, version and live counts', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    const body: unknown = response.json();
    expect(body).toMatchObject({
      status: 'healthy',
      version: '1.2.3',
      connections: { rooms: 2, members: 5 },
    });
  });

  it('should answer the liveness check', async () => {
    const response = await app.inject({ method: 'GET', url: '/healthz' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('should answer the readiness check', async () => {
    const response = await app.inject({ method: 'GET', url: '/readyz' });

    expect(response.json()).toEqual({ status: 'ready' });
  });

  it('should answer unknown routes with 404', async () => {
    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Not Found', code: 'NOT_FOUND' });
  });
});
