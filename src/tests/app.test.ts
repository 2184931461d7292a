// ═══════════════════════════════════════════════════════════════════════════════
// APP TESTS — Route Mounting over a Local Listener
// ═══════════════════════════════════════════════════════════════════════════════

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import type { Server } from 'node:http';
import { createApp } from '../server.js';
import { ALL_A, createTestServices, type TestServices } from './helpers.js';

describe('createApp', () => {
  let services: TestServices;
  let server: Server;
  let baseUrl: string;

  beforeAll(async () => {
    services = createTestServices();
    const app = createApp(services);

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });

    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterAll(async () => {
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    });
  });

  it('should serve health checks under /api', async () => {
    const health = await fetch(`${baseUrl}/api/health`);
    const body: unknown = await health.json();

    expect(health.status).toBe(200);
    expect(body).toMatchObject({
      status: 'healthy',
      checks: { storage: { status: 'up', type: 'memory' }, model: { provider: 'mock', model: 'mock' } },
    });

    const ready = await fetch(`${baseUrl}/api/ready`);
    expect(ready.status).toBe(200);
    expect(await ready.json()).toMatchObject({ ready: true });
  });

  it('should not serve health checks at the root', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(response.status).toBe(404);
    expect(await response.json()).toMatchObject({ code: 'NOT_FOUND' });
  });

  it('should report persona statistics', async () => {
    await services.chatService.generatePersona('u1', ALL_A);

    const response = await fetch(`${baseUrl}/api/stats`);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      stats: { totalPersonas: 1, recent24h: 1, timestamp: '2024-03-01T09:00:00.000Z' },
    });
  });
});
