// ═══════════════════════════════════════════════════════════════════════════════
// HEALTH ROUTES — /api/health and /api/ready endpoints
// ═══════════════════════════════════════════════════════════════════════════════

import { Router, type Request, type Response } from 'express';
import type { KeyValueStore } from '../../storage/index.js';
import { loadConfig } from '../../config/index.js';
import { getLogger } from '../../logging/index.js';
import { asyncHandler } from '../middleware/error-handler.js';

// ─────────────────────────────────────────────────────────────────────────────────
// TYPES
// ─────────────────────────────────────────────────────────────────────────────────

export interface ComponentHealth {
  status: 'up' | 'degraded' | 'down';
  latency?: number;
  message?: string;
}

export interface HealthCheck {
  status: 'healthy' | 'degraded' | 'unhealthy';
  timestamp: string;
  environment: string;
  uptime: number;
  checks: {
    storage: ComponentHealth & { type: 'redis' | 'memory' };
    model: { provider: string; model: string };
  };
}

export interface HealthRouterOptions {
  store: KeyValueStore;
  usingRedis: () => boolean;
  replyModel: { name: string; model: string };
}

const SLOW_STORE_MS = 1000;

// ─────────────────────────────────────────────────────────────────────────────────
// HEALTH CHECK FUNCTIONS
// ─────────────────────────────────────────────────────────────────────────────────

export async function checkStorage(store: KeyValueStore): Promise<ComponentHealth> {
  const start = Date.now();

  try {
    await store.ping();
    const latency = Date.now() - start;

    if (latency > SLOW_STORE_MS) {
      return { status: 'degraded', latency, message: 'High latency' };
    }
    return { status: 'up', latency };
  } catch (error) {
    return {
      status: 'down',
      message: error instanceof Error ? error.message : 'Storage check failed',
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────────
// ROUTES
// ─────────────────────────────────────────────────────────────────────────────────

export function createHealthRouter(options: HealthRouterOptions): Router {
  const router = Router();
  const logger = getLogger({ component: 'health' });

  // ─── HEALTH CHECK (liveness) ───
  router.get('/health', asyncHandler(async (_req: Request, res: Response) => {
    const config = loadConfig();
    const storage = await checkStorage(options.store);

    const health: HealthCheck = {
      status: storage.status === 'down' ? 'unhealthy' : storage.status === 'up' ? 'healthy' : 'degraded',
      timestamp: new Date().toISOString(),
      environment: config.env.environment,
      uptime: process.uptime(),
      checks: {
        storage: { ...storage, type: options.usingRedis() ? 'redis' : 'memory' },
        model: { provider: options.replyModel.name, model: options.replyModel.model },
      },
    };

    if (health.status !== 'healthy') {
      logger.warn('Health check degraded', { status: health.status, storage: storage.status });
    }

    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  }));

  // ─── READINESS CHECK ───
  router.get('/ready', asyncHandler(async (_req: Request, res: Response) => {
    const storage = await checkStorage(options.store);
    const ready = storage.status !== 'down';

    if (!ready) {
      logger.error('Readiness check failed', undefined, { message: storage.message });
    }

    res.status(ready ? 200 : 503).json({ ready, timestamp: new Date().toISOString() });
  }));

  return router;
}
