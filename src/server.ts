// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Express Application and Process Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════

import express, { type Express, type NextFunction, type Request, type Response } from 'express';
import type { Server } from 'node:http';
import { v4 as uuidv4 } from 'uuid';
import { loadConfig } from './config/index.js';
import { getLogger, logRequest } from './logging/index.js';
import { storeManager } from './storage/index.js';
import { createServices, type Services } from './services/index.js';
import { createApiRouter, createHealthRouter } from './api/routes/index.js';
import { ApiError, errorHandler } from './api/middleware/error-handler.js';

const logger = getLogger({ component: 'server' });

const SHUTDOWN_TIMEOUT_MS = 10_000;

// ─────────────────────────────────────────────────────────────────────────────────
// MIDDLEWARE
// ─────────────────────────────────────────────────────────────────────────────────

function requestLogging(req: Request, res: Response, next: NextFunction): void {
  const startedAt = Date.now();
  const incoming = req.header('x-request-id');
  const requestId = incoming && incoming.length <= 128 ? incoming : uuidv4();
  res.setHeader('X-Request-Id', requestId);

  res.on('finish', () => {
    logRequest({
      requestId,
      method: req.method,
      path: req.path,
      statusCode: res.statusCode,
      duration: Date.now() - startedAt,
      userAgent: req.header('user-agent'),
    });
  });

  next();
}

function cors(origin: string) {
  return (req: Request, res: Response, next: NextFunction): void => {
    res.setHeader('Access-Control-Allow-Origin', origin);
    res.setHeader('Access-Control-Allow-Methods', 'GET,POST,DELETE,OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type,X-Request-Id');

    if (req.method === 'OPTIONS') {
      res.status(204).end();
      return;
    }
    next();
  };
}

// ─────────────────────────────────────────────────────────────────────────────────
// APP
// ─────────────────────────────────────────────────────────────────────────────────

export function createApp(services: Services): Express {
  const { server } = loadConfig();
  const app = express();

  app.disable('x-powered-by');
  app.use(cors(server.corsOrigin));
  app.use(express.json({ limit: '100kb' }));
  app.use(requestLogging);

  app.use('/api', createHealthRouter({
    store: services.kvStore,
    usingRedis: () => storeManager.isUsingRedis(),
    replyModel: services.replyGenerator,
  }));
  app.use('/api', createApiRouter(services));

  app.use((req: Request, _res: Response, next: NextFunction) => {
    next(new ApiError(`Route not found: ${req.method} ${req.path}`, 404, 'NOT_FOUND'));
  });
  app.use(errorHandler);

  return app;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LIFECYCLE
// ─────────────────────────────────────────────────────────────────────────────────

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

export async function start(): Promise<Server> {
  const config = loadConfig();

  await storeManager.initialize();
  const services = createServices();
  const app = createApp(services);

  const server = app.listen(config.server.port, config.server.host, () => {
    logger.info('Server listening', {
      host: config.server.host,
      port: config.server.port,
      environment: config.env.environment,
      storage: storeManager.isUsingRedis() ? 'redis' : 'memory',
      replyModel: services.replyGenerator.model,
    });
  });

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('Shutdown started', { signal });

    const timer = setTimeout(() => {
      logger.error('Shutdown timed out, forcing exit', undefined, { timeoutMs: SHUTDOWN_TIMEOUT_MS });
      process.exit(124);
    }, SHUTDOWN_TIMEOUT_MS);
    timer.unref();

    try {
      await closeServer(server);
      await storeManager.shutdown();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      logger.error('Shutdown failed', error);
      process.exit(1);
    }
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      void shutdown(signal);
    });
  }

  return server;
}
