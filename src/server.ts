// ═══════════════════════════════════════════════════════════════════════════════
// SERVER — Express App Assembly and Lifecycle
// ═══════════════════════════════════════════════════════════════════════════════
//
// startServer() listens first and loads reference data afterwards; until the
// load finishes every engine route answers 503. A failed load closes the
// server and rejects, and the entry point exits with code 1.
//
// ═══════════════════════════════════════════════════════════════════════════════

import type { Server } from 'node:http';
import type { AddressInfo } from 'node:net';
import express, { type Express } from 'express';
import { EngineContext } from './api/context.js';
import { errorHandler, notFoundHandler } from './api/middleware/error-handler.js';
import { requestIdMiddleware, requestLoggerMiddleware } from './api/middleware/request-logger.js';
import { createApiRouter, createHealthRouter, getAllRoutes } from './api/routes/index.js';
import { getEngineConfig, loadConfig, type AppConfig } from './config/index.js';
import { getLogger } from './logging/index.js';
import { ReferenceDataRegistry } from './reference/index.js';

const logger = getLogger({ component: 'server' });

const JSON_BODY_LIMIT = '100kb';

// ─────────────────────────────────────────────────────────────────────────────────
// APP
// ─────────────────────────────────────────────────────────────────────────────────

export interface AppOptions {
  registry: ReferenceDataRegistry;
  config: AppConfig;
}

/**
 * Build the express app without listening.
 */
export function createApp({ registry, config }: AppOptions): Express {
  const app = express();
  const context = new EngineContext(registry, getEngineConfig(config));

  app.disable('x-powered-by');
  app.use(requestIdMiddleware);
  app.use(requestLoggerMiddleware);
  app.use(express.json({ limit: JSON_BODY_LIMIT }));

  app.use(createHealthRouter(context));
  app.use('/api', createApiRouter(context));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

// ─────────────────────────────────────────────────────────────────────────────────
// LIFECYCLE
// ─────────────────────────────────────────────────────────────────────────────────

export interface RunningServer {
  readonly app: Express;
  readonly server: Server;
  readonly registry: ReferenceDataRegistry;
  readonly address: AddressInfo;
  close(): Promise<void>;
}

export interface StartServerOptions {
  config?: AppConfig;
  registry?: ReferenceDataRegistry;
}

function listen(app: Express, port: number, host: string): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(port, host);
    server.once('listening', () => resolve(server));
    server.once('error', reject);
  });
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve, reject) => {
    server.close((error) => (error ? reject(error) : resolve()));
    server.closeIdleConnections();
  });
}

export async function startServer(options: StartServerOptions = {}): Promise<RunningServer> {
  const config = options.config ?? loadConfig();
  const registry = options.registry ?? ReferenceDataRegistry.fromDirectory(config.data.dir);
  const app = createApp({ registry, config });

  const server = await listen(app, config.server.port, config.server.host);
  const address = server.address();
  if (address === null || typeof address === 'string') {
    await closeServer(server);
    throw new Error('Server is not listening on a TCP port');
  }

  logger.info('Server listening', {
    host: address.address,
    port: address.port,
    environment: config.environment,
    routes: getAllRoutes().length,
  });

  try {
    await registry.load();
  } catch (error) {
    await closeServer(server);
    throw error;
  }

  return {
    app,
    server,
    registry,
    address,
    close: () => closeServer(server),
  };
}
