/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import http from 'http';
import { AppConfig, loadConfig } from './config';
import { registerBuiltinActions } from './actions';
import { Store } from './storage/store';
import { createMemoryStore } from './storage/memory-store';
import { ArtifactStorage, FileArtifactStorage } from './storage/artifact-storage';
import { DataPlanePublisher } from './data-plane/publisher';
import { WorkflowExecutor } from './engine/executor';
import { errorHandler } from './api/middleware';
import { createWorkflowRoutes } from './api/workflows';
import { createRunRoutes } from './api/runs';
import { createArtifactRoutes } from './api/artifacts';
import { createEventRoutes } from './api/events';
import { createWebhookRoutes } from './api/webhooks';
import { logger } from './logger';

export const VERSION = '0.1.0';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: AppConfig;
  store: Store;
  publisher: DataPlanePublisher;
  artifactStorage: ArtifactStorage;
  executor: WorkflowExecutor;
}

export interface AppContextOptions {
  /** Overrides applied on top of the environment configuration. */
  config?: Partial<AppConfig>;
  store?: Store;
  artifactStorage?: ArtifactStorage;
}

/** Create the application context with all services. */
export function createAppContext(options: AppContextOptions = {}): AppContext {
  const config: AppConfig = { ...loadConfig(), ...options.config };
  const store = options.store ?? createMemoryStore();
  const publisher = new DataPlanePublisher(store);
  const artifactStorage = options.artifactStorage ?? new FileArtifactStorage(config.artifactDir);
  const executor = new WorkflowExecutor(store, publisher, artifactStorage, config);

  registerBuiltinActions();

  return { config, store, publisher, artifactStorage, executor };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  // Webhooks read the raw body for signature checks, so they go before the JSON parser.
  app.use('/webhooks', createWebhookRoutes(ctx.executor, { secret: ctx.config.webhookSecret }));

  app.use(express.json({ limit: '2mb' }));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      version: VERSION,
      uptimeMs: Date.now() - startTime,
      storage: 'memory',
    });
  });

  app.use('/api/workflows', createWorkflowRoutes(ctx.store, ctx.executor));
  app.use('/api', createRunRoutes(ctx.executor));
  app.use('/api', createArtifactRoutes(ctx.executor));
  app.use('/api', createEventRoutes(ctx.executor));

  app.use(errorHandler);

  return app;
}

/** Start the HTTP service. Resolves once it is listening. */
export function startServer(context: AppContext, port = context.config.port): Promise<http.Server> {
  const app = createApp(context);
  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logger.info('matrix-ci listening', { port, workspaceDir: context.config.workspaceDir });
      resolve(server);
    });
    server.once('error', reject);
  });
}
