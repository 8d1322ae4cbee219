/**
 * Express server configuration.
 *
 * Assembles the API surface with middleware, routes, and dependency injection.
 */

import express from 'express';
import { ServiceConfig, DEFAULT_CONFIG } from './config';
import { ConfigManager } from './storage/manager';
import { createMemoryConfigManager } from './storage/memory-manager';
import { MemoryMetricsReporter, MetricsReporter } from './metrics/reporter';
import { Logger, createLogger } from './logger';
import { errorHandler, requestIdMiddleware, tenantIdentityMiddleware } from './api/middleware';
import { createTenantRoutes } from './api/tenants';

const startTime = Date.now();

/** Application context containing all services. */
export interface AppContext {
  config: ServiceConfig;
  manager: ConfigManager;
  reporter: MetricsReporter;
  logger: Logger;
}

/** Create the application context; unspecified services get in-memory defaults. */
export function createAppContext(overrides: Partial<AppContext> = {}): AppContext {
  const config = overrides.config ?? DEFAULT_CONFIG;
  return {
    config,
    manager: overrides.manager ?? createMemoryConfigManager(),
    reporter: overrides.reporter ?? new MemoryMetricsReporter(),
    logger: overrides.logger ?? createLogger({ minLevel: config.logLevel, context: { component: 'tenant-config' } }),
  };
}

/** Create and configure the Express application. */
export function createApp(context?: AppContext): express.Application {
  const ctx = context ?? createAppContext();
  const app = express();

  app.use(requestIdMiddleware(ctx.config.requestIdHeader));
  app.use(tenantIdentityMiddleware(ctx.config.tenantHeader));

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      uptimeMs: Date.now() - startTime,
    });
  });

  app.get('/metrics', (_req, res) => {
    if (!(ctx.reporter instanceof MemoryMetricsReporter)) {
      res.status(404).end();
      return;
    }
    res.json(ctx.reporter.snapshot());
  });

  // Raw text; each handler decodes its own payload.
  app.use(express.text({ type: '*/*', limit: ctx.config.bodyLimit }));

  app.use(createTenantRoutes({ manager: ctx.manager, reporter: ctx.reporter, logger: ctx.logger }));

  app.use(errorHandler(ctx.logger));

  return app;
}
