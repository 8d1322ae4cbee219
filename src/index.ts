/**
 * Tenant configuration service.
 *
 * Entry point for the HTTP server. Tenants register and maintain their
 * routing configuration and per-service version metadata through the
 * /v1/tenants and /v1/versions routes.
 */

import { createApp, createAppContext } from './server';
import { ServiceConfig, loadConfig } from './config';
import { createLogger, describeError } from './logger';

function main(): void {
  let config: ServiceConfig;
  try {
    config = loadConfig();
  } catch (err) {
    createLogger().error('Invalid configuration', { err: describeError(err) });
    process.exitCode = 1;
    return;
  }

  const context = createAppContext({ config });
  const app = createApp(context);
  app.listen(config.port, () => {
    context.logger.info('Tenant configuration service listening', { port: config.port });
  });
}

if (require.main === module) {
  main();
}

// Public exports for programmatic use
export { createApp, createAppContext } from './server';
export type { AppContext } from './server';
export * from './config';
export * from './logger';
export * from './domain';
export * from './storage';
export * from './metrics/reporter';
export { createTenantRoutes } from './api/tenants';
export type { TenantRouteDeps } from './api/tenants';
export { reportMetric } from './api/instrument';
export type { HandlerResult, RouteHandler } from './api/instrument';
