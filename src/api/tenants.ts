/**
 * Tenant API routes.
 *
 * POST   /v1/tenants            — Register a tenant (id taken from the payload)
 * PUT    /v1/tenants            — Replace the calling tenant's configuration
 * GET    /v1/tenants            — Read the calling tenant's configuration
 * DELETE /v1/tenants            — Remove the calling tenant
 * PUT    /v1/versions/:service  — Set version info for one of the tenant's services
 * GET    /v1/versions/:service  — Read version info for a service
 * DELETE /v1/versions/:service  — Remove version info for a service
 *
 * Except for registration, the tenant is always the one named by the
 * request's verified identity, never by a field in the body.
 */

import { Router, Response } from 'express';
import { apiError, createTypedError, invalidInputError } from '../domain/errors';
import { decodeTenantInfo, decodeVersion } from '../domain/payload';
import { TenantEntry, TenantIdentity, Version, VersionPayload, toTenantInfo } from '../domain/tenant';
import { ConfigManager } from '../storage/manager';
import { MetricsReporter } from '../metrics/reporter';
import { Logger, describeError } from '../logger';
import { TenantRequest, resolveTenantIdentity } from './middleware';
import { HandlerResult, OK, RouteHandler, reportMetric } from './instrument';
import { respondWithError } from './respond';

export interface TenantRouteDeps {
  manager: ConfigManager;
  reporter: MetricsReporter;
  logger: Logger;
}

type ScopedHandler = (identity: TenantIdentity, req: TenantRequest, res: Response) => Promise<HandlerResult>;

export function createTenantRoutes(deps: TenantRouteDeps): Router {
  const { manager, reporter } = deps;
  const log = deps.logger.child({ component: 'tenant-api' });
  const router = Router();

  function fail(req: TenantRequest, res: Response, err: unknown, service?: string): HandlerResult {
    respondWithError(res, err, log, { tenantId: req.tenantId, requestId: req.requestId, service });
    return { ok: false, error: err };
  }

  /** Reject requests without identity before the handler runs. */
  function scoped(handler: ScopedHandler): RouteHandler {
    return async (req, res) => {
      const identity = resolveTenantIdentity(req);
      if (!identity) {
        return fail(req, res, invalidInputError('Tenant identity is required'));
      }
      return handler(identity, req, res);
    };
  }

  const instrument = (handler: RouteHandler, name: string) => reportMetric(reporter, handler, name, log);

  /**
   * POST /v1/tenants
   * Register a tenant. The payload's id names the new tenant.
   */
  const postTenant: RouteHandler = async (req, res) => {
    try {
      const info = decodeTenantInfo(req.body);
      if (info.id === '') {
        throw invalidInputError('Tenant id is required');
      }
      await manager.create(info.id, info);
    } catch (err) {
      return fail(req, res, err);
    }

    res.status(201).end();
    return OK;
  };

  /**
   * PUT /v1/tenants
   * Full replace of the tenant's configuration; no partial patch.
   */
  const putTenant = scoped(async ({ tenantId }, req, res) => {
    try {
      const info = decodeTenantInfo(req.body);
      await manager.set(tenantId, { ...info, id: tenantId });
    } catch (err) {
      return fail(req, res, err);
    }

    res.status(200).end();
    return OK;
  });

  /** GET /v1/tenants */
  const getTenant = scoped(async ({ tenantId }, req, res) => {
    let entry: TenantEntry;
    try {
      entry = await manager.get(tenantId);
    } catch (err) {
      return fail(req, res, err);
    }

    res.status(200).json(toTenantInfo(tenantId, entry));
    return OK;
  });

  /** DELETE /v1/tenants */
  const deleteTenant = scoped(async ({ tenantId }, req, res) => {
    try {
      await manager.delete(tenantId);
    } catch (err) {
      return fail(req, res, err);
    }

    res.status(200).end();
    return OK;
  });

  /**
   * PUT /v1/versions/:service
   * The path's service name replaces any service field in the body.
   */
  const putServiceVersion = scoped(async ({ tenantId }, req, res) => {
    const service = req.params.service;

    let version: Version;
    try {
      version = { ...decodeVersion(req.body), service };
    } catch (err) {
      return fail(req, res, err, service);
    }

    try {
      await manager.setVersion(tenantId, version);
    } catch (err) {
      return fail(req, res, err, service);
    }

    res.status(200).end();
    return OK;
  });

  /**
   * GET /v1/versions/:service
   * Returns the store's version payload as-is.
   */
  const getServiceVersion = scoped(async ({ tenantId }, req, res) => {
    const service = req.params.service;

    let payload: VersionPayload;
    try {
      payload = await manager.getVersion(tenantId, service);
    } catch (err) {
      return fail(req, res, err, service);
    }

    let body: string;
    try {
      body = JSON.stringify(payload);
    } catch (err) {
      log.warn('Could not write JSON response for getting version information', {
        tenantId,
        requestId: req.requestId,
        service,
        err: describeError(err),
      });
      res.status(500).json(
        apiError(
          createTypedError({
            code: 'error_response_encoding',
            message: 'Version information could not be encoded as JSON',
            details: req.requestId ? { requestId: req.requestId } : undefined,
          }),
        ),
      );
      return { ok: false, error: err };
    }

    res.status(200).type('application/json').send(body);
    return OK;
  });

  /** DELETE /v1/versions/:service */
  const deleteServiceVersion = scoped(async ({ tenantId }, req, res) => {
    const service = req.params.service;
    try {
      await manager.deleteVersion(tenantId, service);
    } catch (err) {
      return fail(req, res, err, service);
    }

    res.status(200).end();
    return OK;
  });

  router.post('/v1/tenants', instrument(postTenant, 'tenants_create'));
  router.put('/v1/tenants', instrument(putTenant, 'tenants_update'));
  router.get('/v1/tenants', instrument(getTenant, 'tenants_read'));
  router.delete('/v1/tenants', instrument(deleteTenant, 'tenants_delete'));
  router.put('/v1/versions/:service', instrument(putServiceVersion, 'versions_update'));
  router.get('/v1/versions/:service', instrument(getServiceVersion, 'versions_read'));
  router.delete('/v1/versions/:service', instrument(deleteServiceVersion, 'versions_delete'));

  return router;
}
