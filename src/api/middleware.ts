/**
 * API Middleware — request correlation, tenant identity, and error handling.
 */

import { Request, Response, NextFunction } from 'express';
import { v4 as uuid } from 'uuid';
import { TenantIdentity } from '../domain/tenant';
import { malformedPayloadError } from '../domain/errors';
import { Logger } from '../logger';
import { respondWithError } from './respond';

/** Extended request with correlation id and tenant identity. */
export interface TenantRequest extends Request {
  requestId?: string;
  tenantId?: string;
}

/**
 * Correlation id middleware.
 * Reuses the inbound id when present, otherwise generates one, and echoes
 * it on the response.
 */
export function requestIdMiddleware(headerName: string) {
  return (req: TenantRequest, res: Response, next: NextFunction) => {
    const inbound = req.get(headerName)?.trim();
    req.requestId = inbound || uuid();
    res.set(headerName, req.requestId);
    next();
  };
}

/**
 * Tenant identity middleware.
 * The header is set by the authentication layer in front of this service;
 * an empty value leaves the request without identity.
 */
export function tenantIdentityMiddleware(headerName: string) {
  return (req: TenantRequest, _res: Response, next: NextFunction) => {
    const tenantId = req.get(headerName)?.trim();
    if (tenantId) {
      req.tenantId = tenantId;
    }
    next();
  };
}

/** Resolve the verified identity of a request, or null when none is present. */
export function resolveTenantIdentity(req: TenantRequest): TenantIdentity | null {
  if (!req.tenantId) return null;
  return { tenantId: req.tenantId };
}

interface BodyParserError {
  type: string;
  message: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    typeof err === 'object' &&
    err !== null &&
    'type' in err &&
    typeof err.type === 'string' &&
    (err.type.startsWith('entity.') || err.type.startsWith('request.') || err.type.startsWith('charset.') || err.type.startsWith('encoding.')) &&
    'message' in err &&
    typeof err.message === 'string'
  );
}

/**
 * Global error handling middleware.
 * Anything that escapes a route goes through the same error mapper as
 * handler failures; body reader failures count as malformed payloads.
 */
export function errorHandler(log: Logger) {
  return (err: unknown, req: TenantRequest, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    const failure = isBodyParserError(err) ? malformedPayloadError(err.message) : err;
    respondWithError(res, failure, log, { tenantId: req.tenantId, requestId: req.requestId });
  };
}
