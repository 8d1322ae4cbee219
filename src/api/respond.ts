/**
 * Error responses.
 *
 * Every failed request is answered here: the failure is mapped to a
 * status and TypedError, logged with tenant and correlation ids, and
 * written as `{ "error": TypedError }`.
 */

import { Response } from 'express';
import { apiError } from '../domain/errors';
import { MappedError, describeFailure, mapError } from '../domain/error-mapping';
import { Logger, describeError } from '../logger';

export interface FailureContext {
  tenantId?: string;
  requestId?: string;
  service?: string;
}

export function respondWithError(res: Response, err: unknown, log: Logger, context: FailureContext): MappedError {
  const mapped = mapError(err);

  log.error(describeFailure(err), {
    err: describeError(err),
    tenantId: context.tenantId,
    requestId: context.requestId,
    ...(context.service !== undefined ? { service: context.service } : {}),
    status: mapped.status,
    code: mapped.error.code,
  });

  const error = context.requestId
    ? { ...mapped.error, details: { ...mapped.error.details, requestId: context.requestId } }
    : mapped.error;
  res.status(mapped.status).json(apiError(error));
  return { status: mapped.status, error };
}
