/**
 * Handler instrumentation.
 *
 * Wraps a route handler so each invocation reports exactly one metrics
 * record (operation, outcome, elapsed time) after the handler settles.
 * The wrapper only observes: the handler's result is returned as-is and
 * a thrown error still reaches the Express error chain.
 */

import { Response, NextFunction } from 'express';
import { MetricOutcome, MetricsReporter } from '../metrics/reporter';
import { Logger, describeError } from '../logger';
import { TenantRequest } from './middleware';

/** Outcome of a handler invocation. The response has been written either way. */
export type HandlerResult = { ok: true } | { ok: false; error: unknown };

export type RouteHandler = (req: TenantRequest, res: Response) => Promise<HandlerResult>;

export type InstrumentedHandler = (req: TenantRequest, res: Response, next: NextFunction) => Promise<HandlerResult>;

export const OK: HandlerResult = { ok: true };

export function reportMetric(
  reporter: MetricsReporter,
  handler: RouteHandler,
  name: string,
  log: Logger,
): InstrumentedHandler {
  return async (req, res, next) => {
    const startedAt = Date.now();
    let result: HandlerResult;
    let escaped = false;

    try {
      result = await handler(req, res);
    } catch (err) {
      result = { ok: false, error: err };
      escaped = true;
    }

    const outcome: MetricOutcome = result.ok ? 'success' : 'failure';
    try {
      reporter.record(name, outcome, Date.now() - startedAt);
    } catch (err) {
      log.warn('Metrics reporter failed', { operation: name, err: describeError(err) });
    }

    if (escaped && !result.ok) {
      next(result.error);
    }
    return result;
  };
}
