/**
 * Error mapper.
 *
 * Translates any failure into an HTTP status and a TypedError. The mapper
 * is total: ConfigError kinds are matched exhaustively, and every other
 * value (a plain Error, a string, a future error class) falls through to
 * the unknown-availability outcome.
 */

import { ConfigError, SuggestedFix, TypedError, createTypedError, isConfigError } from './errors';

export interface MappedError {
  status: number;
  error: TypedError;
}

export const UNKNOWN_AVAILABILITY_ERROR = 'unknown_availability_error';

const RETRY_FIX: SuggestedFix = {
  type: 'WAIT_AND_RETRY',
  params: { delayMs: 1000 },
  description: 'The configuration store is temporarily unavailable. Retry after backoff.',
};

function permanent(status: number, code: string, message: string): MappedError {
  return { status, error: createTypedError({ code, message, retryable: false }) };
}

function transient(code: string, message: string): MappedError {
  return {
    status: 503,
    error: createTypedError({ code, message, retryable: true, suggestedFixes: [RETRY_FIX] }),
  };
}

/**
 * Secondary classifier for backing-store failures, keyed on the status
 * code the database reported. Missing and conflicting records are
 * permanent; everything else is treated as the store being unreachable.
 */
export function classifyBackingStoreError(err: ConfigError): MappedError {
  switch (err.dbStatusCode) {
    case 404:
      return permanent(404, 'error_db_not_found', err.message);
    case 409:
      return permanent(409, 'error_db_conflict', err.message);
    default:
      return transient('error_db_unavailable', err.message);
  }
}

/** Map any failure to its client-observable status and error body. */
export function mapError(err: unknown): MappedError {
  if (!isConfigError(err)) {
    return transient(UNKNOWN_AVAILABILITY_ERROR, 'Unknown availability error occurred');
  }

  switch (err.kind) {
    case 'invalid_input':
      return permanent(400, 'error_invalid_input', err.message);
    case 'malformed_payload':
      return permanent(400, 'json_error', err.message);
    case 'invalid_rule':
      return permanent(400, 'invalid_rule', err.message);
    case 'backing_store':
      return classifyBackingStoreError(err);
    case 'service_unavailable':
      return transient('service_unavailable', err.message);
    case 'not_found':
      return permanent(404, 'not_found', err.message);
    default: {
      // Kinds added to the taxonomy later land here until mapped.
      const unmapped: never = err.kind;
      return transient(UNKNOWN_AVAILABILITY_ERROR, `Unmapped error kind: ${String(unmapped)}`);
    }
  }
}

/** Log message used for each failure kind. */
export function describeFailure(err: unknown): string {
  if (!isConfigError(err)) return 'Unknown availability error occurred';
  switch (err.kind) {
    case 'invalid_input':
      return 'Invalid input';
    case 'malformed_payload':
      return 'Could not parse JSON';
    case 'invalid_rule':
      return 'Bad request';
    case 'backing_store':
      return 'Database error occurred';
    case 'service_unavailable':
      return 'Service unavailable';
    case 'not_found':
      return 'Record not found';
    default:
      return 'Unknown availability error occurred';
  }
}
