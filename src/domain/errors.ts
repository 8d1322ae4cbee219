/**
 * Error taxonomy and typed error model.
 *
 * Failures raised at the handler boundary and failures reported by the
 * configuration store share one closed set of kinds. Each kind is turned
 * into a TypedError, the machine-readable body every failed request
 * returns.
 */

/**
 * Closed set of failure kinds.
 *
 * - `invalid_input` / `malformed_payload`: rejected at the handler boundary,
 *   before any store call.
 * - `invalid_rule`, `backing_store`, `service_unavailable`, `not_found`:
 *   reported by the configuration store.
 */
export type ConfigErrorKind =
  | 'invalid_input'
  | 'malformed_payload'
  | 'invalid_rule'
  | 'backing_store'
  | 'service_unavailable'
  | 'not_found';

export const CONFIG_ERROR_KINDS: readonly ConfigErrorKind[] = [
  'invalid_input',
  'malformed_payload',
  'invalid_rule',
  'backing_store',
  'service_unavailable',
  'not_found',
];

/** Error raised by handlers and store implementations. */
export class ConfigError extends Error {
  constructor(
    public readonly kind: ConfigErrorKind,
    message: string,
    /** Status code reported by the backing database, for `backing_store` errors. */
    public readonly dbStatusCode?: number,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function isConfigError(err: unknown): err is ConfigError {
  return err instanceof ConfigError;
}

export function invalidInputError(message: string): ConfigError {
  return new ConfigError('invalid_input', message);
}

export function malformedPayloadError(message: string): ConfigError {
  return new ConfigError('malformed_payload', message);
}

export function invalidRuleError(message: string): ConfigError {
  return new ConfigError('invalid_rule', message);
}

export function backingStoreError(message: string, dbStatusCode?: number): ConfigError {
  return new ConfigError('backing_store', message, dbStatusCode);
}

export function serviceUnavailableError(message: string): ConfigError {
  return new ConfigError('service_unavailable', message);
}

export function notFoundError(resourceType: string, resourceId: string): ConfigError {
  return new ConfigError('not_found', `${resourceType} not found: ${resourceId}`);
}

/** Typed suggested fix that clients can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The typed error structure returned in API responses. */
export interface TypedError {
  /** Stable machine-readable token (e.g., "error_invalid_input"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Whether the same request is expected to succeed later without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Machine-actionable remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** API error response wrapper. */
export interface ApiErrorResponse {
  error: TypedError;
}

/** Construct an API error response. */
export function apiError(error: TypedError): ApiErrorResponse {
  return { error };
}
