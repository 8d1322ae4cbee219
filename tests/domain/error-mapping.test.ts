import {
  CONFIG_ERROR_KINDS,
  ConfigError,
  backingStoreError,
  invalidInputError,
  invalidRuleError,
  malformedPayloadError,
  notFoundError,
  serviceUnavailableError,
} from '../../src/domain/errors';
import { describeFailure, mapError } from '../../src/domain/error-mapping';

describe('mapError', () => {
  test('invalid input is a 400 with the handler message', () => {
    const mapped = mapError(invalidInputError('Tenant identity is required'));
    expect(mapped.status).toBe(400);
    expect(mapped.error).toEqual({
      code: 'error_invalid_input',
      message: 'Tenant identity is required',
      retryable: false,
      details: undefined,
      suggestedFixes: [],
    });
  });

  test('malformed payload is a 400 json_error', () => {
    const mapped = mapError(malformedPayloadError('Request body is empty'));
    expect(mapped.status).toBe(400);
    expect(mapped.error.code).toBe('json_error');
  });

  test('invalid rule is a 400 carrying the store message', () => {
    const mapped = mapError(invalidRuleError('weights exceed 1.0'));
    expect(mapped.status).toBe(400);
    expect(mapped.error.code).toBe('invalid_rule');
    expect(mapped.error.message).toBe('weights exceed 1.0');
  });

  test('not found is a 404 carrying the store message', () => {
    const mapped = mapError(notFoundError('Tenant', 't1'));
    expect(mapped.status).toBe(404);
    expect(mapped.error.code).toBe('not_found');
    expect(mapped.error.message).toBe('Tenant not found: t1');
  });

  test('service unavailable is a retryable 503', () => {
    const mapped = mapError(serviceUnavailableError('rules engine restarting'));
    expect(mapped.status).toBe(503);
    expect(mapped.error.code).toBe('service_unavailable');
    expect(mapped.error.message).toBe('rules engine restarting');
    expect(mapped.error.retryable).toBe(true);
    expect(mapped.error.suggestedFixes.map((f) => f.type)).toEqual(['WAIT_AND_RETRY']);
  });

  describe('backing store failures', () => {
    test.each([
      [404, 404, 'error_db_not_found', false],
      [409, 409, 'error_db_conflict', false],
      [500, 503, 'error_db_unavailable', true],
      [undefined, 503, 'error_db_unavailable', true],
    ])('database status %p maps to %p %s', (dbStatus, status, code, retryable) => {
      const mapped = mapError(backingStoreError('database said no', dbStatus));
      expect(mapped.status).toBe(status);
      expect(mapped.error.code).toBe(code);
      expect(mapped.error.message).toBe('database said no');
      expect(mapped.error.retryable).toBe(retryable);
    });
  });

  test.each([
    ['a plain Error', new Error('boom')],
    ['a string', 'boom'],
    ['undefined', undefined],
    ['null', null],
    ['a look-alike object', { kind: 'not_found', message: 'Tenant not found: t1' }],
  ])('%s maps to unknown_availability_error', (_label, err) => {
    const mapped = mapError(err);
    expect(mapped.status).toBe(503);
    expect(mapped.error.code).toBe('unknown_availability_error');
    expect(mapped.error.message).toBe('Unknown availability error occurred');
  });

  test('every taxonomy kind yields a response', () => {
    const statuses = CONFIG_ERROR_KINDS.map((kind) => mapError(new ConfigError(kind, kind)).status);
    expect(statuses).toEqual([400, 400, 400, 503, 503, 404]);
  });
});

describe('describeFailure', () => {
  test('names each failure category for the log', () => {
    expect(describeFailure(invalidRuleError('x'))).toBe('Bad request');
    expect(describeFailure(backingStoreError('x'))).toBe('Database error occurred');
    expect(describeFailure(notFoundError('Version', 'checkout'))).toBe('Record not found');
    expect(describeFailure(new Error('x'))).toBe('Unknown availability error occurred');
  });
});
