/**
 * Payload decoding for tenant and version requests.
 *
 * Request bodies arrive as raw text. Decoding parses the JSON and checks
 * the type of every known field; absent or null fields take their zero
 * value. Anything that cannot be decoded raises a `malformed_payload`
 * ConfigError.
 */

import { malformedPayloadError } from './errors';
import {
  Credentials,
  FilterRule,
  Filters,
  KafkaCredentials,
  RegistryCredentials,
  TenantInfo,
  Version,
  emptyFilters,
} from './tenant';

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): value is null | undefined {
  return value === undefined || value === null;
}

/** Parse a raw request body into a JSON value. */
export function parseJsonBody(body: unknown): unknown {
  if (typeof body !== 'string' || body.trim() === '') {
    throw malformedPayloadError('Request body is empty');
  }
  try {
    return JSON.parse(body);
  } catch (err) {
    const reason = err instanceof Error ? err.message : 'invalid JSON';
    throw malformedPayloadError(`Could not parse JSON: ${reason}`);
  }
}

function expectObject(value: unknown, path: string): JsonObject {
  if (!isJsonObject(value)) {
    throw malformedPayloadError(`${path} must be a JSON object`);
  }
  return value;
}

function readString(obj: JsonObject, key: string, path: string): string {
  const value = obj[key];
  if (isAbsent(value)) return '';
  if (typeof value !== 'string') {
    throw malformedPayloadError(`${path}.${key} must be a string`);
  }
  return value;
}

function readOptionalString(obj: JsonObject, key: string, path: string): string | undefined {
  const value = obj[key];
  if (isAbsent(value)) return undefined;
  if (typeof value !== 'string') {
    throw malformedPayloadError(`${path}.${key} must be a string`);
  }
  return value;
}

function readInteger(obj: JsonObject, key: string, path: string): number {
  const value = obj[key];
  if (isAbsent(value)) return 0;
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw malformedPayloadError(`${path}.${key} must be an integer`);
  }
  return value;
}

function readBoolean(obj: JsonObject, key: string, path: string): boolean {
  const value = obj[key];
  if (isAbsent(value)) return false;
  if (typeof value !== 'boolean') {
    throw malformedPayloadError(`${path}.${key} must be a boolean`);
  }
  return value;
}

function readArray(obj: JsonObject, key: string, path: string): unknown[] {
  const value = obj[key];
  if (isAbsent(value)) return [];
  if (!Array.isArray(value)) {
    throw malformedPayloadError(`${path}.${key} must be an array`);
  }
  return value;
}

function decodeKafka(value: unknown, path: string): KafkaCredentials {
  const obj = expectObject(value, path);
  const brokers = readArray(obj, 'brokers', path).map((broker, i) => {
    if (typeof broker !== 'string') {
      throw malformedPayloadError(`${path}.brokers[${i}] must be a string`);
    }
    return broker;
  });
  return {
    brokers,
    user: readOptionalString(obj, 'user', path),
    password: readOptionalString(obj, 'password', path),
    apiKey: readOptionalString(obj, 'apiKey', path),
    adminUrl: readOptionalString(obj, 'adminUrl', path),
    restUrl: readOptionalString(obj, 'restUrl', path),
    sasl: readBoolean(obj, 'sasl', path),
  };
}

function decodeRegistry(value: unknown, path: string): RegistryCredentials {
  const obj = expectObject(value, path);
  return {
    url: readString(obj, 'url', path),
    token: readString(obj, 'token', path),
  };
}

function decodeCredentials(value: unknown, path: string): Credentials {
  if (isAbsent(value)) return {};
  const obj = expectObject(value, path);
  const credentials: Credentials = {};
  if (!isAbsent(obj.kafka)) credentials.kafka = decodeKafka(obj.kafka, `${path}.kafka`);
  if (!isAbsent(obj.registry)) credentials.registry = decodeRegistry(obj.registry, `${path}.registry`);
  return credentials;
}

const KNOWN_VERSION_FIELDS = new Set(['service', 'default', 'selectors']);

function decodeVersionObject(value: unknown, path: string): Version {
  const obj = expectObject(value, path);
  const version: Version = { service: readString(obj, 'service', path) };
  const defaultVersion = readOptionalString(obj, 'default', path);
  const selectors = readOptionalString(obj, 'selectors', path);
  if (defaultVersion !== undefined) version.default = defaultVersion;
  if (selectors !== undefined) version.selectors = selectors;
  for (const [field, fieldValue] of Object.entries(obj)) {
    if (!KNOWN_VERSION_FIELDS.has(field)) version[field] = fieldValue;
  }
  return version;
}

function decodeFilters(value: unknown, path: string): Filters {
  if (isAbsent(value)) return emptyFilters();
  const obj = expectObject(value, path);
  const rules: FilterRule[] = readArray(obj, 'rules', path).map((rule, i) =>
    expectObject(rule, `${path}.rules[${i}]`),
  );
  const versions = readArray(obj, 'versions', path).map((version, i) =>
    decodeVersionObject(version, `${path}.versions[${i}]`),
  );
  return { rules, versions };
}

/** Decode a TenantInfo from a raw request body. */
export function decodeTenantInfo(body: unknown): TenantInfo {
  const obj = expectObject(parseJsonBody(body), 'tenant');
  return {
    id: readString(obj, 'id', 'tenant'),
    credentials: decodeCredentials(obj.credentials, 'tenant.credentials'),
    loadBalance: readString(obj, 'loadBalance', 'tenant'),
    port: readInteger(obj, 'port', 'tenant'),
    reqTrackingHeader: readString(obj, 'reqTrackingHeader', 'tenant'),
    filters: decodeFilters(obj.filters, 'tenant.filters'),
  };
}

/** Decode a Version from a raw request body. Unknown fields are kept. */
export function decodeVersion(body: unknown): Version {
  return decodeVersionObject(parseJsonBody(body), 'version');
}
