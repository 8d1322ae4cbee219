/**
 * Service configuration.
 *
 * Read once from the environment at startup. Invalid values stop the
 * process before it starts listening.
 *
 *   PORT               listening port (default 8080)
 *   LOG_LEVEL          debug | info | warn | error (default info)
 *   TENANT_HEADER      header carrying the verified tenant id (default x-tenant-id)
 *   REQUEST_ID_HEADER  correlation id header (default x-request-id)
 *   BODY_LIMIT         maximum request body size (default 1mb)
 */

import { LogLevel, parseLogLevel } from './logger';

export interface ServiceConfig {
  port: number;
  logLevel: LogLevel;
  tenantHeader: string;
  requestIdHeader: string;
  bodyLimit: string;
}

export const DEFAULT_CONFIG: ServiceConfig = {
  port: 8080,
  logLevel: LogLevel.Info,
  tenantHeader: 'x-tenant-id',
  requestIdHeader: 'x-request-id',
  bodyLimit: '1mb',
};

export class ConfigurationError extends Error {
  constructor(
    public readonly variable: string,
    message: string,
  ) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigurationError';
  }
}

const HEADER_NAME = /^[!#$%&'*+.^_`|~0-9a-z-]+$/;

function readPort(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_CONFIG.port;
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError('PORT', `expected an integer between 0 and 65535, got "${value}"`);
  }
  return port;
}

function readHeaderName(variable: string, value: string | undefined, fallback: string): string {
  if (value === undefined || value.trim() === '') return fallback;
  const name = value.trim().toLowerCase();
  if (!HEADER_NAME.test(name)) {
    throw new ConfigurationError(variable, `"${value}" is not a valid header name`);
  }
  return name;
}

function readLogLevel(value: string | undefined): LogLevel {
  if (value === undefined || value.trim() === '') return DEFAULT_CONFIG.logLevel;
  const level = parseLogLevel(value);
  if (!level) {
    throw new ConfigurationError('LOG_LEVEL', `unknown level "${value}"`);
  }
  return level;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  return {
    port: readPort(env.PORT),
    logLevel: readLogLevel(env.LOG_LEVEL),
    tenantHeader: readHeaderName('TENANT_HEADER', env.TENANT_HEADER, DEFAULT_CONFIG.tenantHeader),
    requestIdHeader: readHeaderName('REQUEST_ID_HEADER', env.REQUEST_ID_HEADER, DEFAULT_CONFIG.requestIdHeader),
    bodyLimit: env.BODY_LIMIT?.trim() || DEFAULT_CONFIG.bodyLimit,
  };
}
