/**
 * In-memory configuration store.
 *
 * Reference ConfigManager for development and testing. Records are
 * deep-copied on the way in and out so callers never share references
 * with the store's internal state.
 */

import {
  backingStoreError,
  invalidRuleError,
  notFoundError,
} from '../domain/errors';
import { ProxyConfig, TenantEntry, TenantInfo, Version, VersionPayload, toProxyConfig } from '../domain/tenant';
import { ConfigManager } from './manager';

const MAX_PORT = 65535;

function deepCopy<T>(obj: T): T {
  return structuredClone(obj);
}

function validateProxyConfig(config: ProxyConfig): void {
  if (config.port < 0 || config.port > MAX_PORT) {
    throw invalidRuleError(`Port ${config.port} is outside 0-${MAX_PORT}`);
  }
  config.filters.versions.forEach((version, i) => {
    if (version.service === '') {
      throw invalidRuleError(`filters.versions[${i}] has no service name`);
    }
  });
}

export class MemoryConfigManager implements ConfigManager {
  private tenants = new Map<string, TenantEntry>();
  /** Version records per tenant, keyed by service name. */
  private versions = new Map<string, Map<string, Version>>();

  async create(tenantId: string, info: TenantInfo): Promise<void> {
    if (this.tenants.has(tenantId)) {
      throw backingStoreError(`Tenant already exists: ${tenantId}`, 409);
    }
    const proxyConfig = toProxyConfig(info);
    validateProxyConfig(proxyConfig);

    const now = new Date().toISOString();
    this.tenants.set(tenantId, {
      id: tenantId,
      proxyConfig: deepCopy(proxyConfig),
      createdAt: now,
      updatedAt: now,
    });
    this.versions.set(tenantId, new Map());
  }

  async set(tenantId: string, info: TenantInfo): Promise<void> {
    const existing = this.tenants.get(tenantId);
    if (!existing) throw notFoundError('Tenant', tenantId);
    const proxyConfig = toProxyConfig(info);
    validateProxyConfig(proxyConfig);

    this.tenants.set(tenantId, {
      ...existing,
      proxyConfig: deepCopy(proxyConfig),
      updatedAt: new Date().toISOString(),
    });
  }

  async get(tenantId: string): Promise<TenantEntry> {
    const entry = this.tenants.get(tenantId);
    if (!entry) throw notFoundError('Tenant', tenantId);
    return deepCopy(entry);
  }

  async delete(tenantId: string): Promise<void> {
    if (!this.tenants.delete(tenantId)) throw notFoundError('Tenant', tenantId);
    this.versions.delete(tenantId);
  }

  async setVersion(tenantId: string, version: Version): Promise<void> {
    const services = this.versions.get(tenantId);
    if (!services) throw notFoundError('Tenant', tenantId);
    if (version.service === '') throw invalidRuleError('Version has no service name');
    services.set(version.service, deepCopy(version));
  }

  async getVersion(tenantId: string, service: string): Promise<VersionPayload> {
    const services = this.versions.get(tenantId);
    if (!services) throw notFoundError('Tenant', tenantId);
    const version = services.get(service);
    if (!version) throw notFoundError('Version', service);
    return deepCopy(version);
  }

  async deleteVersion(tenantId: string, service: string): Promise<void> {
    const services = this.versions.get(tenantId);
    if (!services) throw notFoundError('Tenant', tenantId);
    if (!services.delete(service)) throw notFoundError('Version', service);
  }
}

export function createMemoryConfigManager(): MemoryConfigManager {
  return new MemoryConfigManager();
}
