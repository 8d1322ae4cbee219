import { ConfigManager } from '../../src/storage/manager';
import { MemoryConfigManager } from '../../src/storage/memory-manager';
import { TenantInfo, Version } from '../../src/domain/tenant';

/** ConfigManager whose methods are jest mocks delegating to an in-memory store. */
export function createSpyManager(inner: ConfigManager = new MemoryConfigManager()) {
  const manager = {
    create: jest.fn((tenantId: string, info: TenantInfo) => inner.create(tenantId, info)),
    set: jest.fn((tenantId: string, info: TenantInfo) => inner.set(tenantId, info)),
    get: jest.fn((tenantId: string) => inner.get(tenantId)),
    delete: jest.fn((tenantId: string) => inner.delete(tenantId)),
    setVersion: jest.fn((tenantId: string, version: Version) => inner.setVersion(tenantId, version)),
    getVersion: jest.fn((tenantId: string, service: string) => inner.getVersion(tenantId, service)),
    deleteVersion: jest.fn((tenantId: string, service: string) => inner.deleteVersion(tenantId, service)),
  } satisfies ConfigManager;
  return manager;
}

export type SpyManager = ReturnType<typeof createSpyManager>;

/** Total number of store calls made through the spy. */
export function storeCalls(manager: SpyManager): number {
  return Object.values(manager).reduce((sum, fn) => sum + fn.mock.calls.length, 0);
}
