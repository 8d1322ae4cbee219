import { MemoryConfigManager } from '../../src/storage/memory-manager';
import { TenantInfo } from '../../src/domain/tenant';

function tenantInfo(id: string, overrides: Partial<TenantInfo> = {}): TenantInfo {
  return {
    id,
    credentials: { registry: { url: 'http://registry.local:8080', token: 'test-token' } },
    loadBalance: 'round_robin',
    port: 8080,
    reqTrackingHeader: 'X-Request-Trace',
    filters: { rules: [{ destination: 'reviews' }], versions: [] },
    ...overrides,
  };
}

describe('MemoryConfigManager', () => {
  let manager: MemoryConfigManager;

  beforeEach(() => {
    manager = new MemoryConfigManager();
  });

  describe('tenants', () => {
    test('stores the proxy configuration of a created tenant', async () => {
      await manager.create('t1', tenantInfo('t1'));

      const entry = await manager.get('t1');

      expect(entry.id).toBe('t1');
      expect(entry.proxyConfig).toEqual({
        credentials: { registry: { url: 'http://registry.local:8080', token: 'test-token' } },
        loadBalance: 'round_robin',
        port: 8080,
        reqTrackingHeader: 'X-Request-Trace',
        filters: { rules: [{ destination: 'reviews' }], versions: [] },
      });
      expect(entry.createdAt).toBe(entry.updatedAt);
    });

    test('rejects a second create as a database conflict', async () => {
      await manager.create('t1', tenantInfo('t1'));

      await expect(manager.create('t1', tenantInfo('t1'))).rejects.toMatchObject({
        kind: 'backing_store',
        dbStatusCode: 409,
        message: 'Tenant already exists: t1',
      });
    });

    test.each([-1, 65536])('rejects port %p as an invalid rule', async (port) => {
      await expect(manager.create('t1', tenantInfo('t1', { port }))).rejects.toMatchObject({
        kind: 'invalid_rule',
        message: `Port ${port} is outside 0-65535`,
      });
    });

    test('rejects filter versions without a service name', async () => {
      const info = tenantInfo('t1', { filters: { rules: [], versions: [{ service: '' }] } });

      await expect(manager.create('t1', info)).rejects.toMatchObject({
        kind: 'invalid_rule',
        message: 'filters.versions[0] has no service name',
      });
    });

    test('set replaces the whole configuration', async () => {
      await manager.create('t1', tenantInfo('t1'));

      await manager.set('t1', tenantInfo('t1', { credentials: {}, port: 9090, filters: { rules: [], versions: [] } }));

      const entry = await manager.get('t1');
      expect(entry.proxyConfig.credentials).toEqual({});
      expect(entry.proxyConfig.port).toBe(9090);
      expect(entry.proxyConfig.filters.rules).toEqual([]);
    });

    test.each(['set', 'get', 'delete'] as const)('%s on a missing tenant is not found', async (method) => {
      const call =
        method === 'set' ? manager.set('ghost', tenantInfo('ghost')) : method === 'get' ? manager.get('ghost') : manager.delete('ghost');

      await expect(call).rejects.toMatchObject({ kind: 'not_found', message: 'Tenant not found: ghost' });
    });

    test('returned entries do not alias stored state', async () => {
      await manager.create('t1', tenantInfo('t1'));

      const entry = await manager.get('t1');
      entry.proxyConfig.filters.rules.push({ destination: 'injected' });
      entry.proxyConfig.port = 1;

      const again = await manager.get('t1');
      expect(again.proxyConfig.filters.rules).toEqual([{ destination: 'reviews' }]);
      expect(again.proxyConfig.port).toBe(8080);
    });

    test('stored entries do not alias the caller input', async () => {
      const info = tenantInfo('t1');
      await manager.create('t1', info);

      info.filters.rules.push({ destination: 'late' });

      expect((await manager.get('t1')).proxyConfig.filters.rules).toHaveLength(1);
    });
  });

  describe('versions', () => {
    beforeEach(async () => {
      await manager.create('t1', tenantInfo('t1'));
    });

    test('set then get returns the stored version verbatim', async () => {
      await manager.setVersion('t1', { service: 'checkout', default: 'v1', weight: 50 });

      expect(await manager.getVersion('t1', 'checkout')).toEqual({ service: 'checkout', default: 'v1', weight: 50 });
    });

    test('set replaces an existing record', async () => {
      await manager.setVersion('t1', { service: 'checkout', default: 'v1' });
      await manager.setVersion('t1', { service: 'checkout', default: 'v2' });

      expect(await manager.getVersion('t1', 'checkout')).toEqual({ service: 'checkout', default: 'v2' });
    });

    test('rejects a version without a service name', async () => {
      await expect(manager.setVersion('t1', { service: '' })).rejects.toMatchObject({ kind: 'invalid_rule' });
    });

    test('versions require an existing tenant', async () => {
      await expect(manager.setVersion('ghost', { service: 'checkout' })).rejects.toMatchObject({
        kind: 'not_found',
        message: 'Tenant not found: ghost',
      });
    });

    test('a missing service is not found', async () => {
      await expect(manager.getVersion('t1', 'checkout')).rejects.toMatchObject({
        kind: 'not_found',
        message: 'Version not found: checkout',
      });
    });

    test('deleting twice fails the second time', async () => {
      await manager.setVersion('t1', { service: 'checkout' });

      await manager.deleteVersion('t1', 'checkout');

      await expect(manager.deleteVersion('t1', 'checkout')).rejects.toMatchObject({ kind: 'not_found' });
    });

    test('deleting a tenant removes its versions', async () => {
      await manager.setVersion('t1', { service: 'checkout', default: 'v1' });

      await manager.delete('t1');
      await manager.create('t1', tenantInfo('t1'));

      await expect(manager.getVersion('t1', 'checkout')).rejects.toMatchObject({ kind: 'not_found' });
    });

    test('versions are kept per tenant', async () => {
      await manager.create('t2', tenantInfo('t2'));
      await manager.setVersion('t1', { service: 'checkout', default: 'v1' });

      await expect(manager.getVersion('t2', 'checkout')).rejects.toMatchObject({ kind: 'not_found' });
    });
  });
});
