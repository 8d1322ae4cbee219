/**
 * Configuration store contract.
 *
 * The request handlers delegate every stateful operation to a
 * ConfigManager. Implementations own consistency and persistence; all
 * calls are scoped by tenant id. A failed call rejects with a ConfigError
 * of a store kind (`invalid_rule`, `backing_store`, `service_unavailable`,
 * `not_found`) or with any other error, which is treated as unknown.
 */

import { TenantEntry, TenantInfo, Version, VersionPayload } from '../domain/tenant';

export interface ConfigManager {
  /** Register a tenant. Fails if the tenant already exists. */
  create(tenantId: string, info: TenantInfo): Promise<void>;
  /** Replace a tenant's configuration. */
  set(tenantId: string, info: TenantInfo): Promise<void>;
  get(tenantId: string): Promise<TenantEntry>;
  /** Remove a tenant along with its version records. */
  delete(tenantId: string): Promise<void>;
  /** Create or replace the version record for `version.service`. */
  setVersion(tenantId: string, version: Version): Promise<void>;
  getVersion(tenantId: string, service: string): Promise<VersionPayload>;
  deleteVersion(tenantId: string, service: string): Promise<void>;
}
