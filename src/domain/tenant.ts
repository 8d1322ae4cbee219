/**
 * Tenant resource model.
 *
 * A tenant is an isolated configuration namespace. Its routing
 * configuration (credentials, load balancing, port, tracking header and
 * filters) is exchanged as a TenantInfo and stored as a TenantEntry.
 * Version records hang off a tenant, keyed by service name.
 */

/** Message-bus credentials handed to the proxy. */
export interface KafkaCredentials {
  brokers: string[];
  user?: string;
  password?: string;
  apiKey?: string;
  adminUrl?: string;
  restUrl?: string;
  sasl: boolean;
}

/** Service registry credentials handed to the proxy. */
export interface RegistryCredentials {
  url: string;
  token: string;
}

export interface Credentials {
  kafka?: KafkaCredentials;
  registry?: RegistryCredentials;
}

/** Opaque filter specification; interpreted by the data plane only. */
export type FilterRule = Record<string, unknown>;

/**
 * Versioning metadata for one service of a tenant.
 *
 * `service` is always taken from the request path on write. Fields other
 * than the known ones are carried through to the store untouched.
 */
export interface Version {
  service: string;
  default?: string;
  selectors?: string;
  [field: string]: unknown;
}

/** Version payload as returned by the store. */
export type VersionPayload = Version;

/** Ordered traffic filters. Order matters to downstream rule evaluation. */
export interface Filters {
  rules: FilterRule[];
  versions: Version[];
}

/** A tenant's complete routing configuration as exchanged over the wire. */
export interface TenantInfo {
  id: string;
  credentials: Credentials;
  loadBalance: string;
  port: number;
  reqTrackingHeader: string;
  filters: Filters;
}

/** Routing configuration as held by the store. */
export interface ProxyConfig {
  credentials: Credentials;
  loadBalance: string;
  port: number;
  reqTrackingHeader: string;
  filters: Filters;
}

/** Stored tenant record. */
export interface TenantEntry {
  id: string;
  proxyConfig: ProxyConfig;
  createdAt: string;
  updatedAt: string;
}

/**
 * Verified tenant identity for the current request.
 * Only the identity resolver produces one, and only with a non-empty id.
 */
export interface TenantIdentity {
  readonly tenantId: string;
}

export function emptyFilters(): Filters {
  return { rules: [], versions: [] };
}

/** Split a TenantInfo into the configuration the store keeps. */
export function toProxyConfig(info: TenantInfo): ProxyConfig {
  return {
    credentials: info.credentials,
    loadBalance: info.loadBalance,
    port: info.port,
    reqTrackingHeader: info.reqTrackingHeader,
    filters: info.filters,
  };
}

/** Rebuild the wire representation of a stored tenant under the given id. */
export function toTenantInfo(tenantId: string, entry: TenantEntry): TenantInfo {
  return {
    id: tenantId,
    credentials: entry.proxyConfig.credentials,
    loadBalance: entry.proxyConfig.loadBalance,
    port: entry.proxyConfig.port,
    reqTrackingHeader: entry.proxyConfig.reqTrackingHeader,
    filters: entry.proxyConfig.filters,
  };
}
