import { hasToken, type ApiVersion, type Credentials } from "./credentials.js";

// ---------------------------------------------------------------------------
// Endpoint descriptors, one per resource collection
// ---------------------------------------------------------------------------

export interface EndpointDescriptor {
  /** Resource name (e.g. "routers", "subscriptions") */
  name: string;
  /** v2 = legacy key headers, v3 = bearer token */
  version: ApiVersion;
  /** Collection path relative to the version's base URL */
  path: string;
  /** Page size used when the query does not ask for one */
  defaultPageSize: number;
  /** Largest page size the server accepts */
  maxPageSize: number;
  /** Allowed filter keys; undefined means any key is passed through */
  filters?: readonly string[];
}

const V2_PAGE = { defaultPageSize: 500, maxPageSize: 500 } as const;
const V3_PAGE = { defaultPageSize: 50, maxPageSize: 50 } as const;

function v2(name: string, filters?: readonly string[]): EndpointDescriptor {
  return { name, version: "v2", path: `/${name}/`, ...V2_PAGE, filters };
}

function v3(name: string, path: string, filters?: readonly string[]): EndpointDescriptor {
  return { name, version: "v3", path, ...V3_PAGE, filters };
}

const TIME_OPS = ["", "__lt", "__lte", "__gt", "__gte", "__ne"];
const timeFilters = (field: string) => TIME_OPS.map((op) => `${field}${op}`);

export const ENDPOINTS = {
  // ── Legacy (v2) ──────────────────────────────────────────────────────
  accounts: v2("accounts", ["account", "account__in", "id", "id__in", "name", "name__in"]),
  activity_logs: v2("activity_logs", [
    "account", "created_at__exact", "created_at__lt", "created_at__lte",
    "created_at__gt", "created_at__gte", "action__timestamp__exact",
    "action__timestamp__lt", "action__timestamp__lte", "action__timestamp__gt",
    "action__timestamp__gte", "actor__id", "object__id", "action__id__exact",
    "actor__type", "action__type", "object__type",
  ]),
  alerts: v2("alerts", [
    "account", "created_at", "created_at_timeuuid", "detected_at",
    "friendly_info", "info", "router", "type",
  ]),
  configuration_managers: v2("configuration_managers", [
    "account", "account__in", "id", "id__in", "router", "router__in",
    "router.id", "synched", "suspended",
  ]),
  failovers: v2("failovers", ["account_id", "group_id", "router_id", "started_at", "ended_at"]),
  firmwares: v2("firmwares", ["id", "id__in", "version", "version__in"]),
  groups: v2("groups", ["account", "account__in", "id", "id__in", "name", "name__in"]),
  historical_locations: v2("historical_locations", [
    "router", "created_at__gt", "created_at_timeuuid__gt", "created_at__lte",
  ]),
  locations: v2("locations", ["id", "id__in", "router", "router__in"]),
  net_devices: v2("net_devices", [
    "account", "account__in", "connection_state", "connection_state__in",
    "id", "id__in", "is_asset", "ipv4_address", "ipv4_address__in", "mode",
    "mode__in", "router", "router__in",
  ]),
  products: v2("products", ["id", "id__in"]),
  reboot_activity: v2("reboot_activity", []),
  router_alerts: v2("router_alerts", [
    "router", "router__in", "created_at", "created_at__lt", "created_at__gt",
    "created_at_timeuuid", "created_at_timeuuid__in", "created_at_timeuuid__gt",
    "created_at_timeuuid__gte", "created_at_timeuuid__lt", "created_at_timeuuid__lte",
  ]),
  router_logs: v2("router_logs", [
    "router", "created_at", "created_at__lt", "created_at__gt",
    "created_at_timeuuid", "created_at_timeuuid__in", "created_at_timeuuid__gt",
    "created_at_timeuuid__gte", "created_at_timeuuid__lt", "created_at_timeuuid__lte",
  ]),
  routers: v2("routers", [
    "account", "account__in", "device_type", "device_type__in", "group",
    "group__in", "id", "id__in", "ipv4_address", "ipv4_address__in", "mac",
    "mac__in", "name", "name__in", "reboot_required", "reboot_required__in",
    "serial_number", "state", "state__in", "state_updated_at__lt",
    "state_updated_at__gt", "updated_at__lt", "updated_at__gt",
  ]),

  // ── Current (v3) ─────────────────────────────────────────────────────
  asset_endpoints: v3("asset_endpoints", "/asset_endpoints", [
    "id", "hardware_series", "hardware_series_key", "mac_address", "serial_number",
  ]),
  subscriptions: v3("subscriptions", "/subscriptions", [
    ...timeFilters("end_time"), "id", "name", "quantity",
    ...timeFilters("start_time"), "tenant", "type",
  ]),
  regrades: v3("regrades", "/asset_endpoints/regrades", [
    "id", "action_id", "mac_address", "created_at", "action",
    "subscription_type", "status", "error_code",
  ]),
  users: v3("users", "/beta/users", [
    "email", "email__not", "first_name", "first_name__ne", "id",
    "is_active__ne", ...timeFilters("last_login"), "last_name", "last_name__ne",
    "pending_email",
  ]),
  exchange_sites: v3("exchange_sites", "/beta/exchange_sites", ["exchange_network", "name"]),
  exchange_resources: v3("exchange_resources", "/beta/exchange_resources", [
    "exchange_network", "exchange_site", "name", "protocols", "tags", "domain", "ip",
  ]),
  private_cellular_networks: v3("private_cellular_networks", "/beta/private_cellular_networks", [
    "core_ip", "created_at", "ha_enabled", "id", "mobility_gateway_virtual_ip",
    "name", "state", "status", "type", "updated_at",
  ]),
  group_modem_upgrade_jobs: v3("group_modem_upgrade_jobs", "/beta/group_modem_upgrade_jobs", [
    "id", "group_id", "module_id", "carrier_id", "overwrite", "active_only",
    "upgrade_only", "batch_size", ...timeFilters("created_at"),
    ...timeFilters("updated_at"), "available_version", "modem_count",
    "success_count", "failed_count", "status", "carrier_name", "module_name", "type",
  ]),
} satisfies Record<string, EndpointDescriptor>;

export type EndpointName = keyof typeof ENDPOINTS;

/** Catalog entry for a resource name */
export function endpointByName(name: string): EndpointDescriptor | undefined {
  return Object.values(ENDPOINTS).find((e) => e.name === name);
}

/** Path of a single resource inside a collection */
export function itemPath(endpoint: EndpointDescriptor, id: string | number): string {
  const base = endpoint.path.replace(/\/+$/, "");
  const item = `${base}/${encodeURIComponent(String(id))}`;
  return endpoint.version === "v2" ? `${item}/` : item;
}

// ---------------------------------------------------------------------------
// Dual routes: read-only lookups both API versions answer with the same filters
// ---------------------------------------------------------------------------

export interface DualRoute {
  legacy: EndpointDescriptor;
  current: EndpointDescriptor;
  /** Filter keys both versions accept; the resolved route allows only these */
  filters: readonly string[];
}

export const DUAL_ROUTES: Record<string, DualRoute> = {
  devices: { legacy: ENDPOINTS.routers, current: ENDPOINTS.asset_endpoints, filters: ["serial_number"] },
};

/**
 * Resolve every dual route for a credential set: the current API when a
 * bearer token is configured, the legacy API otherwise. Resolved routes are
 * collection reads; item paths and writes go through the catalog entry.
 */
export function resolveRoutes(creds: Credentials): Record<string, EndpointDescriptor> {
  const preferCurrent = hasToken(creds);
  const resolved: Record<string, EndpointDescriptor> = {};
  for (const [name, route] of Object.entries(DUAL_ROUTES)) {
    resolved[name] = { ...(preferCurrent ? route.current : route.legacy), filters: route.filters };
  }
  return resolved;
}
