import { listAll } from "./chunk.js";
import type { NcmClient } from "./client.js";
import { ENDPOINTS, itemPath, type EndpointDescriptor } from "./endpoints.js";
import { NotFoundError, RequestError } from "./errors.js";
import type { ApiRecord } from "./paginate.js";
import type { FilterValue, PageLimit } from "./query.js";

// ---------------------------------------------------------------------------
// Lookups
// ---------------------------------------------------------------------------

/** First record of an endpoint matching the filters, or NotFoundError */
export async function findOne(
  client: NcmClient,
  endpoint: EndpointDescriptor,
  filters: Record<string, FilterValue>,
): Promise<ApiRecord> {
  const [record] = await listAll(client, endpoint, { filters }, { limit: 1 });
  if (!record) {
    const described = Object.entries(filters).map(([k, v]) => `${k}=${String(v)}`).join(", ");
    throw new NotFoundError(`No ${endpoint.name} record matches ${described}`, undefined, null, {
      endpoint: endpoint.name,
    });
  }
  return record;
}

export function getRouterByName(client: NcmClient, name: string): Promise<ApiRecord> {
  return findOne(client, ENDPOINTS.routers, { name });
}

export function getAccountByName(client: NcmClient, name: string): Promise<ApiRecord> {
  return findOne(client, ENDPOINTS.accounts, { name });
}

/** Device by serial number: the v3 asset endpoint with a token, the v2 router otherwise */
export function findDeviceBySerial(client: NcmClient, serialNumber: string): Promise<ApiRecord> {
  return findOne(client, client.route("devices"), { serial_number: serialNumber });
}

// ---------------------------------------------------------------------------
// Date windows
// ---------------------------------------------------------------------------

/** `created_at` bounds as the API expects them: UTC `YYYY-MM-DDTHH:MM:SS` */
export interface DateWindow {
  start: string;
  end: string;
}

const DAY_MS = 24 * 60 * 60 * 1000;
const HOUR_MS = 60 * 60 * 1000;

function formatTimestamp(ms: number): string {
  return new Date(ms).toISOString().slice(0, 19);
}

/** The 24 hours of a calendar day (`YYYY-MM-DD`), shifted by a UTC offset in hours */
export function dayWindow(date: string, tzOffsetHours = 0): DateWindow {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  const midnight = match ? Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) : NaN;
  if (Number.isNaN(midnight) || formatTimestamp(midnight).slice(0, 10) !== date) {
    throw new RequestError(`Invalid date "${date}", expected YYYY-MM-DD`, undefined, null);
  }
  const start = midnight + tzOffsetHours * HOUR_MS;
  return { start: formatTimestamp(start), end: formatTimestamp(start + DAY_MS) };
}

/** The 24 hours up to now, shifted by a UTC offset in hours */
export function last24Hours(tzOffsetHours = 0, now: Date = new Date()): DateWindow {
  const end = now.getTime() + tzOffsetHours * HOUR_MS;
  return { start: formatTimestamp(end - DAY_MS), end: formatTimestamp(end) };
}

/** Router log entries inside a window, oldest first */
export function getRouterLogs(client: NcmClient, routerId: string | number, window: DateWindow): Promise<ApiRecord[]> {
  return listAll(client, ENDPOINTS.router_logs, {
    filters: { router: String(routerId), created_at__gt: window.start, created_at__lt: window.end },
    sort: ["created_at_timeuuid"],
  });
}

/** Router alerts inside a window, oldest first; all routers unless some are named */
export function getRouterAlerts(
  client: NcmClient,
  window: DateWindow,
  routerIds: readonly (string | number)[] = [],
): Promise<ApiRecord[]> {
  const filters: Record<string, FilterValue> = { created_at__gt: window.start, created_at__lt: window.end };
  if (routerIds.length) filters.router__in = routerIds.map(String);
  return listAll(client, ENDPOINTS.router_alerts, { filters, sort: ["created_at_timeuuid"] });
}

/** Location history of a router inside a window (end inclusive) */
export function getHistoricalLocations(
  client: NcmClient,
  routerId: string | number,
  window: DateWindow,
  limit: PageLimit = "all",
): Promise<ApiRecord[]> {
  return listAll(
    client,
    ENDPOINTS.historical_locations,
    { filters: { router: String(routerId), created_at__gt: window.start, created_at__lte: window.end } },
    { limit },
  );
}

// ---------------------------------------------------------------------------
// Reboots
// ---------------------------------------------------------------------------

export async function rebootRouter(client: NcmClient, routerId: string | number): Promise<unknown> {
  const base = client.baseUrlFor("v2");
  return client.dispatch({
    method: "POST",
    endpoint: ENDPOINTS.reboot_activity,
    body: { router: `${base}${itemPath(ENDPOINTS.routers, routerId)}` },
  });
}

export async function rebootGroup(client: NcmClient, groupId: string | number): Promise<unknown> {
  const base = client.baseUrlFor("v2");
  return client.dispatch({
    method: "POST",
    endpoint: ENDPOINTS.reboot_activity,
    body: { group: `${base}${itemPath(ENDPOINTS.groups, groupId)}` },
  });
}

// ---------------------------------------------------------------------------
// Router configuration
// ---------------------------------------------------------------------------

/** ID of the configuration manager that owns a router's config */
export async function configurationManagerId(client: NcmClient, routerId: string | number): Promise<string> {
  const record = await findOne(client, ENDPOINTS.configuration_managers, { "router.id": String(routerId) });
  const id = record.id;
  if (typeof id !== "string" && typeof id !== "number") {
    throw new NotFoundError(`Configuration manager for router ${routerId} has no id`, undefined, record, {
      endpoint: ENDPOINTS.configuration_managers.name,
    });
  }
  return String(id);
}

/** PATCH a router's configuration. `configuration` is the NCM `[updates, removals]` pair. */
export async function patchRouterConfiguration(
  client: NcmClient,
  routerId: string | number,
  configuration: unknown,
): Promise<unknown> {
  const managerId = await configurationManagerId(client, routerId);
  return client.dispatch({
    method: "PATCH",
    endpoint: ENDPOINTS.configuration_managers,
    path: itemPath(ENDPOINTS.configuration_managers, managerId),
    body: { configuration },
  });
}

const MASKED_KEYS = new Set(["password", "wpapsk"]);

/** Drop secrets the API returns masked as "*" */
export function stripMaskedSecrets(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(stripMaskedSecrets);
  if (typeof value !== "object" || value === null) return value;
  const out: Record<string, unknown> = {};
  for (const [key, child] of Object.entries(value)) {
    if (MASKED_KEYS.has(key) && child === "*") continue;
    out[key] = stripMaskedSecrets(child);
  }
  return out;
}

/** Copy one router's configuration onto another, leaving masked secrets untouched on the target */
export async function copyRouterConfiguration(
  client: NcmClient,
  sourceRouterId: string | number,
  targetRouterId: string | number,
): Promise<unknown> {
  const source = await findOne(client, ENDPOINTS.configuration_managers, { "router.id": String(sourceRouterId) });
  if (!("configuration" in source)) {
    throw new RequestError(`Router ${sourceRouterId} returned no configuration`, undefined, source, {
      endpoint: ENDPOINTS.configuration_managers.name,
    });
  }
  return patchRouterConfiguration(client, targetRouterId, stripMaskedSecrets(source.configuration));
}

// ---------------------------------------------------------------------------
// Subscription regrades
// ---------------------------------------------------------------------------

export type RegradeAction = "UPGRADE" | "DOWNGRADE";

const MAC_PATTERN = /^(?:[0-9a-f]{12}|(?:[0-9a-f]{2}:){5}[0-9a-f]{2})$/i;

/** Identify an asset as a MAC address (colons stripped) or a serial number */
export function assetIdentifier(value: string): { mac_address: string } | { serial_number: string } {
  const trimmed = value.trim();
  if (MAC_PATTERN.test(trimmed)) return { mac_address: trimmed.replace(/:/g, "") };
  return { serial_number: trimmed };
}

/** Apply or remove a subscription on a set of assets in one atomic request */
export async function regrade(
  client: NcmClient,
  subscriptionId: string,
  assets: readonly string[],
  action: RegradeAction = "UPGRADE",
): Promise<unknown> {
  if (!assets.length) {
    throw new RequestError("regrade needs at least one MAC address or serial number", undefined, null, {
      endpoint: ENDPOINTS.regrades.name,
    });
  }
  const operations = assets.map((asset) => ({
    op: "add",
    data: {
      type: "regrades",
      attributes: { action, subscription_type: subscriptionId, ...assetIdentifier(asset) },
    },
  }));
  return client.dispatch({
    method: "POST",
    endpoint: ENDPOINTS.regrades,
    body: { "atomic:operations": operations },
  });
}
