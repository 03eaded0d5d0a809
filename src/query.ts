import type { EndpointDescriptor } from "./endpoints.js";
import { RequestError } from "./errors.js";

export type FilterScalar = string | number | boolean;
export type FilterValue = FilterScalar | readonly FilterScalar[];

/**
 * Version-neutral query. Filter keys follow the `field` / `field__op`
 * convention (e.g. `name`, `id__in`, `created_at__gt`); each API version
 * encodes them its own way.
 */
export interface QuerySpec {
  filters?: Record<string, FilterValue>;
  /** Restrict returned fields */
  fields?: string[];
  /** Sort keys, `-` prefix for descending */
  sort?: string[];
  /** Related resources to inline (v2 only) */
  expand?: string[];
  /** Free-text search by field (v3 only) */
  search?: Record<string, string>;
  /** Requested page size, clamped to the endpoint's maximum */
  pageSize?: number;
}

/** Requested number of records: a count, or "all" to walk until exhausted */
export type PageLimit = number | "all";

/** Values of a filter as a list; scalars become a one-element list */
export function filterValues(value: FilterValue): readonly FilterScalar[] {
  return typeof value === "object" ? value : [value];
}

function joinValue(value: FilterValue): string {
  return filterValues(value).map(String).join(",");
}

/** Reject filter keys the endpoint does not accept, and version-specific options on the wrong version */
export function validateQuery(endpoint: EndpointDescriptor, query: QuerySpec): void {
  const context = { endpoint: endpoint.name };
  if (endpoint.filters) {
    const allowed = new Set(endpoint.filters);
    const bad = Object.keys(query.filters ?? {}).filter((k) => !allowed.has(k));
    if (bad.length) {
      throw new RequestError(
        `Invalid filter(s) for ${endpoint.name}: ${bad.join(", ")}`,
        undefined,
        { invalid: bad, allowed: endpoint.filters },
        context,
      );
    }
  }
  if (endpoint.version === "v3" && query.expand?.length) {
    throw new RequestError(`expand is not supported by ${endpoint.name} (v3)`, undefined, null, context);
  }
  if (endpoint.version === "v2" && query.search && Object.keys(query.search).length) {
    throw new RequestError(`search is not supported by ${endpoint.name} (v2)`, undefined, null, context);
  }
  if (query.pageSize !== undefined && (!Number.isInteger(query.pageSize) || query.pageSize < 1)) {
    throw new RequestError(`pageSize must be a positive integer, got ${query.pageSize}`, undefined, null, context);
  }
}

/** Encode filters, fields, sort, expand and search as query parameters (paging excluded) */
export function encodeQuery(endpoint: EndpointDescriptor, query: QuerySpec): Record<string, string> {
  const params: Record<string, string> = {};

  if (endpoint.version === "v2") {
    for (const [key, value] of Object.entries(query.filters ?? {})) {
      params[key] = joinValue(value);
    }
    if (query.fields?.length) params.fields = query.fields.join(",");
    if (query.sort?.length) params.order_by = query.sort.join(",");
    if (query.expand?.length) params.expand = query.expand.join(",");
    return params;
  }

  for (const [key, value] of Object.entries(query.filters ?? {})) {
    const split = key.lastIndexOf("__");
    const name = split > 0 ? `filter[${key.slice(0, split)}][${key.slice(split + 2)}]` : `filter[${key}]`;
    params[name] = joinValue(value);
  }
  for (const [key, value] of Object.entries(query.search ?? {})) {
    params[`search[${key}]`] = value;
  }
  if (query.fields?.length) params["filter[fields]"] = query.fields.join(",");
  if (query.sort?.length) params.sort = query.sort.join(",");
  return params;
}

/** Page size for a walk: the requested size clamped to the endpoint, and never above a numeric limit */
export function resolvePageSize(endpoint: EndpointDescriptor, query: QuerySpec, limit: PageLimit = "all"): number {
  let size = Math.min(query.pageSize ?? endpoint.defaultPageSize, endpoint.maxPageSize);
  if (limit !== "all") size = Math.min(size, limit);
  return Math.max(1, size);
}

/** Paging parameters for the first request of a walk */
export function pageParams(endpoint: EndpointDescriptor, pageSize: number, offset = 0): Record<string, string> {
  if (endpoint.version === "v2") {
    return { limit: String(pageSize), offset: String(offset) };
  }
  return { "page[size]": String(pageSize) };
}

/** Parse "key=value" pairs (CLI / MCP input) into filters; repeated keys and commas become arrays */
export function parseFilterPairs(pairs: readonly string[]): Record<string, FilterValue> {
  const filters: Record<string, FilterValue> = {};
  for (const pair of pairs) {
    const idx = pair.indexOf("=");
    if (idx <= 0) {
      throw new RequestError(`Invalid filter "${pair}", expected key=value`, undefined, null);
    }
    const key = pair.slice(0, idx);
    const raw = pair.slice(idx + 1);
    const values = raw.split(",").filter((v) => v !== "");
    const existing = filters[key];
    const merged: FilterScalar[] = existing === undefined ? values : [...filterValues(existing), ...values];
    filters[key] = key.endsWith("__in") || merged.length > 1 ? merged : merged[0] ?? "";
  }
  return filters;
}
