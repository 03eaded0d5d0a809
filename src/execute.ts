import { listAll } from "./chunk.js";
import type { NcmClient } from "./client.js";
import type { CmdDef } from "./commands.js";
import type { ApiVersion } from "./credentials.js";
import { itemPath, type EndpointDescriptor } from "./endpoints.js";
import { RequestError } from "./errors.js";
import {
  encodeQuery,
  pageParams,
  resolvePageSize,
  validateQuery,
  type FilterValue,
  type PageLimit,
  type QuerySpec,
} from "./query.js";

export interface ExecuteParams {
  /** Positional arguments keyed by name (e.g. { id: "42" }) */
  args: Record<string, string>;
  filters?: Record<string, FilterValue>;
  fields?: string[];
  sort?: string[];
  expand?: string[];
  search?: Record<string, string>;
  pageSize?: number;
  /** Records to fetch for list commands (default "all") */
  limit?: PageLimit;
  /** Request body (already parsed) */
  body?: unknown;
}

export interface ExecuteResult {
  method: string;
  /** Fully-qualified URL of the (first) request */
  url: string;
  version: ApiVersion;
  body: unknown | undefined;
}

function querySpec(params: ExecuteParams): QuerySpec {
  return {
    filters: params.filters,
    fields: params.fields,
    sort: params.sort,
    expand: params.expand,
    search: params.search,
    pageSize: params.pageSize,
  };
}

function requireId(cmd: CmdDef, params: ExecuteParams): string {
  const id = params.args.id;
  if (!id) {
    throw new RequestError(`${cmd.group} ${cmd.action} requires an id`, undefined, null, { endpoint: cmd.resource });
  }
  return id;
}

/** Resolve the endpoint, URL and body of a command without executing it */
export function resolveRequest(cmd: CmdDef, params: ExecuteParams, client: NcmClient): ExecuteResult {
  const endpoint = client.endpoint(cmd.resource);
  const body = cmd.hasBody ? params.body : undefined;

  if (cmd.action === "list") {
    const query = querySpec(params);
    validateQuery(endpoint, query);
    const pageSize = resolvePageSize(endpoint, query, params.limit ?? "all");
    const url = client.buildUrl({
      endpoint,
      query: { ...encodeQuery(endpoint, query), ...pageParams(endpoint, pageSize) },
    });
    return { method: cmd.method, url: url.toString(), version: endpoint.version, body };
  }

  const path = cmd.args.length ? itemPath(endpoint, requireId(cmd, params)) : endpoint.path;
  const url = client.buildUrl({ endpoint, path });
  return { method: cmd.method, url: url.toString(), version: endpoint.version, body };
}

/** Execute a command. List commands walk every page (or up to the limit) and return the records. */
export async function executeCommand(cmd: CmdDef, params: ExecuteParams, client: NcmClient): Promise<unknown> {
  const endpoint = client.endpoint(cmd.resource);

  if (cmd.action === "list") {
    return listAll(client, endpoint, querySpec(params), { limit: params.limit ?? "all" });
  }

  if (cmd.hasBody && params.body === undefined) {
    throw new RequestError(`${cmd.group} ${cmd.action} requires a request body`, undefined, null, {
      endpoint: endpoint.name,
    });
  }

  const path = cmd.args.length ? itemPath(endpoint, requireId(cmd, params)) : undefined;
  const payload = await client.dispatch({
    method: cmd.method,
    endpoint,
    path,
    body: cmd.hasBody ? params.body : undefined,
    read: "item",
  });
  return unwrapItem(endpoint, payload);
}

/** v3 wraps single resources in `{ data: {...} }`; v2 returns them bare */
export function unwrapItem(endpoint: EndpointDescriptor, payload: unknown): unknown {
  if (endpoint.version !== "v3" || typeof payload !== "object" || payload === null) return payload;
  if (!("data" in payload)) return payload;
  const data = payload.data;
  return typeof data === "object" && data !== null && !Array.isArray(data) ? data : payload;
}

export interface RawParams {
  version?: ApiVersion;
  query?: Record<string, string>;
  body?: unknown;
}

/** Endpoint descriptor for an ad-hoc path */
export function rawEndpoint(path: string, version: ApiVersion = "v2"): EndpointDescriptor {
  const size = version === "v3" ? 50 : 500;
  const normalized = path.startsWith("/") ? path : `/${path}`;
  return { name: normalized, version, path: normalized, defaultPageSize: size, maxPageSize: size };
}

/** Make one request against any path of either API version */
export async function executeRaw(
  client: NcmClient,
  method: string,
  path: string,
  params: RawParams = {},
): Promise<unknown> {
  return client.dispatch({
    method: method.toUpperCase(),
    endpoint: rawEndpoint(path, params.version),
    query: params.query,
    body: params.body,
    read: "item",
  });
}
